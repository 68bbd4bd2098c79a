import type { LLMClient } from "@/shared/lib/llm/types";
import { SessionHistory } from "./history";

/**
 * Everything one browser session owns. Handlers receive the session
 * explicitly; nothing about it lives in module scope.
 */
export interface Session {
  readonly id: string;
  readonly startedAt: string;
  readonly history: SessionHistory;
  readonly client: LLMClient;
}

export function generateId(): string {
  return `${Date.now()}-${Math.random().toString(36).slice(2, 9)}`;
}

/** Builds a fresh session with an empty history. Has no side effects. */
export function createSession(client: LLMClient): Session {
  return {
    id: generateId(),
    startedAt: new Date().toISOString(),
    history: new SessionHistory(),
    client,
  };
}
