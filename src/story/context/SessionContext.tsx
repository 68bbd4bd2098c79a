/**
 * Owns the Session for the lifetime of the page.
 *
 * The session (its history and provider client) is created once when the
 * provider mounts and survives route changes; a reload starts a new one.
 * Pages read it with useSession() and pass it explicitly into
 * submitGeneration.
 */

import {
  createContext,
  useContext,
  useEffect,
  useState,
  useSyncExternalStore,
  type ReactNode,
} from "react";
import { log } from "@/shared/lib/actionLog";
import type { LLMClient } from "@/shared/lib/llm/types";
import { createSession, type Session } from "@/story/lib/session/session";
import type { GenerationResult } from "@/story/lib/types";

const SessionContext = createContext<Session | null>(null);

export function SessionProvider({ client, children }: { client: LLMClient; children: ReactNode }) {
  const [session] = useState(() => createSession(client));

  // createSession is pure; the start is recorded once the provider mounts.
  useEffect(() => {
    log({
      category: "session",
      action: "session:start",
      data: { sessionId: session.id, startedAt: session.startedAt },
    });
  }, [session]);

  return <SessionContext.Provider value={session}>{children}</SessionContext.Provider>;
}

export function useSession(): Session {
  const session = useContext(SessionContext);
  if (!session) throw new Error("useSession must be used inside SessionProvider");
  return session;
}

/** The current session's results, re-rendering on every append or clear. */
export function useHistory(): readonly GenerationResult[] {
  const { history } = useSession();
  return useSyncExternalStore(history.subscribe, history.getSnapshot);
}
