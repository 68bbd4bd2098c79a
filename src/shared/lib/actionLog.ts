/**
 * Session-scoped in-memory action log.
 *
 * Singleton module that accumulates log entries for the lifetime of the browser
 * tab. The log is bounded to MAX_ENTRIES (500); oldest entries are dropped
 * when the cap is reached.
 *
 * Log categories:
 *   navigation   route changes
 *   user:action  explicit user gestures (generate, export, clear history, report bug)
 *   llm:request  provider call started
 *   llm:response provider call completed or errored
 *   session      session lifecycle and history mutations
 *   error        caught errors
 *
 * Usage:
 *   import { log, getAll } from "@/shared/lib/actionLog";
 *   log({ category: "navigation", action: "navigate", data: { path: "/history" } });
 *   const entries = getAll();
 */

export type LogCategory =
  | "navigation"
  | "user:action"
  | "llm:request"
  | "llm:response"
  | "session"
  | "error";

export interface LogEntry {
  /** ISO-8601 timestamp */
  timestamp: string;
  category: LogCategory;
  /** Short action label (e.g. "navigate", "story:generate:start", "llm:generate:complete") */
  action: string;
  data?: Record<string, unknown>;
}

export const MAX_ENTRIES = 500;

const _entries: LogEntry[] = [];

/**
 * Append a new entry to the log.
 * If the log has reached MAX_ENTRIES, the oldest entry is dropped first.
 */
export function log(
  entry: Omit<LogEntry, "timestamp"> & { timestamp?: string }
): void {
  const full: LogEntry = {
    timestamp: entry.timestamp ?? new Date().toISOString(),
    category: entry.category,
    action: entry.action,
    ...(entry.data !== undefined ? { data: entry.data } : {}),
  };
  if (_entries.length >= MAX_ENTRIES) {
    _entries.shift();
  }
  _entries.push(full);
}

/** Shallow copy of all entries, oldest first. */
export function getAll(): LogEntry[] {
  return _entries.slice();
}

/**
 * Clear all log entries (used in tests; not exposed to production UI).
 * @internal
 */
export function _clear(): void {
  _entries.length = 0;
}
