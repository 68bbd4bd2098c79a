import type { GenerationResult } from "../types";

type Listener = () => void;

/**
 * Ordered, append-only record of the results produced in one session.
 *
 * Each mutation replaces the internal array rather than pushing into it, so
 * getSnapshot() returns a stable reference between changes; React reads it
 * through useSyncExternalStore.
 */
export class SessionHistory {
  private entries: readonly GenerationResult[] = [];
  private readonly listeners = new Set<Listener>();

  get size(): number {
    return this.entries.length;
  }

  append(result: GenerationResult): void {
    this.entries = [...this.entries, result];
    this.emit();
  }

  /** Results in insertion order (oldest first). */
  list(): readonly GenerationResult[] {
    return this.entries;
  }

  /** Drops every record at once. The only removal path. */
  clear(): void {
    if (this.entries.length === 0) return;
    this.entries = [];
    this.emit();
  }

  subscribe = (listener: Listener): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  getSnapshot = (): readonly GenerationResult[] => this.entries;

  private emit(): void {
    for (const listener of this.listeners) listener();
  }
}
