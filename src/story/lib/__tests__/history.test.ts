import { describe, it, expect, vi } from "vitest";
import { SessionHistory } from "../session/history";
import type { GenerationResult } from "../types";

function makeResult(id: string): GenerationResult {
  return {
    id,
    timestamp: "2026-01-02T03:04:05.000Z",
    filename: `${id}.png`,
    tone: "neutral",
    length: "medium",
    contentType: "story",
    prompt: "",
    imageDescription: `description ${id}`,
    generatedText: `text ${id}`,
  };
}

describe("SessionHistory", () => {
  it("starts empty", () => {
    const history = new SessionHistory();
    expect(history.size).toBe(0);
    expect(history.list()).toEqual([]);
  });

  it("keeps insertion order without deduplicating", () => {
    const history = new SessionHistory();
    const a = makeResult("a");
    const b = makeResult("b");

    history.append(a);
    history.append(b);
    history.append(a);

    expect(history.list().map((r) => r.id)).toEqual(["a", "b", "a"]);
    expect(history.size).toBe(3);
  });

  it("returns the same snapshot until the next change", () => {
    const history = new SessionHistory();
    history.append(makeResult("a"));
    const before = history.getSnapshot();

    expect(history.getSnapshot()).toBe(before);
    history.append(makeResult("b"));
    expect(history.getSnapshot()).not.toBe(before);
    expect(before).toHaveLength(1);
  });

  it("notifies subscribers on append and clear", () => {
    const history = new SessionHistory();
    const listener = vi.fn();
    history.subscribe(listener);

    history.append(makeResult("a"));
    history.clear();

    expect(listener).toHaveBeenCalledTimes(2);
    expect(history.size).toBe(0);
  });

  it("does not notify when clearing an empty history", () => {
    const history = new SessionHistory();
    const listener = vi.fn();
    history.subscribe(listener);

    history.clear();

    expect(listener).not.toHaveBeenCalled();
  });

  it("stops notifying after unsubscribe", () => {
    const history = new SessionHistory();
    const listener = vi.fn();
    const unsubscribe = history.subscribe(listener);

    unsubscribe();
    history.append(makeResult("a"));

    expect(listener).not.toHaveBeenCalled();
  });

  it("gives each session its own history", () => {
    const first = new SessionHistory();
    const second = new SessionHistory();

    first.append(makeResult("a"));

    expect(second.size).toBe(0);
  });
});
