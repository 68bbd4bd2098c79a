import { describe, it, expect, beforeEach } from "vitest";
import { createSession } from "../session/session";
import { ScriptedClient } from "./fixtures";
import { _clear, getAll } from "@/shared/lib/actionLog";

describe("createSession", () => {
  beforeEach(() => {
    _clear();
  });

  it("starts with an empty history and the given client", () => {
    const client = new ScriptedClient([]);
    const session = createSession(client);

    expect(session.client).toBe(client);
    expect(session.history.size).toBe(0);
    expect(new Date(session.startedAt).toISOString()).toBe(session.startedAt);
  });

  it("gives each session its own id and history", () => {
    const a = createSession(new ScriptedClient([]));
    const b = createSession(new ScriptedClient([]));

    expect(a.id).not.toBe(b.id);
    expect(a.history).not.toBe(b.history);
  });

  it("writes nothing to the action log", () => {
    createSession(new ScriptedClient([]));
    expect(getAll()).toEqual([]);
  });
});
