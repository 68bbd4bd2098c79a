import { describe, it, expect } from "vitest";
import { MockLLMClient } from "../mock-client";
import type { ProviderPayload } from "../types";

function payload(purpose: ProviderPayload["purpose"]): ProviderPayload {
  return { purpose, parts: [{ type: "text", text: "x" }], temperature: 0, maxOutputTokens: 10 };
}

describe("MockLLMClient", () => {
  it("returns the description fixture for description payloads", async () => {
    const text = await new MockLLMClient({ delayMs: 0 }).generate(payload("description"));
    expect(text.startsWith("A narrow cobblestone street climbs")).toBe(true);
  });

  it("returns the story fixture for creative payloads", async () => {
    const text = await new MockLLMClient({ delayMs: 0 }).generate(payload("creative"));
    expect(text.startsWith("The baker had closed the shutters an hour early")).toBe(true);
    expect(text).toBe(text.trim());
  });

  it("fails the configured number of calls, then succeeds", async () => {
    const client = new MockLLMClient({ delayMs: 0, failCount: 1 });

    await expect(client.generate(payload("description"))).rejects.toMatchObject({
      name: "ProviderError",
      kind: "unknown",
    });
    await expect(client.generate(payload("description"))).resolves.toContain("cobblestone");
    await expect(client.generate(payload("description"))).resolves.toContain("cobblestone");
  });
});
