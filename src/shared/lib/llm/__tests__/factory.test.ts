import { describe, it, expect } from "vitest";
import { createLLMClient } from "../factory";
import { LoggingLLMClient } from "../logging-client";
import { DEFAULT_BASE_URL, DEFAULT_MODEL, type AppConfig } from "@/shared/lib/config";
import { ConfigError } from "@/shared/lib/errors";

const BASE: AppConfig = {
  apiKey: null,
  model: DEFAULT_MODEL,
  baseURL: DEFAULT_BASE_URL,
  useMock: false,
};

describe("createLLMClient", () => {
  it("wraps the mock client in mock mode", () => {
    expect(createLLMClient({ ...BASE, useMock: true })).toBeInstanceOf(LoggingLLMClient);
  });

  it("wraps the Gemini client when a key is present", () => {
    expect(createLLMClient({ ...BASE, apiKey: "test-key" })).toBeInstanceOf(LoggingLLMClient);
  });

  it("refuses to build a real client without a key", () => {
    expect(() => createLLMClient(BASE)).toThrow(ConfigError);
  });
});
