import { describe, it, expect } from "vitest";
import { DEFAULT_BASE_URL, DEFAULT_MODEL, loadConfig } from "../config";
import { ConfigError } from "../errors";

describe("loadConfig", () => {
  it("reads the key and applies defaults", () => {
    expect(loadConfig({ VITE_GEMINI_API_KEY: "test-key" })).toEqual({
      apiKey: "test-key",
      model: DEFAULT_MODEL,
      baseURL: DEFAULT_BASE_URL,
      useMock: false,
    });
  });

  it("trims values and honours overrides", () => {
    expect(
      loadConfig({
        VITE_GEMINI_API_KEY: "  test-key \n",
        VITE_GEMINI_MODEL: " gemini-test ",
        VITE_GEMINI_BASE_URL: "http://localhost:9999/v1/",
      })
    ).toEqual({
      apiKey: "test-key",
      model: "gemini-test",
      baseURL: "http://localhost:9999/v1/",
      useMock: false,
    });
  });

  it("fails fast when the key is missing", () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
  });

  it("treats a blank key as missing and names the variable", () => {
    let caught: unknown;
    try {
      loadConfig({ VITE_GEMINI_API_KEY: "   " });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({ key: "VITE_GEMINI_API_KEY" });
  });

  it("does not require a key in mock mode", () => {
    expect(loadConfig({ VITE_USE_MOCK_LLM: "true" })).toMatchObject({
      apiKey: null,
      useMock: true,
    });
  });

  it("only enables mock mode for the exact value true", () => {
    expect(() => loadConfig({ VITE_USE_MOCK_LLM: "yes" })).toThrow(ConfigError);
  });
});
