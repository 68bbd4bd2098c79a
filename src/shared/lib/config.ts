import { ConfigError } from "./errors";

export const DEFAULT_MODEL = "gemini-2.0-flash";
export const DEFAULT_BASE_URL = "https://generativelanguage.googleapis.com/v1beta/openai/";

/** The subset of Vite's import.meta.env this app reads. */
export interface ConfigEnv {
  VITE_GEMINI_API_KEY?: string;
  VITE_GEMINI_MODEL?: string;
  VITE_GEMINI_BASE_URL?: string;
  VITE_USE_MOCK_LLM?: string;
}

export interface AppConfig {
  /** Provider API key. Null only in mock mode. */
  apiKey: string | null;
  model: string;
  baseURL: string;
  /** When true, the fixture-backed MockLLMClient replaces the real provider. */
  useMock: boolean;
}

function read(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Builds the typed app configuration from the environment Vite loaded out of
 * `.env`. Throws ConfigError when the API key is missing and mock mode is off,
 * so main.tsx can refuse to start the UI.
 */
export function loadConfig(env: ConfigEnv): AppConfig {
  const useMock = read(env.VITE_USE_MOCK_LLM) === "true";
  const apiKey = read(env.VITE_GEMINI_API_KEY) ?? null;

  if (!useMock && apiKey === null) {
    throw new ConfigError(
      "VITE_GEMINI_API_KEY",
      "VITE_GEMINI_API_KEY is not set. Add it to your .env file and restart the dev server."
    );
  }

  return {
    apiKey,
    model: read(env.VITE_GEMINI_MODEL) ?? DEFAULT_MODEL,
    baseURL: read(env.VITE_GEMINI_BASE_URL) ?? DEFAULT_BASE_URL,
    useMock,
  };
}
