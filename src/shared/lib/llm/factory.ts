import type { LLMClient } from "./types";
import { MockLLMClient } from "./mock-client";
import { GeminiLLMClient } from "./gemini-client";
import { LoggingLLMClient } from "./logging-client";
import type { AppConfig } from "@/shared/lib/config";
import { ConfigError } from "@/shared/lib/errors";

/**
 * Returns the appropriate LLMClient for the given configuration.
 *
 * - When VITE_USE_MOCK_LLM=true (dev:mock): MockLLMClient
 * - Otherwise: GeminiLLMClient, keyed by config.apiKey
 *
 * Either way the client is wrapped in LoggingLLMClient.
 */
export function createLLMClient(config: AppConfig): LLMClient {
  if (config.useMock) {
    return new LoggingLLMClient(new MockLLMClient());
  }

  if (!config.apiKey) {
    throw new ConfigError(
      "VITE_GEMINI_API_KEY",
      "Gemini API key is required. Set VITE_GEMINI_API_KEY in your .env file."
    );
  }

  return new LoggingLLMClient(
    new GeminiLLMClient({
      apiKey: config.apiKey,
      model: config.model,
      baseURL: config.baseURL,
    })
  );
}
