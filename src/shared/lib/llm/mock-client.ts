import type { LLMClient, ProviderPayload } from "./types";
import { ProviderError } from "@/shared/lib/errors";
// Vite inlines these fixture files as strings at build time via the `?raw` suffix.
import descriptionFixture from "./fixtures/description-response.txt?raw";
import storyFixture from "./fixtures/story-response.txt?raw";

export interface MockLLMClientOptions {
  /** Simulated latency in milliseconds (default 200 ms). */
  delayMs?: number;
  /**
   * Number of upcoming generate() calls that reject with a ProviderError
   * before the client starts succeeding again. Used to exercise the inline
   * error path without a live provider.
   */
  failCount?: number;
}

/**
 * Fixture-based client used in tests and offline development.
 * Returns the committed description fixture for "description" payloads and
 * the story fixture for everything else, after a simulated delay.
 *
 * Activated when VITE_USE_MOCK_LLM=true (`npm run dev:mock`).
 */
export class MockLLMClient implements LLMClient {
  private readonly delayMs: number;
  private remainingFailures: number;

  constructor(options: MockLLMClientOptions = {}) {
    this.delayMs = options.delayMs ?? 200;
    this.remainingFailures = options.failCount ?? 0;
  }

  private delay(): Promise<void> {
    if (this.delayMs <= 0) return Promise.resolve();
    return new Promise((resolve) => setTimeout(resolve, this.delayMs));
  }

  async generate(payload: ProviderPayload): Promise<string> {
    await this.delay();
    if (this.remainingFailures > 0) {
      this.remainingFailures--;
      throw new ProviderError("Mock provider failure", "unknown");
    }
    const fixture = payload.purpose === "description" ? descriptionFixture : storyFixture;
    return fixture.trim();
  }
}
