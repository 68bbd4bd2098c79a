import type { LLMClient, ProviderPayload } from "./types";
import { log } from "@/shared/lib/actionLog";
import { ProviderError } from "@/shared/lib/errors";

/**
 * Decorator that wraps any LLMClient and emits llm:request / llm:response
 * log entries for every call. Used in the factory so all call sites are
 * covered without manual instrumentation.
 *
 * Image bytes are never logged; only their size is.
 */
export class LoggingLLMClient implements LLMClient {
  constructor(private readonly inner: LLMClient) {}

  async generate(payload: ProviderPayload): Promise<string> {
    const imageBytes = payload.parts.reduce(
      (sum, part) => sum + (part.type === "image" ? part.base64.length : 0),
      0
    );
    log({
      category: "llm:request",
      action: "llm:generate:start",
      data: {
        purpose: payload.purpose,
        temperature: payload.temperature,
        maxOutputTokens: payload.maxOutputTokens,
        imageBase64Length: imageBytes,
      },
    });
    try {
      const result = await this.inner.generate(payload);
      log({
        category: "llm:response",
        action: "llm:generate:complete",
        data: { purpose: payload.purpose, responseLength: result.length },
      });
      return result;
    } catch (err) {
      log({
        category: "llm:response",
        action: "llm:generate:error",
        data: {
          purpose: payload.purpose,
          error: err instanceof Error ? err.message : String(err),
          ...(err instanceof ProviderError ? { kind: err.kind } : {}),
        },
      });
      throw err;
    }
  }
}
