export type SupportedImageType = "image/jpeg" | "image/png";

export type PayloadPart =
  | { type: "text"; text: string }
  | { type: "image"; mimeType: SupportedImageType; base64: string };

/**
 * One self-contained request to the provider: instruction text plus image,
 * with the sampling bounds for that call.
 */
export interface ProviderPayload {
  /** Short label used in logs (e.g. "description", "creative"). */
  purpose: string;
  parts: PayloadPart[];
  temperature: number;
  maxOutputTokens: number;
}

/**
 * Typed interface for all provider interactions in the app.
 * Implemented by GeminiLLMClient (real) and MockLLMClient (fixture-based).
 */
export interface LLMClient {
  /**
   * Send one payload and resolve with the generated text.
   * Rejects with ProviderError; never streams, never retries.
   */
  generate(payload: ProviderPayload): Promise<string>;
}
