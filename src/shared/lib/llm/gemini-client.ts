import OpenAI, { APIConnectionError, APIError } from "openai";
import type {
  ChatCompletion,
  ChatCompletionContentPart,
  ChatCompletionCreateParamsNonStreaming,
} from "openai/resources/chat/completions";
import type { LLMClient, PayloadPart, ProviderPayload } from "./types";
import { ProviderError, asProviderError } from "@/shared/lib/errors";

export const TRUNCATION_NOTE = "\n\n[Note: Response was truncated due to length limit]";

export type CompletionCreate = (
  body: ChatCompletionCreateParamsNonStreaming
) => Promise<ChatCompletion>;

export interface GeminiClientOptions {
  apiKey: string;
  model: string;
  baseURL: string;
  /**
   * Replaces the SDK call. Tests pass a stub here so no request leaves the
   * process; production leaves it undefined.
   */
  create?: CompletionCreate;
}

function toContentPart(part: PayloadPart): ChatCompletionContentPart {
  if (part.type === "text") return { type: "text", text: part.text };
  return {
    type: "image_url",
    image_url: { url: `data:${part.mimeType};base64,${part.base64}` },
  };
}

/** Maps SDK failures onto the provider error kinds the UI knows about. */
export function toProviderError(err: unknown): ProviderError {
  if (err instanceof ProviderError) return err;
  // APIConnectionError extends APIError, so it must be checked first.
  if (err instanceof APIConnectionError) {
    return new ProviderError(
      "Could not reach the AI provider. Check your connection and try again.",
      "network",
      { cause: err }
    );
  }
  if (err instanceof APIError) {
    const status = err.status;
    if (status === 429) {
      return new ProviderError(
        "The AI provider quota is exhausted. Try again later.",
        "quota",
        { status, cause: err }
      );
    }
    if (status === 401 || status === 403 || (status === 400 && /api key/i.test(err.message))) {
      return new ProviderError(
        "The AI provider rejected the API key. Check VITE_GEMINI_API_KEY.",
        "auth",
        { status, cause: err }
      );
    }
    return new ProviderError(`AI provider error: ${err.message}`, "unknown", {
      status,
      cause: err,
    });
  }
  return asProviderError(err);
}

/**
 * Real client that sends payloads to Gemini through its OpenAI-compatible
 * chat completions endpoint. One request per call: the SDK's automatic
 * retries are disabled.
 *
 * dangerouslyAllowBrowser is required because this is a client-side-only app;
 * the key comes from the local .env file.
 */
export class GeminiLLMClient implements LLMClient {
  private readonly model: string;
  private readonly create: CompletionCreate;

  constructor(options: GeminiClientOptions) {
    this.model = options.model;
    if (options.create) {
      this.create = options.create;
    } else {
      const client = new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseURL,
        maxRetries: 0,
        dangerouslyAllowBrowser: true,
      });
      this.create = (body) => client.chat.completions.create(body);
    }
  }

  async generate(payload: ProviderPayload): Promise<string> {
    let response: ChatCompletion;
    try {
      response = await this.create({
        model: this.model,
        messages: [{ role: "user", content: payload.parts.map(toContentPart) }],
        temperature: payload.temperature,
        max_tokens: payload.maxOutputTokens,
      });
    } catch (err) {
      throw toProviderError(err);
    }

    const choice = response.choices[0];
    if (!choice) {
      throw new ProviderError(
        "No response generated. The content may have been blocked by safety filters.",
        "empty"
      );
    }

    const text = choice.message.content?.trim() ?? "";
    switch (choice.finish_reason) {
      case "stop":
        if (!text) throw new ProviderError("The AI provider returned an empty response.", "empty");
        return text;
      case "length":
        if (!text) {
          throw new ProviderError(
            "Response exceeded maximum length and could not be retrieved.",
            "empty"
          );
        }
        return text + TRUNCATION_NOTE;
      case "content_filter":
        throw new ProviderError("Content blocked by safety filters.", "blocked");
      default:
        throw new ProviderError(
          `Generation stopped. Reason: ${choice.finish_reason}`,
          "stopped"
        );
    }
  }
}
