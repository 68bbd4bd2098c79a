import type { LLMClient, ProviderPayload } from "@/shared/lib/llm/types";
import type { GenerationRequest, ImageInput } from "../types";

export const TEST_IMAGE: ImageInput = {
  filename: "harbor.png",
  mimeType: "image/png",
  base64: "iVBORw0KGgo=",
};

export function makeRequest(overrides: Partial<GenerationRequest> = {}): GenerationRequest {
  return {
    image: TEST_IMAGE,
    tone: "poetic",
    length: "short",
    contentType: "story",
    prompt: "A lighthouse keeper",
    ...overrides,
  };
}

/** Concatenated text parts of a payload, in order. */
export function payloadText(payload: ProviderPayload): string {
  return payload.parts
    .flatMap((part) => (part.type === "text" ? [part.text] : []))
    .join("\n");
}

type Reply = string | Error;

/**
 * LLMClient that answers from a queue of scripted replies and records every
 * payload it receives. An Error in the queue is thrown instead of returned.
 */
export class ScriptedClient implements LLMClient {
  readonly payloads: ProviderPayload[] = [];
  private readonly replies: Reply[];

  constructor(replies: Reply[]) {
    this.replies = [...replies];
  }

  async generate(payload: ProviderPayload): Promise<string> {
    this.payloads.push(payload);
    const reply = this.replies.shift();
    if (reply === undefined) throw new Error("ScriptedClient ran out of replies");
    if (reply instanceof Error) throw reply;
    return reply;
  }
}
