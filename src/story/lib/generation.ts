import { log } from "@/shared/lib/actionLog";
import { asProviderError } from "@/shared/lib/errors";
import type { ProviderPayload } from "@/shared/lib/llm/types";
import { composePayloads } from "./prompts";
import { generateId, type Session } from "./session/session";
import type { GenerationRequest, GenerationResult } from "./types";

async function callProvider(session: Session, payload: ProviderPayload): Promise<string> {
  try {
    return await session.client.generate(payload);
  } catch (err) {
    throw asProviderError(err);
  }
}

/**
 * Runs one submission end to end: compose, describe the image, generate the
 * creative text, then record the result in the session history.
 *
 * Rejects with MissingInputError (no image) or ProviderError (provider call
 * failed); in both cases the history is left exactly as it was.
 */
export async function submitGeneration(
  session: Session,
  request: GenerationRequest
): Promise<GenerationResult> {
  const payloads = composePayloads(request);

  const imageDescription = await callProvider(session, payloads.description);
  const generatedText = await callProvider(session, payloads.creative);

  const result: GenerationResult = Object.freeze({
    id: generateId(),
    timestamp: new Date().toISOString(),
    filename: request.image?.filename ?? "",
    tone: request.tone,
    length: request.length,
    contentType: request.contentType,
    prompt: request.prompt.trim(),
    imageDescription,
    generatedText,
  });

  session.history.append(result);
  log({
    category: "session",
    action: "history:append",
    data: { sessionId: session.id, resultId: result.id, size: session.history.size },
  });
  return result;
}
