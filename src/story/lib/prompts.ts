/**
 * Prompt composer.
 *
 * Turns a GenerationRequest into the two provider payloads sent per submission:
 * a low-temperature image description and the creative text shaped by the
 * user's tone, length and content type. The selected option values are written
 * into the instruction text verbatim so the provider (and the logs) see exactly
 * what the user picked.
 */

import type { ProviderPayload } from "@/shared/lib/llm/types";
import { MissingInputError } from "@/shared/lib/errors";
import {
  CONTENT_TYPES,
  LENGTHS,
  TONES,
  type ContentType,
  type GenerationOptions,
  type GenerationRequest,
  type ImageInput,
  type Length,
  type Tone,
} from "./types";

export const TONE_GUIDE: Record<Tone, string> = {
  neutral: "Write in a clear, neutral tone.",
  academic: "Write in an academic, structured tone.",
  playful: "Write in a light, playful tone.",
  poetic: "Write in a poetic and reflective tone.",
};

export const LENGTH_GUIDE: Record<Length, string> = {
  short: "Keep it concise (about 150-250 words).",
  medium: "Moderate length (about 300-500 words).",
  long: "More detailed (about 600-900 words).",
};

export const CONTENT_TYPE_GUIDE: Record<ContentType, string> = {
  description: "Write a vivid descriptive piece that brings the scene to life.",
  story: "Write a narrative story with a beginning, middle, and end.",
  "blog-post": "Write a blog-style piece with a hook, clear structure, and a takeaway.",
};

export const DEFAULT_OPTIONS: GenerationOptions = {
  tone: "neutral",
  length: "medium",
  contentType: "story",
};

export const DESCRIPTION_PROMPT =
  "Describe this image in detail. Mention key objects, setting, actions, " +
  "colors, emotions, and any visible text. Be precise but readable.";

/** Used in place of the user prompt when they leave it blank. */
export const EMPTY_PROMPT_FALLBACK = "(none: let the image alone guide the text)";

const DESCRIPTION_SAMPLING = { temperature: 0.2, maxOutputTokens: 800 } as const;
const CREATIVE_SAMPLING = { temperature: 0.7, maxOutputTokens: 1500 } as const;

function pick<T extends string>(allowed: readonly T[], value: unknown, fallback: T): T {
  return allowed.find((candidate) => candidate === value) ?? fallback;
}

/**
 * Maps loosely typed form values onto the option enums. Unknown values fall
 * back to the defaults rather than being rejected.
 */
export function normalizeOptions(raw: {
  tone?: unknown;
  length?: unknown;
  contentType?: unknown;
}): GenerationOptions {
  return {
    tone: pick(TONES, raw.tone, DEFAULT_OPTIONS.tone),
    length: pick(LENGTHS, raw.length, DEFAULT_OPTIONS.length),
    contentType: pick(CONTENT_TYPES, raw.contentType, DEFAULT_OPTIONS.contentType),
  };
}

/** The creative instruction text for a request. */
export function composePrompt(request: GenerationRequest): string {
  const query = request.prompt.trim() || EMPTY_PROMPT_FALLBACK;
  return [
    "You are given an image and a user prompt.",
    `Settings: tone=${request.tone}; length=${request.length}; content type=${request.contentType}`,
    "Task:",
    "1) Use the image as inspiration.",
    "2) Follow the user prompt closely.",
    `3) ${CONTENT_TYPE_GUIDE[request.contentType]}`,
    `4) ${TONE_GUIDE[request.tone]}`,
    `5) ${LENGTH_GUIDE[request.length]}`,
    "Output only the final text.",
    "",
    "User prompt:",
    query,
  ].join("\n");
}

export interface ComposedPayloads {
  description: ProviderPayload;
  creative: ProviderPayload;
}

function imagePart(image: Readonly<ImageInput>) {
  return { type: "image" as const, mimeType: image.mimeType, base64: image.base64 };
}

/**
 * Builds both payloads for a request.
 * Throws MissingInputError when no image (or an empty one) was supplied.
 */
export function composePayloads(request: GenerationRequest): ComposedPayloads {
  const { image } = request;
  if (!image || !image.base64) {
    throw new MissingInputError("Please upload an image first.");
  }

  return {
    description: {
      purpose: "description",
      parts: [{ type: "text", text: DESCRIPTION_PROMPT }, imagePart(image)],
      ...DESCRIPTION_SAMPLING,
    },
    creative: {
      purpose: "creative",
      parts: [{ type: "text", text: composePrompt(request) }, imagePart(image)],
      ...CREATIVE_SAMPLING,
    },
  };
}

const CONTENT_TYPE_LABELS: Record<ContentType, string> = {
  description: "description",
  story: "story",
  "blog-post": "blog post",
};

/** Lower-case noun for headings such as "Generated blog post". */
export function contentTypeLabel(contentType: ContentType): string {
  return CONTENT_TYPE_LABELS[contentType];
}
