import type { SupportedImageType } from "@/shared/lib/llm/types";

export const TONES = ["neutral", "academic", "playful", "poetic"] as const;
export const LENGTHS = ["short", "medium", "long"] as const;
export const CONTENT_TYPES = ["description", "story", "blog-post"] as const;

export type Tone = (typeof TONES)[number];
export type Length = (typeof LENGTHS)[number];
export type ContentType = (typeof CONTENT_TYPES)[number];

export interface ImageInput {
  filename: string;
  mimeType: SupportedImageType;
  /** Raw base64 payload, without the "data:<mime>;base64," prefix. */
  base64: string;
}

export interface GenerationOptions {
  tone: Tone;
  length: Length;
  contentType: ContentType;
}

export interface GenerationRequest extends Readonly<GenerationOptions> {
  /** Null when the user pressed Generate without uploading an image. */
  readonly image: Readonly<ImageInput> | null;
  /** Free-text prompt; may be empty. */
  readonly prompt: string;
}

export interface GenerationResult {
  readonly id: string;
  /** ISO-8601 UTC time the provider responses were received. */
  readonly timestamp: string;
  readonly filename: string;
  readonly tone: Tone;
  readonly length: Length;
  readonly contentType: ContentType;
  readonly prompt: string;
  readonly imageDescription: string;
  readonly generatedText: string;
}
