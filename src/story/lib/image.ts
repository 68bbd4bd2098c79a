import type { SupportedImageType } from "@/shared/lib/llm/types";
import { MissingInputError } from "@/shared/lib/errors";
import type { ImageInput } from "./types";

export const ACCEPTED_IMAGE_TYPES: readonly SupportedImageType[] = ["image/jpeg", "image/png"];

/** Value for the file input's accept attribute. */
export const IMAGE_ACCEPT = ".jpg,.jpeg,.png,image/jpeg,image/png";

const EXTENSION_TYPES: Record<string, SupportedImageType> = {
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
  png: "image/png",
};

/**
 * Resolves the image type from the browser-reported MIME type, falling back to
 * the file extension (some platforms report an empty type for dropped files).
 * Returns null for anything other than JPEG or PNG.
 */
export function resolveImageType(file: { name: string; type: string }): SupportedImageType | null {
  const reported = ACCEPTED_IMAGE_TYPES.find((t) => t === file.type);
  if (reported) return reported;
  if (file.type) return null;
  const ext = file.name.split(".").pop()?.toLowerCase() ?? "";
  return EXTENSION_TYPES[ext] ?? null;
}

const DATA_URL = /^data:([^;,]*)(?:;[^,]*)?;base64,(.*)$/s;

/**
 * Splits a FileReader data URL into an ImageInput.
 * Throws MissingInputError("unreadable") when the URL carries no payload.
 */
export function parseDataUrl(
  dataUrl: string,
  filename: string,
  mimeType: SupportedImageType
): ImageInput {
  const match = DATA_URL.exec(dataUrl);
  const base64 = match?.[2] ?? "";
  if (!base64) {
    throw new MissingInputError("Could not read the image. Try another file.", "unreadable");
  }
  return { filename, mimeType, base64 };
}

/**
 * Reads a user-selected file into an ImageInput.
 * Rejects with MissingInputError for unsupported or unreadable files.
 */
export function readImageFile(file: File): Promise<ImageInput> {
  const mimeType = resolveImageType(file);
  if (!mimeType) {
    return Promise.reject(
      new MissingInputError("Unsupported image type. Upload a JPG or PNG file.", "unsupported")
    );
  }

  return new Promise<ImageInput>((resolve, reject) => {
    const reader = new FileReader();
    reader.onload = () => {
      const result = reader.result;
      if (typeof result !== "string") {
        reject(new MissingInputError("Could not read the image. Try another file.", "unreadable"));
        return;
      }
      try {
        resolve(parseDataUrl(result, file.name, mimeType));
      } catch (err) {
        reject(err);
      }
    };
    reader.onerror = () =>
      reject(
        new MissingInputError("Could not read the image. Try another file.", "unreadable")
      );
    reader.readAsDataURL(file);
  });
}
