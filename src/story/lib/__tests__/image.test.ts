import { describe, it, expect } from "vitest";
import { parseDataUrl, readImageFile, resolveImageType } from "../image";
import { MissingInputError } from "@/shared/lib/errors";

describe("resolveImageType", () => {
  it("accepts the reported JPEG and PNG types", () => {
    expect(resolveImageType({ name: "a.jpg", type: "image/jpeg" })).toBe("image/jpeg");
    expect(resolveImageType({ name: "a.png", type: "image/png" })).toBe("image/png");
  });

  it("rejects other reported types even with an image extension", () => {
    expect(resolveImageType({ name: "a.png", type: "image/gif" })).toBeNull();
  });

  it("falls back to the extension when no type is reported", () => {
    expect(resolveImageType({ name: "Photo.JPEG", type: "" })).toBe("image/jpeg");
    expect(resolveImageType({ name: "scan.png", type: "" })).toBe("image/png");
    expect(resolveImageType({ name: "notes.txt", type: "" })).toBeNull();
    expect(resolveImageType({ name: "noextension", type: "" })).toBeNull();
  });
});

describe("parseDataUrl", () => {
  it("strips the data URI prefix", () => {
    expect(parseDataUrl("data:image/png;base64,iVBORw0KGgo=", "harbor.png", "image/png")).toEqual({
      filename: "harbor.png",
      mimeType: "image/png",
      base64: "iVBORw0KGgo=",
    });
  });

  it("throws an unreadable MissingInputError for an empty payload", () => {
    let caught: unknown;
    try {
      parseDataUrl("data:image/png;base64,", "empty.png", "image/png");
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(MissingInputError);
    expect(caught).toMatchObject({ reason: "unreadable" });
  });
});

describe("readImageFile", () => {
  it("rejects unsupported files before reading them", async () => {
    const file = new File(["GIF89a"], "anim.gif", { type: "image/gif" });

    await expect(readImageFile(file)).rejects.toMatchObject({
      name: "MissingInputError",
      reason: "unsupported",
      message: "Unsupported image type. Upload a JPG or PNG file.",
    });
  });
});
