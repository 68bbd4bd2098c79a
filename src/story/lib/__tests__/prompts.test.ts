import { describe, it, expect } from "vitest";
import {
  composePayloads,
  composePrompt,
  contentTypeLabel,
  DESCRIPTION_PROMPT,
  EMPTY_PROMPT_FALLBACK,
  normalizeOptions,
} from "../prompts";
import { CONTENT_TYPES, LENGTHS, TONES } from "../types";
import { MissingInputError } from "@/shared/lib/errors";
import { TEST_IMAGE, makeRequest, payloadText } from "./fixtures";

describe("composePrompt", () => {
  it("fills the template with the selected options and trimmed prompt", () => {
    const prompt = composePrompt(makeRequest({ prompt: "  A lighthouse keeper  " }));

    expect(prompt).toBe(
      [
        "You are given an image and a user prompt.",
        "Settings: tone=poetic; length=short; content type=story",
        "Task:",
        "1) Use the image as inspiration.",
        "2) Follow the user prompt closely.",
        "3) Write a narrative story with a beginning, middle, and end.",
        "4) Write in a poetic and reflective tone.",
        "5) Keep it concise (about 150-250 words).",
        "Output only the final text.",
        "",
        "User prompt:",
        "A lighthouse keeper",
      ].join("\n")
    );
  });

  it("uses the fallback line when the prompt is blank", () => {
    const prompt = composePrompt(makeRequest({ prompt: "   " }));
    expect(prompt.split("\n").pop()).toBe(EMPTY_PROMPT_FALLBACK);
  });

  it("picks the blog guide for blog-post", () => {
    const prompt = composePrompt(makeRequest({ contentType: "blog-post" }));
    expect(prompt).toContain(
      "3) Write a blog-style piece with a hook, clear structure, and a takeaway."
    );
  });

  it("contains every option combination verbatim", () => {
    for (const tone of TONES) {
      for (const length of LENGTHS) {
        for (const contentType of CONTENT_TYPES) {
          const prompt = composePrompt(makeRequest({ tone, length, contentType }));
          expect(prompt).toContain(`tone=${tone}`);
          expect(prompt).toContain(`length=${length}`);
          expect(prompt).toContain(`content type=${contentType}`);
        }
      }
    }
  });
});

describe("composePayloads", () => {
  it("throws MissingInputError when no image is supplied", () => {
    expect(() => composePayloads(makeRequest({ image: null }))).toThrow(MissingInputError);
  });

  it("throws MissingInputError when the image has no bytes", () => {
    expect(() =>
      composePayloads(makeRequest({ image: { ...TEST_IMAGE, base64: "" } }))
    ).toThrow("Please upload an image first.");
  });

  it("builds the description payload with low temperature", () => {
    const { description } = composePayloads(makeRequest());

    expect(description).toEqual({
      purpose: "description",
      parts: [
        { type: "text", text: DESCRIPTION_PROMPT },
        { type: "image", mimeType: "image/png", base64: "iVBORw0KGgo=" },
      ],
      temperature: 0.2,
      maxOutputTokens: 800,
    });
  });

  it("builds the creative payload from the composed prompt", () => {
    const request = makeRequest();
    const { creative } = composePayloads(request);

    expect(creative.purpose).toBe("creative");
    expect(creative.temperature).toBe(0.7);
    expect(creative.maxOutputTokens).toBe(1500);
    expect(payloadText(creative)).toBe(composePrompt(request));
    expect(creative.parts[1]).toEqual({
      type: "image",
      mimeType: "image/png",
      base64: "iVBORw0KGgo=",
    });
  });

  it("includes poetic, short and story literally", () => {
    const text = payloadText(composePayloads(makeRequest()).creative);
    expect(text).toContain("poetic");
    expect(text).toContain("short");
    expect(text).toContain("story");
  });
});

describe("normalizeOptions", () => {
  it("keeps known values", () => {
    expect(normalizeOptions({ tone: "academic", length: "long", contentType: "blog-post" })).toEqual({
      tone: "academic",
      length: "long",
      contentType: "blog-post",
    });
  });

  it("falls back to defaults for unknown or missing values", () => {
    expect(normalizeOptions({ tone: "Sarcastic", length: 42 })).toEqual({
      tone: "neutral",
      length: "medium",
      contentType: "story",
    });
  });
});

describe("contentTypeLabel", () => {
  it("spells blog-post as two words", () => {
    expect(contentTypeLabel("blog-post")).toBe("blog post");
    expect(contentTypeLabel("story")).toBe("story");
  });
});
