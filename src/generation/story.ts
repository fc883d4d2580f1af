/**
 * Story normalization for text-generation output.
 */

import { z } from "zod";
import type { MetadataSnapshot, Story } from "../artifacts/schema.js";

export interface StoryRequest {
  readonly pmid: string;
  /** Newsroom prompt with the study kernel filled in; sent as is */
  readonly promptText: string;
  readonly abstract: string;
  readonly metadata: MetadataSnapshot;
}

export interface GeneratedStory {
  readonly headline: string;
  readonly standfirst: string;
  readonly story: Story;
}

/**
 * Text-generation provider.
 * Implementations throw on failure; the curation workflow reports any
 * rejection as a GenerationError.
 */
export interface StoryGenerator {
  generate(request: StoryRequest): Promise<GeneratedStory>;
}

export class StoryFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StoryFormatError";
  }
}

const RawStorySchema = z.object({
  headline: z.string().catch(""),
  standfirst: z.string().catch(""),
  story_paragraphs: z
    .union([z.string().transform((text) => [text]), z.array(z.unknown())])
    .catch([]),
  what_happens_next: z.string().catch(""),
});

/**
 * Coerce a model's JSON payload into a story. Missing headlines fall back to
 * the study title; blank paragraphs are dropped. Throws StoryFormatError when
 * the payload is not an object or has no paragraphs left.
 */
export function normalizeStory(data: unknown, fallbackTitle: string): GeneratedStory {
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new StoryFormatError("Model output is not a JSON object");
  }
  const raw = RawStorySchema.parse(data);

  const paragraphs = raw.story_paragraphs
    .filter((item) => item !== null && item !== undefined)
    .map((item) => String(item).trim())
    .filter(Boolean);
  if (paragraphs.length === 0) {
    throw new StoryFormatError("Model output has no story paragraphs");
  }

  return {
    headline: raw.headline.trim() || fallbackTitle,
    standfirst: raw.standfirst.trim(),
    story: {
      paragraphs,
      whatHappensNext: raw.what_happens_next.trim(),
    },
  };
}

/**
 * Parse model text as JSON and normalize it.
 */
export function parseStoryText(text: string, fallbackTitle: string): GeneratedStory {
  if (!text.trim()) {
    throw new StoryFormatError("Model returned an empty response");
  }
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    throw new StoryFormatError("Model returned invalid JSON");
  }
  return normalizeStory(data, fallbackTitle);
}
