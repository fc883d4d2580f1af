/**
 * Newsroom prompt loader.
 *
 * The newsroom runs on a single fixed prompt. It is read from disk once at
 * startup, checked for the {kernel} placeholder, and passed around as an
 * immutable value. The curation workflow fills the placeholder per record
 * and snapshots the filled text on each draft.
 *
 * USAGE:
 *
 *   const prompt = loadPrompt("prompts/newsroom.txt");
 *   const workflow = new CurationWorkflow({ prompt, retmax: 20, ... });
 */

import { createHash } from "node:crypto";
import { existsSync, readFileSync } from "node:fs";
import { extname, resolve } from "node:path";

export const KERNEL_PLACEHOLDER = "{kernel}";

/** File extensions recognized as prompt templates. */
const PROMPT_EXTENSIONS = new Set([".md", ".txt"]);

export class PromptLoadError extends Error {
  constructor(
    public readonly filePath: string,
    message?: string
  ) {
    super(message ?? `Failed to load prompt: ${filePath}`);
    this.name = "PromptLoadError";
  }
}

export interface FixedPrompt {
  /** Template text, exactly as read */
  readonly text: string;
  /** Absolute path it was read from, or "inline" */
  readonly source: string;
  /** First 12 hex chars of the SHA-256 of `text` */
  readonly digest: string;
}

export function promptDigest(text: string): string {
  return createHash("sha256").update(text, "utf-8").digest("hex").slice(0, 12);
}

/**
 * Wrap prompt text already in memory. Throws PromptLoadError if the
 * placeholder is missing.
 */
export function createPrompt(text: string, source = "inline"): FixedPrompt {
  if (!text.includes(KERNEL_PLACEHOLDER)) {
    throw new PromptLoadError(
      source,
      `Prompt template is invalid: missing ${KERNEL_PLACEHOLDER} placeholder (${source})`
    );
  }
  return Object.freeze({ text, source, digest: promptDigest(text) });
}

/**
 * Read the fixed prompt from disk.
 */
export function loadPrompt(filePath: string): FixedPrompt {
  const resolved = resolve(filePath);
  if (!existsSync(resolved)) {
    throw new PromptLoadError(resolved, `Prompt file not found: ${resolved}`);
  }
  const ext = extname(resolved).toLowerCase();
  if (!PROMPT_EXTENSIONS.has(ext)) {
    throw new PromptLoadError(
      resolved,
      `Unsupported prompt extension "${ext}". Use: ${[...PROMPT_EXTENSIONS].join(", ")}`
    );
  }
  return createPrompt(readFileSync(resolved, "utf-8"), resolved);
}
