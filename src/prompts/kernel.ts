/**
 * Study kernel: the record summary substituted into the newsroom prompt.
 */

import type { MetadataSnapshot } from "../artifacts/schema.js";
import { KERNEL_PLACEHOLDER } from "./loader.js";

/** Authors listed in the kernel before truncation. */
export const KERNEL_AUTHOR_LIMIT = 6;

export interface KernelInput {
  readonly pmid: string;
  readonly abstract: string;
  readonly metadata: Pick<MetadataSnapshot, "title" | "journal" | "year" | "authors">;
}

export function renderKernel({ pmid, abstract, metadata }: KernelInput): string {
  return [
    `Title: ${metadata.title}`,
    `Journal: ${metadata.journal}`,
    `Year: ${metadata.year}`,
    `Authors: ${metadata.authors.slice(0, KERNEL_AUTHOR_LIMIT).join(", ")}`,
    `PMID: ${pmid}`,
    "Abstract:",
    abstract,
  ]
    .join("\n")
    .trim();
}

/**
 * Substitute the kernel for every placeholder in the prompt text.
 */
export function fillPrompt(promptText: string, input: KernelInput): string {
  return promptText.split(KERNEL_PLACEHOLDER).join(renderKernel(input));
}
