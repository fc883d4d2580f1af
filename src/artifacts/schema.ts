/**
 * Artifact definitions.
 *
 * An artifact is keyed by the PMID of its source record. Prompt text, abstract
 * snapshot and metadata snapshot are captured when the draft is created and
 * never rewritten afterwards, so a published story keeps showing the
 * provenance it was generated from even after the record cache changes.
 */

import { z } from "zod";
import { PublicationDateSource, type CanonicalRecord } from "../records/schema.js";

export const StorySchema = z
  .object({
    paragraphs: z.array(z.string()),
    whatHappensNext: z.string(),
  })
  .strict();

export type Story = z.infer<typeof StorySchema>;

export const SearchSource = z.enum(["curator_search", "unknown"]);

export const MetadataSnapshotSchema = z.object({
  title: z.string(),
  journal: z.string(),
  year: z.string(),
  authors: z.array(z.string()),
  doi: z.string().nullable(),
  pmcid: z.string().nullable(),
  publicationDate: z.string(),
  publicationDateRaw: z.string(),
  publicationDateSource: PublicationDateSource,
  /** Search that surfaced the record, if known */
  searchTerm: z.string(),
  /** ISO timestamp of that search, or null */
  searchRanAt: z.string().datetime().nullable(),
  searchSource: SearchSource,
});

export type MetadataSnapshot = z.infer<typeof MetadataSnapshotSchema>;

export interface DraftInput {
  readonly pmid: string;
  readonly headline: string;
  readonly standfirst: string;
  readonly story: Story;
  /** Prompt exactly as sent to the generator, kernel filled in */
  readonly promptText: string;
  readonly abstractSnapshot: string;
  readonly metadataSnapshot: MetadataSnapshot;
}

export interface Artifact extends DraftInput {
  /** 1-based gallery position; null unless published */
  readonly featuredRank: number | null;
  readonly publishedAt: Date | null;
  readonly createdAt: Date;
}

export type PublishedArtifact = Artifact & {
  readonly featuredRank: number;
  readonly publishedAt: Date;
};

export function isPublished(artifact: Artifact): artifact is PublishedArtifact {
  return artifact.publishedAt !== null && artifact.featuredRank !== null;
}

/**
 * Capture record metadata as it is right now.
 */
export function snapshotMetadata(
  record: CanonicalRecord,
  search: { term?: string; ranAt?: Date } = {}
): MetadataSnapshot {
  const term = search.term?.trim() ?? "";
  return {
    title: record.title,
    journal: record.journal,
    year: record.year,
    authors: [...record.authors],
    doi: record.doi,
    pmcid: record.pmcid,
    publicationDate: record.publicationDate || record.year,
    publicationDateRaw: record.publicationDateRaw || record.year,
    publicationDateSource: record.publicationDateSource,
    searchTerm: term,
    searchRanAt: search.ranAt ? search.ranAt.toISOString() : null,
    searchSource: term ? "curator_search" : "unknown",
  };
}
