/**
 * Canonical literature record and query definitions.
 *
 * A record is only cached or displayed when title, abstract, journal and year
 * are all present. Parsers report ineligible items as `skipped` results rather
 * than throwing, so filtering stays explicit at every call site.
 */

import { z } from "zod";

const nonBlank = z.string().trim().min(1);

export const PublicationDateSource = z.enum([
  "electronic_pub_date",
  "journal_issue_pub_date",
  "unknown",
]);

export type PublicationDateSource = z.infer<typeof PublicationDateSource>;

export const CanonicalRecordSchema = z
  .object({
    /** PubMed identifier; primary key */
    pmid: z.string().regex(/^\d+$/),
    title: nonBlank,
    abstract: nonBlank,
    journal: nonBlank,
    /** Publication year as printed (usually four digits) */
    year: nonBlank,
    /** Ordered author names; collective names included verbatim */
    authors: z.array(z.string()),
    doi: z.string().min(1).nullable(),
    /** PubMed Central identifier, always "PMC" prefixed */
    pmcid: z.string().startsWith("PMC").nullable(),
    publicationTypes: z.array(z.string()),
    /** YYYY, YYYY-MM or YYYY-MM-DD; empty when unknown */
    publicationDate: z.string(),
    publicationDateRaw: z.string(),
    publicationDateSource: PublicationDateSource,
  })
  .strict();

export type CanonicalRecord = z.infer<typeof CanonicalRecordSchema>;

/** Fields whose absence makes a record ineligible. */
export const REQUIRED_RECORD_FIELDS = ["title", "abstract", "journal", "year"] as const;

export type RequiredRecordField = (typeof REQUIRED_RECORD_FIELDS)[number];

export type SkipReason = "missing_fields" | "missing" | "invalid_id";

/**
 * Outcome of normalizing one index item.
 */
export type RecordOrSkipped =
  | { readonly kind: "record"; readonly record: CanonicalRecord }
  | {
      readonly kind: "skipped";
      readonly id: string;
      readonly reason: SkipReason;
      readonly missingFields: readonly RequiredRecordField[];
    };

export function isRecord(
  item: RecordOrSkipped
): item is Extract<RecordOrSkipped, { kind: "record" }> {
  return item.kind === "record";
}

/**
 * One executed search, with the identifiers it returned in index order.
 */
export interface Query {
  readonly id: number;
  readonly term: string;
  readonly retmax: number;
  readonly createdAt: Date;
  readonly resultIds: readonly string[];
}

/**
 * Normalize a free-text search term: trim and collapse inner whitespace.
 */
export function normalizeSearchTerm(term: string): string {
  return term.trim().replace(/\s+/g, " ");
}
