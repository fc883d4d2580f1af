/**
 * SQLite schema for the record cache and the artifact gallery.
 */

import { index, integer, primaryKey, sqliteTable, text } from "drizzle-orm/sqlite-core";
import type { MetadataSnapshot, Story } from "../artifacts/schema.js";

// ─── Queries (search provenance) ──────────────────────────
export const queries = sqliteTable("queries", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  term: text("term").notNull(),
  retmax: integer("retmax").notNull(),
  createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull(),
});

// ─── Query <-> PMID, in result order ──────────────────────
export const queryResults = sqliteTable(
  "query_results",
  {
    queryId: integer("query_id")
      .notNull()
      .references(() => queries.id),
    pmid: text("pmid").notNull(),
    position: integer("position").notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.queryId, table.pmid] }),
    pmidIdx: index("query_results_pmid_idx").on(table.pmid),
  })
);

// ─── Records (cached literature items) ────────────────────
export const records = sqliteTable("records", {
  pmid: text("pmid").primaryKey(),
  title: text("title").notNull(),
  abstract: text("abstract").notNull(),
  journal: text("journal").notNull(),
  year: text("year").notNull(),
  authors: text("authors_json", { mode: "json" }).notNull().$type<string[]>(),
  doi: text("doi"),
  pmcid: text("pmcid"),
  publicationTypes: text("publication_types_json", { mode: "json" }).notNull().$type<string[]>(),
  publicationDate: text("publication_date").notNull(),
  publicationDateRaw: text("publication_date_raw").notNull(),
  publicationDateSource: text("publication_date_source", {
    enum: ["electronic_pub_date", "journal_issue_pub_date", "unknown"],
  }).notNull(),
  createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull(),
  updatedAt: integer("updated_at", { mode: "timestamp_ms" }).notNull(),
});

// ─── Artifacts (drafts and published stories) ─────────────
// featured_rank and published_at are both set or both null.
export const artifacts = sqliteTable(
  "artifacts",
  {
    pmid: text("pmid").primaryKey(),
    headline: text("headline").notNull(),
    standfirst: text("standfirst").notNull(),
    story: text("story", { mode: "json" }).notNull().$type<Story>(),
    promptText: text("prompt_text").notNull(),
    abstractSnapshot: text("abstract_snapshot").notNull(),
    metadataSnapshot: text("metadata_snapshot", { mode: "json" }).notNull().$type<MetadataSnapshot>(),
    featuredRank: integer("featured_rank"),
    publishedAt: integer("published_at", { mode: "timestamp_ms" }),
    createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull(),
  },
  (table) => ({
    rankIdx: index("artifacts_featured_rank_idx").on(table.featuredRank),
  })
);

export type RecordRow = typeof records.$inferSelect;
export type ArtifactRow = typeof artifacts.$inferSelect;
