/**
 * SQLite connection for the record and artifact stores.
 */

import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";

export type NewsroomDatabase = BetterSQLite3Database;

/** DDL applied on open; mirrors the drizzle tables in schema.ts. */
const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS queries (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  term TEXT NOT NULL,
  retmax INTEGER NOT NULL,
  created_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS query_results (
  query_id INTEGER NOT NULL REFERENCES queries(id),
  pmid TEXT NOT NULL,
  position INTEGER NOT NULL,
  PRIMARY KEY (query_id, pmid)
);

CREATE INDEX IF NOT EXISTS query_results_pmid_idx ON query_results (pmid);

CREATE TABLE IF NOT EXISTS records (
  pmid TEXT PRIMARY KEY,
  title TEXT NOT NULL,
  abstract TEXT NOT NULL,
  journal TEXT NOT NULL,
  year TEXT NOT NULL,
  authors_json TEXT NOT NULL,
  doi TEXT,
  pmcid TEXT,
  publication_types_json TEXT NOT NULL,
  publication_date TEXT NOT NULL,
  publication_date_raw TEXT NOT NULL,
  publication_date_source TEXT NOT NULL,
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS artifacts (
  pmid TEXT PRIMARY KEY,
  headline TEXT NOT NULL,
  standfirst TEXT NOT NULL,
  story TEXT NOT NULL,
  prompt_text TEXT NOT NULL,
  abstract_snapshot TEXT NOT NULL,
  metadata_snapshot TEXT NOT NULL,
  featured_rank INTEGER,
  published_at INTEGER,
  created_at INTEGER NOT NULL,
  CHECK ((featured_rank IS NULL) = (published_at IS NULL))
);

CREATE INDEX IF NOT EXISTS artifacts_featured_rank_idx ON artifacts (featured_rank);
`;

export interface DatabaseHandle {
  readonly db: NewsroomDatabase;
  readonly sqlite: Database.Database;
  close(): void;
}

/**
 * Open (creating if needed) the database at `path`. Pass ":memory:" for a
 * throwaway database.
 */
export function openDatabase(path: string): DatabaseHandle {
  if (path !== ":memory:") {
    mkdirSync(dirname(path), { recursive: true });
  }
  const sqlite = new Database(path);
  sqlite.pragma("journal_mode = WAL");
  sqlite.pragma("foreign_keys = ON");
  sqlite.pragma("busy_timeout = 30000");
  sqlite.exec(SCHEMA_SQL);

  return {
    db: drizzle(sqlite),
    sqlite,
    close: () => sqlite.close(),
  };
}
