/**
 * Durable cache of fetched records and the searches that produced them.
 *
 * Upserts are idempotent and atomic per batch: a batch is validated up front,
 * then written in one IMMEDIATE transaction. Either every record in the batch
 * is stored or none is, and a failure names the whole batch.
 */

import { and, desc, eq, inArray, lte } from "drizzle-orm";
import { RecordStoreError } from "../errors.js";
import { createQuietLogger, type Logger } from "../logging/index.js";
import {
  CanonicalRecordSchema,
  normalizeSearchTerm,
  type CanonicalRecord,
  type Query,
} from "../records/schema.js";
import type { NewsroomDatabase } from "./database.js";
import { queries, queryResults, records, type RecordRow } from "./schema.js";

export interface UpsertResult {
  readonly inserted: readonly string[];
  readonly updated: readonly string[];
  readonly unchanged: readonly string[];
}

export interface QueryProvenance {
  readonly term: string;
  readonly retmax: number;
  readonly createdAt: Date;
}

function toRecord(row: RecordRow): CanonicalRecord {
  return {
    pmid: row.pmid,
    title: row.title,
    abstract: row.abstract,
    journal: row.journal,
    year: row.year,
    authors: row.authors,
    doi: row.doi,
    pmcid: row.pmcid,
    publicationTypes: row.publicationTypes,
    publicationDate: row.publicationDate,
    publicationDateRaw: row.publicationDateRaw,
    publicationDateSource: row.publicationDateSource,
  };
}

/** Mutable columns of a record, in a fixed key order. */
function recordColumns(record: CanonicalRecord): Omit<CanonicalRecord, "pmid"> {
  return {
    title: record.title,
    abstract: record.abstract,
    journal: record.journal,
    year: record.year,
    authors: [...record.authors],
    doi: record.doi,
    pmcid: record.pmcid,
    publicationTypes: [...record.publicationTypes],
    publicationDate: record.publicationDate,
    publicationDateRaw: record.publicationDateRaw,
    publicationDateSource: record.publicationDateSource,
  };
}

function sameContent(a: CanonicalRecord, b: CanonicalRecord): boolean {
  return JSON.stringify(recordColumns(a)) === JSON.stringify(recordColumns(b));
}

export class RecordStore {
  constructor(
    private readonly db: NewsroomDatabase,
    private readonly logger: Logger = createQuietLogger("record-store"),
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Insert new records and overwrite changed ones. Re-writing identical
   * content changes nothing. Within one batch the last record for a PMID wins.
   */
  upsertRecords(batch: readonly CanonicalRecord[]): UpsertResult {
    const byId = new Map<string, CanonicalRecord>();
    for (const record of batch) {
      byId.set(record.pmid, record);
    }
    const ids = [...byId.keys()];
    if (ids.length === 0) {
      return { inserted: [], updated: [], unchanged: [] };
    }

    const invalid = [...byId.values()]
      .filter((record) => !CanonicalRecordSchema.safeParse(record).success)
      .map((record) => record.pmid);
    if (invalid.length > 0) {
      this.logger.error("Rejected record batch with ineligible records", { invalid });
      throw new RecordStoreError(ids);
    }

    const timestamp = this.now();
    let result: UpsertResult;
    try {
      result = this.db.transaction(
        (tx) => {
          const existing = new Map(
            tx
              .select()
              .from(records)
              .where(inArray(records.pmid, ids))
              .all()
              .map((row) => [row.pmid, toRecord(row)] as const)
          );

          const inserted: string[] = [];
          const updated: string[] = [];
          const unchanged: string[] = [];

          for (const record of byId.values()) {
            const current = existing.get(record.pmid);
            if (current === undefined) {
              tx.insert(records)
                .values({
                  pmid: record.pmid,
                  ...recordColumns(record),
                  createdAt: timestamp,
                  updatedAt: timestamp,
                })
                .run();
              inserted.push(record.pmid);
            } else if (sameContent(current, record)) {
              unchanged.push(record.pmid);
            } else {
              tx.update(records)
                .set({ ...recordColumns(record), updatedAt: timestamp })
                .where(eq(records.pmid, record.pmid))
                .run();
              updated.push(record.pmid);
            }
          }

          return { inserted, updated, unchanged };
        },
        { behavior: "immediate" }
      );
    } catch (err) {
      this.logger.error("Record batch rolled back", { count: ids.length, error: err });
      throw new RecordStoreError(ids, { cause: err });
    }

    this.logger.debug("Cached records", {
      inserted: result.inserted.length,
      updated: result.updated.length,
      unchanged: result.unchanged.length,
    });
    return result;
  }

  getRecord(pmid: string): CanonicalRecord | undefined {
    const row = this.db.select().from(records).where(eq(records.pmid, pmid)).get();
    return row ? toRecord(row) : undefined;
  }

  getRecords(pmids: readonly string[]): Map<string, CanonicalRecord> {
    if (pmids.length === 0) {
      return new Map();
    }
    const rows = this.db
      .select()
      .from(records)
      .where(inArray(records.pmid, [...new Set(pmids)]))
      .all();
    return new Map(rows.map((row) => [row.pmid, toRecord(row)]));
  }

  /**
   * Store a search execution and the PMIDs it returned, in order.
   */
  recordQuery(term: string, resultIds: readonly string[], retmax = resultIds.length): Query {
    const normalized = normalizeSearchTerm(term);
    const ids = [...new Set(resultIds)];
    const createdAt = this.now();

    const id = this.db.transaction(
      (tx) => {
        const [row] = tx
          .insert(queries)
          .values({ term: normalized, retmax, createdAt })
          .returning({ id: queries.id })
          .all();
        if (row === undefined) {
          throw new Error(`Query insert returned no row for "${normalized}"`);
        }
        if (ids.length > 0) {
          tx.insert(queryResults)
            .values(ids.map((pmid, position) => ({ queryId: row.id, pmid, position })))
            .run();
        }
        return row.id;
      },
      { behavior: "immediate" }
    );

    return { id, term: normalized, retmax, createdAt, resultIds: ids };
  }

  /**
   * Most recent search whose results included `pmid`, optionally limited to
   * searches at or before `before`. Falls back to the latest search overall
   * when nothing precedes `before`.
   */
  latestQueryFor(pmid: string, before?: Date): QueryProvenance | undefined {
    const find = (limit?: Date) =>
      this.db
        .select({ term: queries.term, retmax: queries.retmax, createdAt: queries.createdAt })
        .from(queries)
        .innerJoin(queryResults, eq(queryResults.queryId, queries.id))
        .where(
          limit === undefined
            ? eq(queryResults.pmid, pmid)
            : and(eq(queryResults.pmid, pmid), lte(queries.createdAt, limit))
        )
        .orderBy(desc(queries.createdAt), desc(queries.id))
        .limit(1)
        .get();

    return (before === undefined ? undefined : find(before)) ?? find();
  }
}
