/**
 * Drafts and published artifacts, with the gallery ordering.
 *
 * Published artifacts carry featured ranks forming a dense 1..N sequence.
 * Every mutation runs as one IMMEDIATE transaction that shifts neighbouring
 * ranks, writes the target row, and re-checks density before committing; a
 * non-dense result throws ConsistencyViolationError and rolls back, so
 * readers only ever see dense orderings.
 */

import { and, asc, count, desc, eq, gt, gte, isNotNull, isNull, sql } from "drizzle-orm";
import type { Artifact, DraftInput, PublishedArtifact } from "../artifacts/schema.js";
import { isPublished } from "../artifacts/schema.js";
import {
  ConflictError,
  ConsistencyViolationError,
  InvalidRankError,
  NotFoundError,
} from "../errors.js";
import { createQuietLogger, type Logger } from "../logging/index.js";
import type { NewsroomDatabase } from "./database.js";
import { artifacts, type ArtifactRow } from "./schema.js";

type Transaction = Parameters<Parameters<NewsroomDatabase["transaction"]>[0]>[0];
type Reader = Pick<NewsroomDatabase, "select">;

export interface CreateDraftOptions {
  /** Replace an existing unpublished artifact */
  overwrite?: boolean;
}

/** Rank held by an artifact while it is being moved inside a transaction. */
const PARKED_RANK = 0;

function toArtifact(row: ArtifactRow): Artifact {
  return {
    pmid: row.pmid,
    headline: row.headline,
    standfirst: row.standfirst,
    story: row.story,
    promptText: row.promptText,
    abstractSnapshot: row.abstractSnapshot,
    metadataSnapshot: row.metadataSnapshot,
    featuredRank: row.featuredRank,
    publishedAt: row.publishedAt,
    createdAt: row.createdAt,
  };
}

function requirePublished(artifact: Artifact): PublishedArtifact {
  if (!isPublished(artifact)) {
    throw new NotFoundError("publication", artifact.pmid);
  }
  return artifact;
}

/**
 * Validate a requested rank and clamp it to `max`.
 */
export function resolveRank(rank: number | undefined, max: number): number {
  if (rank === undefined) {
    return max;
  }
  if (!Number.isInteger(rank) || rank < 1) {
    throw new InvalidRankError(rank);
  }
  return Math.min(rank, max);
}

/**
 * Throw unless `ranks` (in ascending order) is exactly 1..N.
 */
export function assertDenseRanks(ranks: readonly (number | null)[]): void {
  const dense = ranks.every((rank, index) => rank === index + 1);
  if (!dense) {
    throw new ConsistencyViolationError(ranks.map((rank) => rank ?? -1));
  }
}

export class ArtifactStore {
  constructor(
    private readonly db: NewsroomDatabase,
    private readonly logger: Logger = createQuietLogger("artifact-store"),
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Create a draft. Fails with ConflictError when an artifact exists, unless
   * `overwrite` is set and the existing artifact is not published.
   */
  createDraft(input: DraftInput, options: CreateDraftOptions = {}): Artifact {
    const artifact = this.mutate((tx) => {
      const existing = this.find(tx, input.pmid);
      const values = {
        headline: input.headline,
        standfirst: input.standfirst,
        story: input.story,
        promptText: input.promptText,
        abstractSnapshot: input.abstractSnapshot,
        metadataSnapshot: input.metadataSnapshot,
        featuredRank: null,
        publishedAt: null,
        createdAt: this.now(),
      };

      if (existing === undefined) {
        tx.insert(artifacts).values({ pmid: input.pmid, ...values }).run();
      } else if (!options.overwrite) {
        throw new ConflictError(input.pmid, "exists");
      } else if (isPublished(existing)) {
        throw new ConflictError(input.pmid, "published");
      } else {
        tx.update(artifacts).set(values).where(eq(artifacts.pmid, input.pmid)).run();
      }
      return this.get(tx, input.pmid);
    });

    this.logger.info("Draft saved", { pmid: input.pmid, overwrite: options.overwrite ?? false });
    return artifact;
  }

  getArtifact(pmid: string): Artifact | undefined {
    return this.find(this.db, pmid);
  }

  /**
   * Published artifacts in gallery order: rank ascending, then earliest
   * publish time.
   */
  listPublished(): PublishedArtifact[] {
    return this.db
      .select()
      .from(artifacts)
      .where(isNotNull(artifacts.publishedAt))
      .orderBy(asc(artifacts.featuredRank), asc(artifacts.publishedAt))
      .all()
      .map(toArtifact)
      .filter(isPublished);
  }

  /**
   * Every artifact: published in gallery order, then drafts newest first.
   */
  listArtifacts(): Artifact[] {
    const drafts = this.db
      .select()
      .from(artifacts)
      .where(isNull(artifacts.publishedAt))
      .orderBy(desc(artifacts.createdAt))
      .all()
      .map(toArtifact);
    return [...this.listPublished(), ...drafts];
  }

  /**
   * Publish at `rank` (default: end of the gallery). Artifacts at or after
   * that rank move down one place. Publishing an already published artifact
   * moves it to `rank` (or leaves it in place) and keeps its publish time.
   */
  publish(pmid: string, rank?: number): PublishedArtifact {
    const published = this.mutate((tx) => {
      const artifact = this.find(tx, pmid);
      if (artifact === undefined) {
        throw new NotFoundError("artifact", pmid);
      }
      if (isPublished(artifact)) {
        return rank === undefined
          ? artifact
          : this.move(tx, artifact, resolveRank(rank, this.countPublished(tx)));
      }

      const target = resolveRank(rank, this.countPublished(tx) + 1);
      this.openGap(tx, target);
      tx.update(artifacts)
        .set({ featuredRank: target, publishedAt: this.now() })
        .where(eq(artifacts.pmid, pmid))
        .run();
      return requirePublished(this.get(tx, pmid));
    });

    this.logger.info("Artifact published", { pmid, rank: published.featuredRank });
    return published;
  }

  /**
   * Withdraw a published artifact; later ranks move up one place.
   */
  unpublish(pmid: string): Artifact {
    const artifact = this.mutate((tx) => {
      const current = this.find(tx, pmid);
      if (current === undefined || !isPublished(current)) {
        throw new NotFoundError("publication", pmid);
      }
      tx.update(artifacts)
        .set({ featuredRank: null, publishedAt: null })
        .where(eq(artifacts.pmid, pmid))
        .run();
      this.closeGap(tx, current.featuredRank);
      return this.get(tx, pmid);
    });

    this.logger.info("Artifact unpublished", { pmid });
    return artifact;
  }

  /**
   * Move a published artifact to `newRank` (clamped to the gallery size).
   */
  reorder(pmid: string, newRank: number): PublishedArtifact {
    const moved = this.mutate((tx) => {
      const current = this.find(tx, pmid);
      if (current === undefined || !isPublished(current)) {
        throw new NotFoundError("publication", pmid);
      }
      return this.move(tx, current, resolveRank(newRank, this.countPublished(tx)));
    });

    this.logger.info("Artifact reordered", { pmid, rank: moved.featuredRank });
    return moved;
  }

  /**
   * Check that published ranks are dense. Throws ConsistencyViolationError.
   */
  verifyRanks(): void {
    this.checkDensity(this.db);
  }

  // ─── internals ───────────────────────────────────────────

  /**
   * Run `fn` in one IMMEDIATE transaction and verify rank density before commit.
   */
  private mutate<T>(fn: (tx: Transaction) => T): T {
    return this.db.transaction(
      (tx) => {
        const result = fn(tx);
        this.checkDensity(tx);
        return result;
      },
      { behavior: "immediate" }
    );
  }

  private move(tx: Transaction, artifact: PublishedArtifact, target: number): PublishedArtifact {
    if (artifact.featuredRank === target) {
      return artifact;
    }
    tx.update(artifacts)
      .set({ featuredRank: PARKED_RANK })
      .where(eq(artifacts.pmid, artifact.pmid))
      .run();
    this.closeGap(tx, artifact.featuredRank);
    this.openGap(tx, target);
    tx.update(artifacts)
      .set({ featuredRank: target })
      .where(eq(artifacts.pmid, artifact.pmid))
      .run();
    return requirePublished(this.get(tx, artifact.pmid));
  }

  /** Shift every published rank >= `rank` down by one. */
  private openGap(tx: Transaction, rank: number): void {
    tx.update(artifacts)
      .set({ featuredRank: sql`${artifacts.featuredRank} + 1` })
      .where(and(isNotNull(artifacts.publishedAt), gte(artifacts.featuredRank, rank)))
      .run();
  }

  /** Shift every published rank > `rank` up by one. */
  private closeGap(tx: Transaction, rank: number): void {
    tx.update(artifacts)
      .set({ featuredRank: sql`${artifacts.featuredRank} - 1` })
      .where(and(isNotNull(artifacts.publishedAt), gt(artifacts.featuredRank, rank)))
      .run();
  }

  private countPublished(tx: Reader): number {
    const row = tx
      .select({ value: count() })
      .from(artifacts)
      .where(isNotNull(artifacts.publishedAt))
      .get();
    return row?.value ?? 0;
  }

  private checkDensity(reader: Reader): void {
    const rows = reader
      .select({ rank: artifacts.featuredRank })
      .from(artifacts)
      .where(isNotNull(artifacts.publishedAt))
      .orderBy(asc(artifacts.featuredRank))
      .all();
    assertDenseRanks(rows.map((row) => row.rank));
  }

  private find(reader: Reader, pmid: string): Artifact | undefined {
    const row = reader.select().from(artifacts).where(eq(artifacts.pmid, pmid)).get();
    return row ? toArtifact(row) : undefined;
  }

  private get(reader: Reader, pmid: string): Artifact {
    const artifact = this.find(reader, pmid);
    if (artifact === undefined) {
      throw new NotFoundError("artifact", pmid);
    }
    return artifact;
  }
}
