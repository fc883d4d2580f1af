/**
 * Curation workflow: search → generate → review → publish/unpublish → reorder.
 *
 * Orchestrates the index client, both stores, the readability ranking and the
 * story generator. Holds no state of its own beyond the injected prompt; every
 * read goes to the stores.
 */

import {
  isPublished,
  snapshotMetadata,
  type Artifact,
  type PublishedArtifact,
} from "../artifacts/schema.js";
import { ConflictError, GenerationError, NotFoundError } from "../errors.js";
import type { GeneratedStory, StoryGenerator } from "../generation/index.js";
import { createQuietLogger, type Logger } from "../logging/index.js";
import { fillPrompt, type FixedPrompt } from "../prompts/index.js";
import type { PubMedClient } from "../pubmed/index.js";
import { rankByReadability, type RankedRecord } from "../ranking/readability.js";
import {
  isRecord,
  normalizeSearchTerm,
  type CanonicalRecord,
  type Query,
  type RecordOrSkipped,
} from "../records/schema.js";
import type { ArtifactStore, RecordStore } from "../storage/index.js";

export interface CurationWorkflowDeps {
  client: PubMedClient;
  records: RecordStore;
  artifacts: ArtifactStore;
  generator: StoryGenerator;
  /** Fixed newsroom prompt; each draft snapshots it with the study kernel filled in */
  prompt: FixedPrompt;
  /** Results requested per search when the caller names no limit */
  retmax: number;
  logger?: Logger;
}

export interface SearchResult extends RankedRecord {
  readonly hasArtifact: boolean;
  readonly isPublished: boolean;
}

export type SkippedItem = Extract<RecordOrSkipped, { kind: "skipped" }>;

export interface SearchOutcome {
  readonly query: Query;
  /** Eligible records, hardest first, unscorable last */
  readonly results: readonly SearchResult[];
  readonly skipped: readonly SkippedItem[];
}

export interface GenerateOptions {
  /** Replace an existing unpublished draft */
  overwrite?: boolean;
  /** Search that surfaced the record; looked up from stored queries when omitted */
  searchTerm?: string;
  searchRanAt?: Date;
}

export interface ReviewView {
  readonly artifact: Artifact;
  /** Current cached record, which may have changed since the snapshot */
  readonly record: CanonicalRecord | undefined;
}

export class CurationWorkflow {
  private readonly logger: Logger;

  constructor(private readonly deps: CurationWorkflowDeps) {
    this.logger = deps.logger ?? createQuietLogger("curation");
  }

  get prompt(): FixedPrompt {
    return this.deps.prompt;
  }

  /**
   * Run a search, cache every eligible record in one batch, store the query
   * and return the eligible records ranked by readability.
   */
  async search(term: string, options: { retmax?: number } = {}): Promise<SearchOutcome> {
    const normalized = normalizeSearchTerm(term);
    const retmax = options.retmax ?? this.deps.retmax;

    const eligible: CanonicalRecord[] = [];
    const skipped: SkippedItem[] = [];
    for await (const item of this.deps.client.search(normalized, { retmax })) {
      if (isRecord(item)) {
        eligible.push(item.record);
      } else {
        skipped.push(item);
      }
    }

    this.deps.records.upsertRecords(eligible);
    const query = this.deps.records.recordQuery(
      normalized,
      eligible.map((record) => record.pmid),
      retmax
    );

    const results = rankByReadability(eligible).map((ranked): SearchResult => {
      const artifact = this.deps.artifacts.getArtifact(ranked.record.pmid);
      return {
        ...ranked,
        hasArtifact: artifact !== undefined,
        isPublished: artifact !== undefined && isPublished(artifact),
      };
    });

    this.logger.info("Search complete", {
      term: normalized,
      eligible: eligible.length,
      skipped: skipped.length,
    });
    return { query, results, skipped };
  }

  /**
   * Generate a draft for a record. Conflicts are detected before the
   * generator is called; a generator failure leaves the store untouched.
   */
  async generate(pmid: string, options: GenerateOptions = {}): Promise<Artifact> {
    const overwrite = options.overwrite ?? false;
    const existing = this.deps.artifacts.getArtifact(pmid);
    if (existing !== undefined) {
      if (!overwrite) {
        throw new ConflictError(pmid, "exists");
      }
      if (isPublished(existing)) {
        throw new ConflictError(pmid, "published");
      }
    }

    const record = await this.loadRecord(pmid);
    const provenance =
      options.searchTerm === undefined
        ? this.deps.records.latestQueryFor(pmid, options.searchRanAt)
        : undefined;
    const metadata = snapshotMetadata(record, {
      term: options.searchTerm ?? provenance?.term,
      ranAt: options.searchRanAt ?? provenance?.createdAt,
    });
    const promptText = fillPrompt(this.deps.prompt.text, {
      pmid,
      abstract: record.abstract,
      metadata,
    });

    let generated: GeneratedStory;
    try {
      generated = await this.deps.generator.generate({
        pmid,
        promptText,
        abstract: record.abstract,
        metadata,
      });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.logger.error("Story generation failed", { pmid, error: err });
      throw new GenerationError(reason, pmid, { cause: err });
    }

    const artifact = this.deps.artifacts.createDraft(
      {
        pmid,
        headline: generated.headline,
        standfirst: generated.standfirst,
        story: generated.story,
        promptText,
        abstractSnapshot: record.abstract,
        metadataSnapshot: metadata,
      },
      { overwrite }
    );
    this.logger.info("Draft generated", { pmid, promptDigest: this.deps.prompt.digest });
    return artifact;
  }

  review(pmid: string): ReviewView {
    const artifact = this.deps.artifacts.getArtifact(pmid);
    if (artifact === undefined) {
      throw new NotFoundError("artifact", pmid);
    }
    return { artifact, record: this.deps.records.getRecord(pmid) };
  }

  publish(pmid: string, rank?: number): PublishedArtifact {
    return this.deps.artifacts.publish(pmid, rank);
  }

  unpublish(pmid: string): Artifact {
    return this.deps.artifacts.unpublish(pmid);
  }

  reorder(pmid: string, rank: number): PublishedArtifact {
    return this.deps.artifacts.reorder(pmid, rank);
  }

  /** Published artifacts in gallery order. */
  gallery(): PublishedArtifact[] {
    return this.deps.artifacts.listPublished();
  }

  /** Every artifact, published first. */
  artifacts(): Artifact[] {
    return this.deps.artifacts.listArtifacts();
  }

  /**
   * Cached record, or fetched from the index and cached when absent.
   */
  private async loadRecord(pmid: string): Promise<CanonicalRecord> {
    const cached = this.deps.records.getRecord(pmid);
    if (cached !== undefined) {
      return cached;
    }
    const [item] = await this.deps.client.fetchRecords([pmid]);
    if (item === undefined || !isRecord(item)) {
      throw new NotFoundError("record", pmid);
    }
    this.deps.records.upsertRecords([item.record]);
    return item.record;
  }
}
