/**
 * Error taxonomy for the curation core.
 *
 * Records that fail the eligibility filter are not errors: the index client
 * reports them as `skipped` results. Everything here is surfaced to the
 * operator through `userMessage()`.
 */

export type CurationErrorCode =
  | "fetch_failed"
  | "conflict"
  | "not_found"
  | "generation_failed"
  | "invalid_rank"
  | "consistency_violation"
  | "record_store_failed";

export abstract class CurationError extends Error {
  abstract readonly code: CurationErrorCode;

  /** Message suitable for showing to the curating operator. */
  abstract userMessage(): string;
}

/**
 * Literature index request failed (network, timeout, HTTP status or payload).
 */
export class FetchError extends CurationError {
  readonly code = "fetch_failed";

  constructor(
    message: string,
    public readonly transient: boolean,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "FetchError";
  }

  userMessage(): string {
    return this.transient
      ? "PubMed request failed. Check the network connection and try again."
      : `PubMed rejected the request (${this.message}).`;
  }
}

export type ArtifactEntity = "record" | "artifact" | "publication";

/**
 * Operation targeted a record, artifact or publication that does not exist.
 */
export class NotFoundError extends CurationError {
  readonly code = "not_found";

  constructor(
    public readonly entity: ArtifactEntity,
    public readonly id: string
  ) {
    super(
      entity === "publication"
        ? `Artifact ${id} is not published`
        : `No ${entity} found for PMID ${id}`
    );
    this.name = "NotFoundError";
  }

  userMessage(): string {
    return this.message + ".";
  }
}

/**
 * A draft already exists and overwrite was not requested, or the existing
 * artifact is published and must be unpublished first.
 */
export class ConflictError extends CurationError {
  readonly code = "conflict";

  constructor(
    public readonly id: string,
    public readonly reason: "exists" | "published"
  ) {
    super(
      reason === "exists"
        ? `An artifact already exists for PMID ${id}`
        : `Artifact ${id} is published; unpublish it before regenerating`
    );
    this.name = "ConflictError";
  }

  userMessage(): string {
    return this.reason === "exists"
      ? `${this.message}. Regenerate to replace it.`
      : this.message + ".";
  }
}

/**
 * Text generation provider failed; no draft was written.
 */
export class GenerationError extends CurationError {
  readonly code = "generation_failed";

  constructor(
    message: string,
    public readonly id: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "GenerationError";
  }

  userMessage(): string {
    return `Story generation failed for PMID ${this.id}: ${this.message}. Try again.`;
  }
}

/**
 * Requested featured rank is below the gallery's base rank.
 */
export class InvalidRankError extends CurationError {
  readonly code = "invalid_rank";

  constructor(public readonly rank: number) {
    super(`Featured rank must be a positive integer, got ${rank}`);
    this.name = "InvalidRankError";
  }

  userMessage(): string {
    return this.message + ".";
  }
}

/**
 * Published ranks stopped forming a dense 1..N sequence.
 * Raised inside the store transaction, which is rolled back.
 */
export class ConsistencyViolationError extends CurationError {
  readonly code = "consistency_violation";

  constructor(public readonly ranks: readonly number[]) {
    super(`Published ranks are not dense: [${ranks.join(", ")}]`);
    this.name = "ConsistencyViolationError";
  }

  userMessage(): string {
    return "The gallery ordering could not be updated. No changes were saved.";
  }
}

/**
 * A record batch could not be written; nothing from the batch was stored.
 */
export class RecordStoreError extends CurationError {
  readonly code = "record_store_failed";

  constructor(
    public readonly failedIds: readonly string[],
    options?: { cause?: unknown }
  ) {
    super(`Failed to cache ${failedIds.length} record(s); batch rolled back`, options);
    this.name = "RecordStoreError";
  }

  userMessage(): string {
    return `Could not cache records ${this.failedIds.join(", ")}. Try the search again.`;
  }
}
