/**
 * Durable stores: record cache, search provenance and artifact gallery.
 */

export { openDatabase, type DatabaseHandle, type NewsroomDatabase } from "./database.js";
export { RecordStore, type QueryProvenance, type UpsertResult } from "./record-store.js";
export {
  ArtifactStore,
  assertDenseRanks,
  resolveRank,
  type CreateDraftOptions,
} from "./artifact-store.js";
export * as tables from "./schema.js";
