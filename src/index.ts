/**
 * Abstract Newsroom curation core.
 *
 * Library entry point. The operator CLI lives in src/cli/curate.ts.
 */

export { loadConfig, requirePubMedEmail, ConfigError, type AppConfig } from "./config/index.js";
export { createLogger, createQuietLogger, initRunId, type Logger } from "./logging/index.js";
export * from "./errors.js";
export * from "./records/schema.js";
export * from "./artifacts/schema.js";
export {
  PubMedClient,
  buildPrimaryResearchQuery,
  createAxiosTransport,
  type PubMedClientOptions,
  type HttpTransport,
  type Clock,
} from "./pubmed/index.js";
export {
  daleChallScore,
  rankByReadability,
  score,
  type RankedRecord,
} from "./ranking/readability.js";
export { ArtifactStore, RecordStore, openDatabase, type NewsroomDatabase } from "./storage/index.js";
export { createPrompt, loadPrompt, fillPrompt, renderKernel, type FixedPrompt } from "./prompts/index.js";
export {
  ChatCompletionsGenerator,
  normalizeStory,
  type StoryGenerator,
  type StoryRequest,
  type GeneratedStory,
} from "./generation/index.js";
export * from "./curation/index.js";
export { createNewsroom, type Newsroom, type NewsroomOverrides } from "./newsroom.js";
