/**
 * Wires configuration into a ready-to-use curation workflow.
 */

import type { AppConfig } from "./config/index.js";
import { CurationWorkflow } from "./curation/index.js";
import { ChatCompletionsGenerator, type StoryGenerator } from "./generation/index.js";
import { createLogger, type Logger } from "./logging/index.js";
import { loadPrompt, type FixedPrompt } from "./prompts/index.js";
import { PubMedClient, type Clock, type HttpTransport } from "./pubmed/index.js";
import { ArtifactStore, openDatabase, RecordStore } from "./storage/index.js";

export interface NewsroomOverrides {
  logger?: Logger;
  prompt?: FixedPrompt;
  generator?: StoryGenerator;
  transport?: HttpTransport;
  clock?: Clock;
}

export interface Newsroom {
  readonly workflow: CurationWorkflow;
  readonly records: RecordStore;
  readonly artifacts: ArtifactStore;
  readonly client: PubMedClient;
  readonly logger: Logger;
  close(): void;
}

/**
 * Open the database, load the fixed prompt and build the workflow.
 * Callers own the returned handle and must call `close()`.
 */
export function createNewsroom(
  config: Readonly<AppConfig>,
  overrides: NewsroomOverrides = {}
): Newsroom {
  const logger = overrides.logger ?? createLogger({ level: config.debug ? "debug" : config.logLevel });
  const prompt = overrides.prompt ?? loadPrompt(config.promptPath);
  const handle = openDatabase(config.databasePath);

  const records = new RecordStore(handle.db, logger.child("records"));
  const artifacts = new ArtifactStore(handle.db, logger.child("artifacts"));
  const client = new PubMedClient({
    email: config.pubmed.email ?? "",
    tool: config.pubmed.tool,
    apiKey: config.pubmed.apiKey,
    timeoutMs: config.pubmed.timeoutMs,
    retry: { maxRetries: config.pubmed.maxRetries },
    transport: overrides.transport,
    clock: overrides.clock,
    logger: logger.child("pubmed"),
  });
  const generator =
    overrides.generator ?? new ChatCompletionsGenerator(config.generator, logger.child("generator"));

  const workflow = new CurationWorkflow({
    client,
    records,
    artifacts,
    generator,
    prompt,
    retmax: config.pubmed.retmax,
    logger: logger.child("curation"),
  });

  logger.debug("Newsroom ready", {
    database: config.databasePath,
    prompt: prompt.source,
    promptDigest: prompt.digest,
  });

  return { workflow, records, artifacts, client, logger, close: handle.close };
}
