/**
 * Application configuration schema.
 *
 * The config is validated once at startup and then treated as read-only.
 * The newsroom prompt path lives here, but the prompt text itself is loaded
 * once and handed to the curation workflow as a value; nothing downstream
 * reads configuration from ambient state.
 */

import { z } from "zod";

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export const PubMedConfigSchema = z
  .object({
    /** Contact email sent with every E-utilities request */
    email: z.string().email().optional(),

    /** NCBI API key; raises the request ceiling from 3/s to ~9/s */
    apiKey: z.string().min(1).optional(),

    /** Tool name sent with every request */
    tool: z.string().min(1),

    /** Per-request timeout */
    timeoutMs: z.number().int().min(1000).max(120_000),

    /** Retries for transient failures (timeouts, 429, 5xx) */
    maxRetries: z.number().int().min(0).max(10),

    /** Results requested from esearch when a search names no limit */
    retmax: z.number().int().min(1).max(200),
  })
  .strict();

export type PubMedConfig = z.infer<typeof PubMedConfigSchema>;

export const GeneratorConfigSchema = z
  .object({
    apiKey: z.string().min(1).optional(),
    baseUrl: z.string().url(),
    model: z.string().min(1),
    timeoutMs: z.number().int().min(1000),
  })
  .strict();

export type GeneratorConfig = z.infer<typeof GeneratorConfigSchema>;

export const AppConfigSchema = z
  .object({
    /** Enable debug mode */
    debug: z.boolean(),

    logLevel: LogLevelSchema,

    /** SQLite database file backing the record and artifact stores */
    databasePath: z.string().min(1),

    /** Newsroom prompt template with a {kernel} placeholder */
    promptPath: z.string().min(1),

    pubmed: PubMedConfigSchema,

    generator: GeneratorConfigSchema,
  })
  .strict();

export type AppConfig = z.infer<typeof AppConfigSchema>;
