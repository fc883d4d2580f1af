/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import type { ZodIssue } from "zod";
import {
  ConfigError,
  maybeEnv,
  optionalEnv,
  optionalEnvInt,
  optionalEnvBool,
  type EnvSource,
} from "./env.js";
import { AppConfigSchema, type AppConfig } from "./schema.js";

export { ConfigError, requireEnv, type ConfigIssue, type EnvSource } from "./env.js";
export * from "./schema.js";

function formatZodIssues(zodIssues: ZodIssue[]): { key: string; message: string }[] {
  return zodIssues.map((issue) => ({
    key: issue.path.length > 0 ? issue.path.join(".") : "(root)",
    message: issue.message,
  }));
}

/**
 * Load and validate application configuration.
 * Fails fast with a ConfigError listing every invalid value.
 */
export function loadConfig(env: EnvSource = process.env): Readonly<AppConfig> {
  const raw = {
    debug: optionalEnvBool("DEBUG", false, env),
    logLevel: optionalEnv("LOG_LEVEL", "info", env),
    databasePath: optionalEnv("DATABASE_PATH", "output/newsroom.sqlite", env),
    promptPath: optionalEnv("PROMPT_PATH", "prompts/newsroom.txt", env),
    pubmed: {
      email: maybeEnv("PUBMED_EMAIL", env),
      apiKey: maybeEnv("PUBMED_API_KEY", env),
      tool: optionalEnv("PUBMED_TOOL", "abstract_newsroom", env),
      timeoutMs: optionalEnvInt("PUBMED_TIMEOUT_MS", 30_000, env),
      maxRetries: optionalEnvInt("PUBMED_MAX_RETRIES", 3, env),
      retmax: optionalEnvInt("PUBMED_RETMAX", 20, env),
    },
    generator: {
      apiKey: maybeEnv("LLM_API_KEY", env),
      baseUrl: optionalEnv("LLM_BASE_URL", "https://api.openai.com/v1", env),
      model: optionalEnv("LLM_MODEL", "gpt-4o-mini", env),
      timeoutMs: optionalEnvInt("LLM_TIMEOUT_MS", 60_000, env),
    },
  };

  const result = AppConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new ConfigError(
      `Invalid configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  return Object.freeze(result.data);
}

/**
 * Contact email required by E-utilities.
 * Only commands that talk to PubMed call this, so read-only commands work without it.
 */
export function requirePubMedEmail(config: Readonly<AppConfig>): string {
  if (config.pubmed.email === undefined) {
    throw new ConfigError("PUBMED_EMAIL must be set to a real contact email for PubMed E-utilities.", [
      { key: "PUBMED_EMAIL", message: "is required for PubMed requests" },
    ]);
  }
  return config.pubmed.email;
}
