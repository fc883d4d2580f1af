/**
 * Environment variable loading and validation.
 */

import "dotenv/config";

/** Anything shaped like `process.env`. */
export type EnvSource = Readonly<Record<string, string | undefined>>;

/**
 * Individual configuration issue.
 */
export interface ConfigIssue {
  /** Environment variable or config path at fault */
  key: string;
  /** Human-readable error message */
  message: string;
}

export class ConfigError extends Error {
  public readonly issues: ConfigIssue[];

  constructor(message: string, issues: ConfigIssue[] = []) {
    super(message);
    this.name = "ConfigError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    if (this.issues.length === 0) {
      return this.message;
    }
    const lines = [this.message];
    for (const issue of this.issues) {
      lines.push(`  - ${issue.key}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

function readEnv(env: EnvSource, key: string): string | undefined {
  const value = env[key]?.trim();
  return value === undefined || value === "" ? undefined : value;
}

/**
 * Get a required environment variable.
 * Throws ConfigError if the variable is missing or empty.
 */
export function requireEnv(key: string, env: EnvSource = process.env): string {
  const value = readEnv(env, key);
  if (value === undefined) {
    throw new ConfigError(`Missing required environment variable: ${key}`, [
      { key, message: "is required" },
    ]);
  }
  return value;
}

/**
 * Get an optional environment variable with a default value.
 */
export function optionalEnv(
  key: string,
  defaultValue: string,
  env: EnvSource = process.env
): string {
  return readEnv(env, key) ?? defaultValue;
}

/**
 * Get an optional environment variable, or undefined when unset.
 */
export function maybeEnv(key: string, env: EnvSource = process.env): string | undefined {
  return readEnv(env, key);
}

/**
 * Get an optional environment variable as an integer.
 */
export function optionalEnvInt(
  key: string,
  defaultValue: number,
  env: EnvSource = process.env
): number {
  const value = readEnv(env, key);
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(
      `Environment variable ${key} must be a valid integer, got: ${value}`,
      [{ key, message: "must be an integer" }]
    );
  }
  return parsed;
}

/**
 * Get an optional environment variable as a boolean.
 * Recognizes: true, false, 1, 0, yes, no (case-insensitive)
 */
export function optionalEnvBool(
  key: string,
  defaultValue: boolean,
  env: EnvSource = process.env
): boolean {
  const value = readEnv(env, key);
  if (value === undefined) {
    return defaultValue;
  }
  const normalized = value.toLowerCase();
  if (["true", "1", "yes"].includes(normalized)) {
    return true;
  }
  if (["false", "0", "no"].includes(normalized)) {
    return false;
  }
  throw new ConfigError(
    `Environment variable ${key} must be a boolean (true/false/1/0/yes/no), got: ${value}`,
    [{ key, message: "must be a boolean" }]
  );
}
