/**
 * Lightweight logging utility.
 * Outputs to console and/or a log file with timestamps, run ID and component.
 */

import { appendFileSync, mkdirSync, existsSync } from "node:fs";
import { join } from "node:path";
import { getRunId } from "./run-id.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type LogContext = Record<string, unknown>;

/** Receives every formatted line; used by tests to capture output. */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Directory for log files */
  logDir?: string;
  /** Log file name (without path) */
  logFile?: string;
  /** Enable console output */
  console?: boolean;
  /** Enable file output */
  file?: boolean;
  /** Component name prefixed to every message */
  component?: string;
  /** Extra destination for formatted lines */
  sink?: LogSink;
}

const DEFAULT_OPTIONS: Required<Omit<LoggerOptions, "component" | "sink">> = {
  level: "info",
  logDir: "output/logs",
  logFile: "app.log",
  console: true,
  file: true,
};

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Logger for a sub-component sharing this logger's destinations. */
  child(component: string): Logger;
}

/**
 * Format a log entry with timestamp, level, run ID, component and message.
 */
export function formatLogEntry(
  level: LogLevel,
  message: string,
  context?: LogContext,
  component?: string,
  now: Date = new Date()
): string {
  const runId = getRunId() ?? "no-run-id";
  const levelStr = level.toUpperCase().padEnd(5);
  const scope = component ? ` [${component}]` : "";

  let entry = `[${now.toISOString()}] [${levelStr}] [${runId}]${scope} ${message}`;

  if (context && Object.keys(context).length > 0) {
    entry += ` ${JSON.stringify(context, errorReplacer)}`;
  }

  return entry;
}

function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

function getConsoleMethod(level: LogLevel): typeof console.log {
  switch (level) {
    case "debug":
      return console.debug;
    case "info":
      return console.info;
    case "warn":
      return console.warn;
    case "error":
      return console.error;
  }
}

/**
 * Create a logger instance.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const logFilePath = join(opts.logDir, opts.logFile);

  if (opts.file && !existsSync(opts.logDir)) {
    mkdirSync(opts.logDir, { recursive: true });
  }

  function log(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[opts.level]) {
      return;
    }

    const entry = formatLogEntry(level, message, context, opts.component);

    if (opts.console) {
      getConsoleMethod(level)(entry);
    }

    if (opts.file) {
      try {
        appendFileSync(logFilePath, entry + "\n");
      } catch (err) {
        // Fallback to console if file write fails
        console.error(`Failed to write to log file: ${String(err)}`);
      }
    }

    opts.sink?.(level, entry);
  }

  return {
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context) => log("error", message, context),
    child: (component) =>
      createLogger({
        ...options,
        component: opts.component ? `${opts.component}:${component}` : component,
      }),
  };
}

/**
 * Logger that only reports warnings and errors to the console.
 * Default for library components constructed without one.
 */
export function createQuietLogger(component?: string): Logger {
  return createLogger({ level: "warn", file: false, component });
}
