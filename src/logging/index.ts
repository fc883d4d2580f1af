/**
 * Logging and observability utilities.
 */

export { generateRunId, initRunId, getRunId } from "./run-id.js";
export {
  createLogger,
  createQuietLogger,
  formatLogEntry,
  type Logger,
  type LogContext,
  type LogLevel,
  type LoggerOptions,
  type LogSink,
} from "./logger.js";
