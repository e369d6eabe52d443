/**
 * Logging and observability utilities.
 */

export { generateRunId, initRunId, ensureRunId, getRunId } from "./run-id.js";
export {
  createLogger,
  createSilentLogger,
  formatLogEntry,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LogContext,
  type LoggerOptions,
} from "./logger.js";
