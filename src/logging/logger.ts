/**
 * Lightweight leveled logger.
 * Writes to the console and to a log file, each line stamped with a
 * timestamp and the current run ID.
 */

import { appendFileSync, mkdirSync, existsSync } from "node:fs";
import { join } from "node:path";
import { getRunId } from "./run-id.js";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

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
}

const DEFAULT_OPTIONS: Required<LoggerOptions> = {
  level: "info",
  logDir: "output/logs",
  logFile: "stagewise.log",
  console: true,
  file: true,
};

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Derive a logger that merges `bindings` into every entry's context. */
  child(bindings: LogContext): Logger;
}

/**
 * Format one log line. A string `runId` in the context replaces the
 * process-wide run ID and is not repeated in the JSON tail.
 */
export function formatLogEntry(
  level: LogLevel,
  message: string,
  context?: LogContext
): string {
  const timestamp = new Date().toISOString();
  const { runId: bound, ...rest } = context ?? {};
  const runId = typeof bound === "string" ? bound : getRunId() ?? "no-run-id";
  const tail = typeof bound === "string" ? rest : context ?? {};
  const levelStr = level.toUpperCase().padEnd(5);

  let entry = `[${timestamp}] [${levelStr}] [${runId}] ${message}`;

  if (Object.keys(tail).length > 0) {
    entry += ` ${JSON.stringify(tail)}`;
  }

  return entry;
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
  const opts: Required<LoggerOptions> = { ...DEFAULT_OPTIONS, ...options };
  const logFilePath = join(opts.logDir, opts.logFile);

  if (opts.file && !existsSync(opts.logDir)) {
    mkdirSync(opts.logDir, { recursive: true });
  }

  function write(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[opts.level]) {
      return;
    }

    const entry = formatLogEntry(level, message, context);

    if (opts.console) {
      getConsoleMethod(level)(entry);
    }

    if (opts.file) {
      try {
        appendFileSync(logFilePath, entry + "\n");
      } catch (err) {
        // Fall back to the console when the file is unwritable
        console.error(`Failed to write to log file: ${err}`);
      }
    }
  }

  function bind(bindings: LogContext): Logger {
    const log = (level: LogLevel) => (message: string, context?: LogContext) =>
      write(level, message, { ...bindings, ...context });

    return {
      debug: log("debug"),
      info: log("info"),
      warn: log("warn"),
      error: log("error"),
      child: (more) => bind({ ...bindings, ...more }),
    };
  }

  return bind({});
}

/**
 * Logger that discards everything. Used where a caller supplies none.
 */
export function createSilentLogger(): Logger {
  return createLogger({ console: false, file: false });
}
