/**
 * Lightweight logging utility.
 * Outputs to console and/or a log file with timestamps and the job ID
 * bound to the logger (see child()).
 */

import { appendFileSync, mkdirSync, existsSync } from "node:fs";
import { join } from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type LogContext = Record<string, unknown>;

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
  logDir: "logs",
  logFile: "ticketpress.log",
  console: true,
  file: true,
};

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Logger that adds `bindings` to every entry (a `jobId` binding is shown in the prefix). */
  child(bindings: LogContext): Logger;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Format a log entry with timestamp, level, job ID, and message.
 */
export function formatLogEntry(
  level: LogLevel,
  message: string,
  context: LogContext = {},
  timestamp: string = new Date().toISOString()
): string {
  const { jobId, ...rest } = context;
  const jobStr = typeof jobId === "string" ? jobId : "-";
  const levelStr = level.toUpperCase().padEnd(5);

  let entry = `[${timestamp}] [${levelStr}] [${jobStr}] ${message}`;

  if (Object.keys(rest).length > 0) {
    entry += ` ${JSON.stringify(rest)}`;
  }

  return entry;
}

/**
 * Get console method for log level.
 */
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

  // Ensure log directory exists
  if (opts.file && !existsSync(opts.logDir)) {
    mkdirSync(opts.logDir, { recursive: true });
  }

  function log(level: LogLevel, message: string, context: LogContext): void {
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
        // Fallback to console if file write fails
        console.error(`Failed to write to log file: ${err}`);
      }
    }
  }

  function bind(bindings: LogContext): Logger {
    return {
      debug: (message, context) => log("debug", message, { ...bindings, ...context }),
      info: (message, context) => log("info", message, { ...bindings, ...context }),
      warn: (message, context) => log("warn", message, { ...bindings, ...context }),
      error: (message, context) => log("error", message, { ...bindings, ...context }),
      child: (more) => bind({ ...bindings, ...more }),
    };
  }

  return bind({});
}

/**
 * Logger that discards everything. Used where no logger is injected.
 */
export const silentLogger: Logger = createLogger({ console: false, file: false });
