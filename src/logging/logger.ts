/**
 * Lightweight logging utility.
 * Outputs to console and/or a log file with timestamps, run ID and scope.
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

/**
 * Structured form of a log line, handed to a sink before formatting.
 */
export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  runId: string;
  scope: string | undefined;
  message: string;
  context: LogContext | undefined;
}

export type LogSink = (entry: LogEntry) => void;

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
  /** Component tag printed after the run ID */
  scope?: string;
  /** Extra destination receiving every entry that passes the level check */
  sink?: LogSink;
}

type ResolvedOptions = Required<Omit<LoggerOptions, "scope" | "sink">> &
  Pick<LoggerOptions, "scope" | "sink">;

const DEFAULT_OPTIONS: ResolvedOptions = {
  level: "info",
  logDir: "output/logs",
  logFile: "crt-hub.log",
  console: true,
  file: true,
};

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Logger sharing this one's destinations, tagged with a nested scope */
  child(scope: string): Logger;
}

/**
 * Format a log entry as a single line.
 */
export function formatLogEntry(entry: LogEntry): string {
  const levelStr = entry.level.toUpperCase().padEnd(5);
  const scopeStr = entry.scope ? ` [${entry.scope}]` : "";

  let line = `[${entry.timestamp}] [${levelStr}] [${entry.runId}]${scopeStr} ${entry.message}`;

  if (entry.context && Object.keys(entry.context).length > 0) {
    line += ` ${JSON.stringify(entry.context)}`;
  }

  return line;
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
  const opts: ResolvedOptions = { ...DEFAULT_OPTIONS, ...options };
  const logFilePath = join(opts.logDir, opts.logFile);

  if (opts.file && !existsSync(opts.logDir)) {
    mkdirSync(opts.logDir, { recursive: true });
  }

  function write(entry: LogEntry): void {
    if (opts.sink) {
      opts.sink(entry);
    }

    if (!opts.console && !opts.file) {
      return;
    }

    const line = formatLogEntry(entry);

    if (opts.console) {
      getConsoleMethod(entry.level)(line);
    }

    if (opts.file) {
      try {
        appendFileSync(logFilePath, line + "\n");
      } catch (err) {
        console.error(`Failed to write to log file ${logFilePath}: ${String(err)}`);
      }
    }
  }

  function build(scope: string | undefined): Logger {
    function log(level: LogLevel, message: string, context?: LogContext): void {
      if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[opts.level]) {
        return;
      }
      write({
        timestamp: new Date().toISOString(),
        level,
        runId: getRunId() ?? "no-run-id",
        scope,
        message,
        context,
      });
    }

    return {
      debug: (message, context) => log("debug", message, context),
      info: (message, context) => log("info", message, context),
      warn: (message, context) => log("warn", message, context),
      error: (message, context) => log("error", message, context),
      child: (childScope) => build(scope ? `${scope}:${childScope}` : childScope),
    };
  }

  return build(opts.scope);
}

/**
 * Logger that discards everything; the default where none is supplied.
 */
export function createSilentLogger(): Logger {
  return createLogger({ console: false, file: false });
}
