/**
 * Run-scoped logger.
 *
 * Each line carries an ISO timestamp, the level, the current run ID and the
 * component scope, followed by the message and any context as JSON. Lines
 * go to the console and to a log file; both sinks are shared by every child
 * logger, so a whole run lands in one file.
 */

import { appendFileSync, mkdirSync } from "node:fs";
import { join } from "node:path";
import { getRunId } from "./run-id.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LogEntry {
  time: Date;
  level: LogLevel;
  runId: string;
  scope: string;
  message: string;
  context: LogContext;
}

/** Receives every entry that passes the level filter, with its formatted line. */
export type LogSink = (entry: LogEntry, line: string) => void;

export interface LoggerOptions {
  /** Minimum level written; default "info" */
  level?: LogLevel;
  /** Directory for the log file; default "output/logs" */
  logDir?: string;
  /** Log file name; default "research.log" */
  logFile?: string;
  console?: boolean;
  file?: boolean;
  /** Scope label of the root logger */
  scope?: string;
  /** Extra sinks, called after the console and file */
  sinks?: readonly LogSink[];
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /**
   * A logger with the same sinks and level whose scope nests under this one.
   * Bindings are merged into the context of every entry it writes.
   */
  child(scope: string, bindings?: LogContext): Logger;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(SEVERITY, value);
}

export function formatLogEntry(entry: LogEntry): string {
  const scope = entry.scope === "" ? "" : ` [${entry.scope}]`;
  const context = Object.keys(entry.context).length > 0 ? ` ${JSON.stringify(entry.context)}` : "";
  return (
    `[${entry.time.toISOString()}] [${entry.level.toUpperCase().padEnd(5)}] ` +
    `[${entry.runId}]${scope} ${entry.message}${context}`
  );
}

const CONSOLE_METHODS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

const consoleSink: LogSink = (entry, line) => CONSOLE_METHODS[entry.level](line);

function fileSink(logDir: string, logFile: string): LogSink {
  mkdirSync(logDir, { recursive: true });
  const path = join(logDir, logFile);
  return (_entry, line) => {
    try {
      appendFileSync(path, `${line}\n`);
    } catch (err) {
      console.error(`Failed to write to log file ${path}: ${String(err)}`);
    }
  };
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = SEVERITY[options.level ?? "info"];
  const sinks: LogSink[] = [];
  if (options.console ?? true) sinks.push(consoleSink);
  if (options.file ?? true) {
    sinks.push(fileSink(options.logDir ?? "output/logs", options.logFile ?? "research.log"));
  }
  sinks.push(...(options.sinks ?? []));

  function scoped(scope: string, bindings: LogContext): Logger {
    const write = (level: LogLevel, message: string, context: LogContext = {}): void => {
      if (SEVERITY[level] < threshold) return;

      const entry: LogEntry = {
        time: new Date(),
        level,
        runId: getRunId() ?? "no-run-id",
        scope,
        message,
        context: { ...bindings, ...context },
      };
      const line = formatLogEntry(entry);
      for (const sink of sinks) sink(entry, line);
    };

    return {
      debug: (message, context) => write("debug", message, context),
      info: (message, context) => write("info", message, context),
      warn: (message, context) => write("warn", message, context),
      error: (message, context) => write("error", message, context),
      child: (name, more = {}) =>
        scoped(scope === "" ? name : `${scope}:${name}`, { ...bindings, ...more }),
    };
  }

  return scoped(options.scope ?? "", {});
}
