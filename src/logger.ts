// CHANGE: Implement leveled logger with an explicitly configured destination.
// WHY: The destination is chosen once at startup and never inferred from the parent process.

import chalk from "chalk";
import fs from "fs-extra";
import { LOGGING } from "./config.js";
import { ConfigError, describeError } from "./errors.js";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export const LOG_DESTINATIONS = ["stderr", "systemJournal", "file"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];
export type LogDestination = (typeof LOG_DESTINATIONS)[number];

export interface LoggerOptions {
  readonly level?: LogLevel;
  readonly destination?: LogDestination;
  readonly filePath?: string;
}

type Sink = { readonly kind: "stderr" } | { readonly kind: "systemJournal" } | { readonly kind: "file"; readonly path: string };

const levelWeight: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

// syslog priorities understood by journald on a service's stderr
const journalPriority: Record<LogLevel, number> = {
  debug: 7,
  info: 6,
  warn: 4,
  error: 3
};

const labels: Record<LogLevel, string> = {
  debug: "DEBUG",
  info: "INFO",
  warn: "WARN",
  error: "ERROR"
};

const formatters: Record<LogLevel, (message: string) => string> = {
  debug: message => chalk.gray(`[DEBUG] ${message}`),
  info: message => chalk.blue(`[INFO] ${message}`),
  warn: message => chalk.yellow(`[WARN] ${message}`),
  error: message => chalk.red(`[ERROR] ${message}`)
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

let activeLevel: LogLevel = isLogLevel(LOGGING.LEVEL) ? LOGGING.LEVEL : "info";
let sink: Sink = { kind: "stderr" };

function shouldLog(level: LogLevel): boolean {
  return levelWeight[level] >= levelWeight[activeLevel];
}

function write(level: LogLevel, message: string): void {
  if (!shouldLog(level)) {
    return;
  }
  switch (sink.kind) {
    case "systemJournal":
      console.error(`<${journalPriority[level]}>${message}`);
      return;
    case "file":
      try {
        fs.appendFileSync(sink.path, `${new Date().toISOString()} [${labels[level]}] ${message}\n`);
      } catch (cause) {
        // logging must never abort the caller; the rest of the run goes to stderr
        const lost = sink.path;
        sink = { kind: "stderr" };
        console.error(formatters.warn(`Cannot append to log file ${lost}: ${describeError(cause)}; logging to stderr.`));
        console.error(formatters[level](message));
      }
      return;
    case "stderr":
      console.error(formatters[level](message));
      return;
  }
}

/**
 * Set log level for runtime diagnostics.
 *
 * @throws Error if level is not recognised.
 */
export function setLogLevel(level: LogLevel): void {
  if (levelWeight[level] === undefined) {
    throw new Error(`Unsupported log level: ${level}`);
  }
  activeLevel = level;
}

/**
 * Apply process-wide logging options. Called once by the CLI before any command runs.
 *
 * @throws ConfigError when the `file` destination is requested without a path or the file cannot be created.
 */
export function configureLogger(options: LoggerOptions): void {
  if (options.level) {
    setLogLevel(options.level);
  }
  const destination = options.destination ?? "stderr";
  if (destination === "file") {
    if (!options.filePath) {
      throw new ConfigError("Log destination 'file' requires a log file path.");
    }
    try {
      fs.ensureFileSync(options.filePath);
    } catch (cause) {
      throw new ConfigError(`cannot open log file: ${describeError(cause)}`, options.filePath, { cause });
    }
    sink = { kind: "file", path: options.filePath };
    return;
  }
  sink = { kind: destination };
}

export function debug(message: string): void {
  write("debug", message);
}

/**
 * Emit information-level log entry.
 *
 * Invariant: message must be a human-readable summary of pipeline progress.
 */
export function info(message: string): void {
  write("info", message);
}

/**
 * Emit warning-level log entry for soft anomalies that do not stop the current stage.
 */
export function warn(message: string): void {
  write("warn", message);
}

export function error(message: string): void {
  write("error", message);
}
