// CHANGE: Implement leveled logger with INFO/DEBUG/ERROR output.
// WHY: Phase summaries, per-request detail, and request failures are reported at distinct levels.
// SOURCE: internal reasoning

import chalk from "chalk";
import { LOGGING } from "./config.js";

export type LogLevel = "debug" | "info" | "error";

const levelWeight: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  error: 2
};

let activeLevel: LogLevel = LOGGING.LEVEL === "debug" ? "debug" : "info";

const formatters: Record<LogLevel, (message: string) => string> = {
  debug: message => chalk.gray(`[DEBUG] ${message}`),
  info: message => chalk.blue(`[INFO] ${message}`),
  error: message => chalk.red(`[ERROR] ${message}`)
};

function shouldLog(level: LogLevel): boolean {
  return levelWeight[level] >= levelWeight[activeLevel];
}

/**
 * Set log level for runtime diagnostics.
 *
 * @param level - Lowest level that reaches the console.
 * @throws Error if level is not recognised.
 */
export function setLogLevel(level: LogLevel): void {
  if (levelWeight[level] === undefined) {
    throw new Error(`Unsupported log level: ${level}`);
  }
  activeLevel = level;
}

/**
 * Emit information-level log entry.
 *
 * @param message - Log message text.
 *
 * Invariant: message must be a human-readable summary of a run phase.
 */
export function info(message: string): void {
  if (shouldLog("info")) {
    console.log(formatters.info(message));
  }
}

/**
 * Emit debug-level log entry, shown only under `--verbose`.
 *
 * @param message - Detailed diagnostic message.
 */
export function debug(message: string): void {
  if (shouldLog("debug")) {
    console.log(formatters.debug(message));
  }
}

/**
 * Emit error-level log entry on stderr.
 *
 * @param message - Description of encountered error.
 */
export function error(message: string): void {
  if (shouldLog("error")) {
    console.error(formatters.error(message));
  }
}
