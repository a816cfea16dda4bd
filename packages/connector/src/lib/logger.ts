/**
 * Logger utility
 *
 * Console-based logging with timestamp and log levels,
 * optionally mirrored to a log file.
 *
 * Log levels:
 * - debug: Request URLs, per-date skips, quota headers
 * - info: Run progress (retrieval start/end, files written)
 * - warn: Recoverable issues (rate limits, missing devices)
 * - error: Failed requests and aborted runs
 *
 * Usage:
 * - CLI: --log-level debug|info|warn|error, --log-file <path>
 * - Library: setLogLevel("warn") before calling retrieval functions
 */

import { appendFileSync } from "node:fs";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLevel: LogLevel = "info";
let logFilePath: string | null = null;

function formatTimestamp(): string {
  return new Date().toISOString().replace("T", " ").slice(0, 19);
}

function log(level: LogLevel, name: string, message: string): void {
  const timestamp = formatTimestamp();
  const levelStr = level.toUpperCase().padEnd(5);
  const line = `[${timestamp}] ${levelStr} [${name}] ${message}`;

  // The file receives every level; the console is filtered.
  if (logFilePath !== null) {
    appendFileSync(logFilePath, line + "\n");
  }

  if (LOG_LEVELS[level] < LOG_LEVELS[currentLevel]) {
    return;
  }

  console.log(line);
}

export interface Logger {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value);
}

/**
 * Set global console log level.
 * Call this early in your application (e.g., in CLI before retrieval).
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * Mirror all log lines (every level) to a file. Pass null to stop.
 */
export function setLogFile(path: string | null): void {
  logFilePath = path;
}

/**
 * Create a logger instance for a specific module.
 */
export function setupLogger(name: string): Logger {
  return {
    debug: (message: string) => log("debug", name, message),
    info: (message: string) => log("info", name, message),
    warn: (message: string) => log("warn", name, message),
    error: (message: string) => log("error", name, message),
  };
}
