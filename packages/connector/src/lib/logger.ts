/**
 * Logger utility
 *
 * Console-based logging with timestamp and log levels, optionally mirrored
 * to an append-only log file.
 *
 * Log levels:
 * - debug: Detailed internal state (token refresh, API paging, etc.)
 * - info: Normal operation progress (run start/end, created/updated/deleted counts)
 * - warn: Recoverable issues (rate limits, retries, already-deleted events)
 * - error: Fatal errors that stop the run
 *
 * Usage:
 * - CLI: --log-level debug|info|warn|error, -l <file>
 * - Library: setLogLevel("warn") / setLogFile(path) before calling sync functions
 */

import { appendFileSync } from "node:fs";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVEL_NAMES = ["debug", "info", "warn", "error"] as const;

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLevel: LogLevel = "info";
let logFile: string | null = null;

function formatTimestamp(): string {
  return new Date().toISOString().replace("T", " ").slice(0, 19);
}

/**
 * Format one log line (without trailing newline).
 */
export function formatLine(level: LogLevel, name: string, message: string, timestamp: string): string {
  const levelStr = level.toUpperCase().padEnd(5);
  return `[${timestamp}] ${levelStr} [${name}] ${message}`;
}

function log(level: LogLevel, name: string, message: string): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[currentLevel]) {
    return;
  }

  const line = formatLine(level, name, message, formatTimestamp());
  console.log(line);
  if (logFile !== null) {
    appendFileSync(logFile, line + "\n", "utf-8");
  }
}

export interface Logger {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVEL_NAMES.some((name) => name === value);
}

/**
 * Set global log level.
 * Call this early in your application (e.g., in CLI before sync).
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * Mirror every emitted line to `path` (appended). Pass null to stop.
 */
export function setLogFile(path: string | null): void {
  logFile = path;
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
