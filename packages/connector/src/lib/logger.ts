/**
 * Logger utility
 *
 * Console-based logging with timestamp and log levels.
 *
 * Log levels:
 * - debug: Detailed internal state (page requests, cache hits, credential source)
 * - info: Normal operation progress (sync start/end, record counts)
 * - warn: Recoverable issues (rate limits, degraded credential store, skipped details)
 * - error: Sink failures and fatal errors
 *
 * Usage:
 * - CLI: --log-level debug|info|warn|error
 * - Environment: LOG_LEVEL
 * - Library: setLogLevel("warn") before calling sync functions
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// Explicit level only; no environment sniffing here. Config and CLI decide.
let currentLevel: LogLevel = "info";

function formatTimestamp(): string {
  return new Date().toISOString().replace("T", " ").slice(0, 19);
}

function log(level: LogLevel, name: string, message: string): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) {
    return;
  }

  const line = `[${formatTimestamp()}] ${level.toUpperCase().padEnd(5)} [${name}] ${message}`;
  if (level === "warn" || level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
}

export interface Logger {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Parse a user-supplied level (case-insensitive).
 * Returns null for unknown values so callers can report them.
 */
export function parseLogLevel(value: string | undefined): LogLevel | null {
  if (value === undefined) return null;
  const normalized = value.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : null;
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
