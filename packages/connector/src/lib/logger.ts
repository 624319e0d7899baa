/**
 * Logger utility
 *
 * Console-based logging with timestamp, log level and optional key=value fields.
 *
 * Log levels:
 * - debug: Request URLs, page numbers, per-activity decisions
 * - info: Sync start/end, batch progress, record counts
 * - warn: Recoverable issues (rate limits, rotated refresh token)
 * - error: Fatal errors that stop the run
 *
 * Usage:
 * - CLI: --log-level debug|info|warn|error (or LOG_LEVEL in .env)
 * - Library: setLogLevel("warn") before calling sync functions
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, string | number | boolean | null | undefined>;

export const VALID_LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// No environment auto-detection: the level comes from --log-level, LOG_LEVEL
// or an explicit setLogLevel() call.
let currentLevel: LogLevel = "info";

function formatTimestamp(): string {
  return new Date().toISOString().replace("T", " ").slice(0, 19);
}

/**
 * Render fields as ` key=value` pairs, skipping undefined values
 */
export function formatFields(fields?: LogFields): string {
  if (!fields) return "";

  const parts: string[] = [];
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    parts.push(`${key}=${value}`);
  }
  return parts.length > 0 ? ` ${parts.join(" ")}` : "";
}

function log(level: LogLevel, name: string, message: string, fields?: LogFields): void {
  if (LOG_LEVELS[level] < LOG_LEVELS[currentLevel]) {
    return;
  }

  const timestamp = formatTimestamp();
  const levelStr = level.toUpperCase().padEnd(5);
  console.log(`[${timestamp}] ${levelStr} [${name}] ${message}${formatFields(fields)}`);
}

export interface Logger {
  debug: (message: string, fields?: LogFields) => void;
  info: (message: string, fields?: LogFields) => void;
  warn: (message: string, fields?: LogFields) => void;
  error: (message: string, fields?: LogFields) => void;
}

export function isLogLevel(value: string): value is LogLevel {
  return VALID_LOG_LEVELS.some((level) => level === value);
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
    debug: (message, fields) => log("debug", name, message, fields),
    info: (message, fields) => log("info", name, message, fields),
    warn: (message, fields) => log("warn", name, message, fields),
    error: (message, fields) => log("error", name, message, fields),
  };
}
