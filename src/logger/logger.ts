/**
 * Micro-logger — level-filtered console wrapper
 *
 * Every level writes to stderr: stdout carries the CLI's report, so
 * `npm start -- t4 bag > report.txt` captures the report alone.
 *
 * Line format: [ISO timestamp] [LEVEL] message {"json":"meta"}
 */

import type { LogLevel, LogMeta, Logger } from "@/types";
import { DEFAULT_LOG_LEVEL, LOG_LEVEL_ENV, LOG_LEVELS } from "@/constants/logger";

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Unknown or missing values fall back to DEFAULT_LOG_LEVEL
 */
export function resolveLevel(raw: string | undefined): LogLevel {
  const value = (raw ?? "").trim().toLowerCase();
  return isLogLevel(value) ? value : DEFAULT_LOG_LEVEL;
}

// Read once, at module load
const threshold = LOG_LEVELS[resolveLevel(process.env[LOG_LEVEL_ENV])];

export function formatLine(level: LogLevel, message: string, meta?: LogMeta): string {
  const suffix = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `[${new Date().toISOString()}] [${level.toUpperCase()}] ${message}${suffix}`;
}

function log(level: LogLevel, message: string, meta?: LogMeta): void {
  if (LOG_LEVELS[level] < threshold) {
    return;
  }
  console.error(formatLine(level, message, meta));
}

export function debug(message: string, meta?: LogMeta): void {
  log("debug", message, meta);
}

export function info(message: string, meta?: LogMeta): void {
  log("info", message, meta);
}

export function warn(message: string, meta?: LogMeta): void {
  log("warn", message, meta);
}

export function error(message: string, meta?: LogMeta): void {
  log("error", message, meta);
}

/**
 * Logger whose calls all carry `context` (call meta wins on key clashes)
 */
export function withContext(context: LogMeta): Logger {
  const bind =
    (level: LogLevel) =>
    (message: string, meta?: LogMeta): void =>
      log(level, message, { ...context, ...meta });

  return {
    debug: bind("debug"),
    info: bind("info"),
    warn: bind("warn"),
    error: bind("error"),
  };
}
