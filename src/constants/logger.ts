/**
 * Logger constants
 */

import type { LogLevel } from "@/types";

/**
 * Level priorities; a message is written when its level is at least the configured one
 */
export const LOG_LEVELS: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const LOG_LEVEL_ENV = "LOG_LEVEL";

export const DEFAULT_LOG_LEVEL: LogLevel = "info";
