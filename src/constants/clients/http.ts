/**
 * HTTP client defaults
 */

/**
 * Per-attempt timeout when the request sets none
 */
export const DEFAULT_HTTP_TIMEOUT_MS = 30_000;

/**
 * Error bodies are cut to this many characters in HttpError messages
 */
export const ERROR_BODY_SNIPPET_MAX_LENGTH = 200;

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_BASE_DELAY_MS = 1_000;
export const DEFAULT_MAX_DELAY_MS = 30_000;
export const DEFAULT_MAX_RETRY_AFTER_MS = 60_000;

/**
 * Statuses worth another attempt: timeout, rate limit, transient server errors
 */
export const RETRYABLE_STATUS_CODES: ReadonlySet<number> = new Set([
  408, 429, 500, 502, 503, 504,
]);

/**
 * Statuses whose Retry-After header is honoured
 */
export const RETRY_AFTER_STATUS_CODES: ReadonlySet<number> = new Set([429, 503]);
