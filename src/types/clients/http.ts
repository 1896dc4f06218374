/**
 * HTTP client type definitions
 *
 * The client only reads: every request is a GET or HEAD, so every
 * request is safe to retry.
 */

export type HttpMethod = "GET" | "HEAD";

/**
 * Retry tuning, all optional (defaults in constants/clients/http)
 */
export interface HttpRetryConfig {
  /** Total attempts, the first one included */
  maxAttempts?: number;
  /** Backoff before the first retry; doubles on each further retry */
  baseDelayMs?: number;
  /** Upper bound for the computed backoff */
  maxDelayMs?: number;
  /** Upper bound for a server-sent Retry-After */
  maxRetryAfterMs?: number;
}

export type HttpQueryValue = string | number | boolean;

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  /** Appended to url; array values repeat the parameter */
  query?: Record<string, HttpQueryValue | HttpQueryValue[]>;
  timeoutMs?: number;
  retry?: HttpRetryConfig;
}

export interface HttpErrorDetails {
  status: number;
  statusText: string;
  url: string;
  bodySnippet?: string;
  headers?: Headers;
}

/**
 * HTTP request function type for dependency injection
 *
 * Resolves to parsed JSON, the raw text for non-JSON bodies,
 * or undefined for empty responses. Callers validate the shape.
 */
export type HttpRequestFn = (req: HttpRequest) => Promise<unknown>;
