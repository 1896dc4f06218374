/**
 * HTTP client — read-only requests over native fetch
 *
 * Each attempt has its own timeout. Failed attempts are retried with
 * exponential backoff (jittered) when the failure looks transient:
 * network errors, timeouts and the statuses in RETRYABLE_STATUS_CODES.
 * A Retry-After header on 429/503 replaces the computed backoff.
 */

import type { HttpRequest, HttpRetryConfig } from "@/types/clients/http";
import { HttpError } from "./httpError";
import {
  DEFAULT_BASE_DELAY_MS,
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_MAX_DELAY_MS,
  DEFAULT_MAX_RETRY_AFTER_MS,
  ERROR_BODY_SNIPPET_MAX_LENGTH,
  RETRY_AFTER_STATUS_CODES,
  RETRYABLE_STATUS_CODES,
} from "@/constants/clients/http";
import * as logger from "@/logger";

type RetryPolicy = Required<HttpRetryConfig>;

function resolveRetryPolicy(retry: HttpRetryConfig = {}): RetryPolicy {
  return {
    maxAttempts: retry.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
    baseDelayMs: retry.baseDelayMs ?? DEFAULT_BASE_DELAY_MS,
    maxDelayMs: retry.maxDelayMs ?? DEFAULT_MAX_DELAY_MS,
    maxRetryAfterMs: retry.maxRetryAfterMs ?? DEFAULT_MAX_RETRY_AFTER_MS,
  };
}

/**
 * Append query parameters to a URL
 */
export function buildUrl(baseUrl: string, query?: HttpRequest["query"]): string {
  if (!query || Object.keys(query).length === 0) {
    return baseUrl;
  }

  const url = new URL(baseUrl);
  for (const [key, value] of Object.entries(query)) {
    const values = Array.isArray(value) ? value : [value];
    for (const item of values) {
      url.searchParams.append(key, String(item));
    }
  }
  return url.toString();
}

async function readErrorSnippet(response: Response): Promise<string | undefined> {
  const text = await response.text().catch((error: unknown) => {
    logger.debug("Could not read error body", {
      url: response.url,
      error: error instanceof Error ? error.message : String(error),
    });
    return "";
  });
  if (!text) {
    return undefined;
  }
  return text.length > ERROR_BODY_SNIPPET_MAX_LENGTH
    ? `${text.substring(0, ERROR_BODY_SNIPPET_MAX_LENGTH)}...`
    : text;
}

/**
 * Decode a successful response
 *
 * JSON content types are parsed; anything else comes back as text,
 * since some static hosts serve JSON files as text/plain.
 */
async function readBody(response: Response): Promise<unknown> {
  if (response.status === 204) {
    return undefined;
  }

  const contentType = response.headers.get("content-type") ?? "";
  if (contentType.includes("application/json") || contentType.includes("+json")) {
    const data: unknown = await response.json();
    return data;
  }
  return response.text();
}

async function attempt(req: HttpRequest, url: string): Promise<unknown> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), req.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS);

  try {
    const response = await fetch(url, {
      method: req.method,
      headers: req.headers,
      signal: controller.signal,
    });

    if (!response.ok) {
      throw new HttpError({
        status: response.status,
        statusText: response.statusText,
        url,
        bodySnippet: await readErrorSnippet(response),
        headers: response.headers,
      });
    }
    return await readBody(response);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Transient failures: retryable statuses, aborts (timeout) and fetch's
 * TypeError for network failures
 */
function isTransient(error: unknown): boolean {
  if (error instanceof HttpError) {
    return RETRYABLE_STATUS_CODES.has(error.status);
  }
  return error instanceof Error && (error.name === "AbortError" || error.name === "TypeError");
}

/**
 * Retry-After in milliseconds (delta-seconds or HTTP date), null if absent or past
 */
export function parseRetryAfter(header: string | null | undefined, now: number = Date.now()): number | null {
  if (!header) {
    return null;
  }
  const seconds = Number.parseInt(header, 10);
  if (!Number.isNaN(seconds) && seconds > 0) {
    return seconds * 1000;
  }
  const until = Date.parse(header);
  if (Number.isNaN(until) || until <= now) {
    return null;
  }
  return until - now;
}

/**
 * Delay before retry number `retry` (1-based)
 */
function retryDelayMs(error: unknown, retry: number, policy: RetryPolicy): number {
  if (error instanceof HttpError && RETRY_AFTER_STATUS_CODES.has(error.status)) {
    const retryAfter = parseRetryAfter(error.headers?.get("retry-after"));
    if (retryAfter !== null) {
      return Math.min(retryAfter, policy.maxRetryAfterMs);
    }
  }
  const backoff = Math.min(policy.baseDelayMs * 2 ** (retry - 1), policy.maxDelayMs);
  return Math.floor(backoff * (0.5 + Math.random() * 0.5));
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Perform a request with timeout and retries
 *
 * @param req - Request description
 * @returns Parsed JSON, raw text for non-JSON bodies, undefined for 204
 * @throws {HttpError} On a non-2xx status (after retries for transient ones)
 * @throws {Error} On network failure or timeout once retries are exhausted
 */
export async function httpRequest(req: HttpRequest): Promise<unknown> {
  const url = buildUrl(req.url, req.query);
  const policy = resolveRetryPolicy(req.retry);

  for (let attemptNumber = 1; ; attemptNumber++) {
    try {
      return await attempt(req, url);
    } catch (error) {
      if (attemptNumber >= policy.maxAttempts || !isTransient(error)) {
        throw error;
      }

      const delayMs = retryDelayMs(error, attemptNumber, policy);
      logger.debug("Retrying HTTP request", {
        method: req.method,
        url: req.url,
        attempt: attemptNumber,
        maxAttempts: policy.maxAttempts,
        delayMs,
        reason: error instanceof HttpError ? `status ${error.status}` : String(error),
      });
      await sleep(delayMs);
    }
  }
}
