/**
 * HttpError — a non-2xx response, with enough context to log it
 */

import type { HttpErrorDetails } from "@/types";

function describe(details: HttpErrorDetails): string {
  const base = `HTTP ${details.status} ${details.statusText} - ${details.url}`;
  return details.bodySnippet ? `${base} - ${details.bodySnippet}` : base;
}

export class HttpError extends Error {
  readonly status: number;
  readonly statusText: string;
  readonly url: string;
  /** Start of the response body, cut to ERROR_BODY_SNIPPET_MAX_LENGTH */
  readonly bodySnippet?: string;
  /** Response headers (Retry-After is read from here) */
  readonly headers?: Headers;

  constructor(details: HttpErrorDetails) {
    super(describe(details));
    this.name = "HttpError";
    this.status = details.status;
    this.statusText = details.statusText;
    this.url = details.url;
    this.bodySnippet = details.bodySnippet;
    this.headers = details.headers;
  }
}
