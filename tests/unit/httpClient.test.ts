/**
 * Unit tests for the HTTP client
 *
 * fetch is stubbed per test; nothing leaves the process.
 * Retries use a zero base delay so tests do not wait.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { HttpError, httpRequest, parseRetryAfter } from "@/clients/http";

const URL_BASE = "https://api.example.test/v2/stats/prices/T4_BAG";
const NO_WAIT = { baseDelayMs: 0 };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json; charset=utf-8" },
  });
}

function textResponse(body: string, status = 200, statusText = ""): Response {
  return new Response(body, {
    status,
    statusText,
    headers: { "content-type": "text/plain" },
  });
}

describe("httpRequest", () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should append query parameters and parse JSON", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse([{ city: "Caerleon" }]));

    const body = await httpRequest({
      method: "GET",
      url: URL_BASE,
      query: { locations: "Caerleon,Lymhurst", "time-scale": 1 },
    });

    expect(body).toEqual([{ city: "Caerleon" }]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0][0]).toBe(
      `${URL_BASE}?locations=Caerleon%2CLymhurst&time-scale=1`,
    );
  });

  it("should repeat array query parameters", async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse([]));

    await httpRequest({ method: "GET", url: URL_BASE, query: { q: [1, 2] } });

    expect(fetchMock.mock.calls[0][0]).toBe(`${URL_BASE}?q=1&q=2`);
  });

  it("should return non-JSON bodies as text", async () => {
    fetchMock.mockResolvedValueOnce(textResponse('[{"UniqueName":"T4_BAG"}]'));

    await expect(httpRequest({ method: "GET", url: URL_BASE })).resolves.toBe(
      '[{"UniqueName":"T4_BAG"}]',
    );
  });

  it("should return undefined for 204", async () => {
    fetchMock.mockResolvedValueOnce(new Response(null, { status: 204 }));

    await expect(
      httpRequest({ method: "GET", url: URL_BASE }),
    ).resolves.toBeUndefined();
  });

  it("should retry transient statuses", async () => {
    fetchMock
      .mockResolvedValueOnce(textResponse("busy", 503, "Service Unavailable"))
      .mockResolvedValueOnce(jsonResponse({ ok: true }));

    const body = await httpRequest({
      method: "GET",
      url: URL_BASE,
      retry: NO_WAIT,
    });

    expect(body).toEqual({ ok: true });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("should retry network failures", async () => {
    fetchMock
      .mockRejectedValueOnce(new TypeError("fetch failed"))
      .mockResolvedValueOnce(jsonResponse([]));

    await expect(
      httpRequest({ method: "GET", url: URL_BASE, retry: NO_WAIT }),
    ).resolves.toEqual([]);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("should not retry client errors", async () => {
    fetchMock.mockResolvedValueOnce(textResponse("missing", 404, "Not Found"));

    const request = httpRequest({ method: "GET", url: URL_BASE, retry: NO_WAIT });

    await expect(request).rejects.toThrow(HttpError);
    await expect(request).rejects.toThrow(
      `HTTP 404 Not Found - ${URL_BASE} - missing`,
    );
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("should give up after maxAttempts", async () => {
    fetchMock.mockImplementation(async () =>
      textResponse("boom", 500, "Internal Server Error"),
    );

    await expect(
      httpRequest({
        method: "GET",
        url: URL_BASE,
        retry: { ...NO_WAIT, maxAttempts: 2 },
      }),
    ).rejects.toMatchObject({ name: "HttpError", status: 500 });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });
});

describe("parseRetryAfter", () => {
  const now = Date.parse("2024-03-08T10:00:00Z");

  it("should read delta seconds", () => {
    expect(parseRetryAfter("3", now)).toBe(3000);
  });

  it("should read an HTTP date", () => {
    expect(parseRetryAfter("Fri, 08 Mar 2024 10:00:05 GMT", now)).toBe(5000);
  });

  it("should ignore past dates and garbage", () => {
    expect(parseRetryAfter("Fri, 08 Mar 2024 09:00:00 GMT", now)).toBeNull();
    expect(parseRetryAfter("soon", now)).toBeNull();
    expect(parseRetryAfter(null, now)).toBeNull();
  });
});
