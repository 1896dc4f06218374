/**
 * AlbionDataClient — API client for the Albion Data Project
 *
 * Implements MarketDataClient:
 * - item dump from the formatted ao-bin-dumps file
 * - current prices and price history from the market data API
 *
 * HTTP errors are not swallowed: a failed price lookup has nothing
 * useful to show, so the caller decides how to report it.
 */

import type { MarketDataClient } from "@/interfaces";
import type { CityPrice, HistorySeries, HttpRequestFn } from "@/types";
import { httpRequest as defaultHttpRequest } from "@/clients/http";
import {
  ALBION_DATA_API_BASE_URL,
  ALBION_DATA_HTTP_HEADERS,
  ALBION_DATA_HTTP_MAX_ATTEMPTS,
  ALBION_DATA_HTTP_TIMEOUT_MS,
  ALBION_ITEM_DUMP_TIMEOUT_MS,
  ALBION_ITEM_ICON_BASE_URL,
  CATALOG_SOURCE_URL_ENV,
  DEFAULT_CATALOG_SOURCE_URL,
  HISTORY_DAYS,
  HISTORY_TIME_SCALE,
  MARKET_LOCATIONS,
} from "@/constants";
import { mapHistoryResponse, mapPriceResponse } from "./mappers";
import * as logger from "@/logger";

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export interface AlbionDataClientConfig {
  /**
   * Optional HTTP request function (for testing/mocking)
   * Defaults to production httpRequest implementation
   */
  httpRequest?: HttpRequestFn;
  /**
   * Item dump URL
   * Defaults to CATALOG_SOURCE_URL env, then DEFAULT_CATALOG_SOURCE_URL
   */
  catalogSourceUrl?: string;
  /**
   * Market data API base URL (default ALBION_DATA_API_BASE_URL)
   */
  apiBaseUrl?: string;
}

/**
 * Format a date as MM-DD-YYYY (UTC), the format /stats/charts expects
 */
export function formatHistoryDate(date: Date): string {
  const month = String(date.getUTCMonth() + 1).padStart(2, "0");
  const day = String(date.getUTCDate()).padStart(2, "0");
  return `${month}-${day}-${date.getUTCFullYear()}`;
}

/**
 * Albion Data Project implementation of MarketDataClient
 */
export class AlbionDataClient implements MarketDataClient {
  readonly catalogSourceUrl: string;
  private readonly apiBaseUrl: string;
  private readonly httpRequest: HttpRequestFn;

  constructor(config?: AlbionDataClientConfig) {
    this.httpRequest = config?.httpRequest ?? defaultHttpRequest;
    this.catalogSourceUrl =
      config?.catalogSourceUrl ||
      process.env[CATALOG_SOURCE_URL_ENV] ||
      DEFAULT_CATALOG_SOURCE_URL;
    this.apiBaseUrl = config?.apiBaseUrl ?? ALBION_DATA_API_BASE_URL;
  }

  /**
   * Download the item dump
   *
   * The dump is served as text/plain, so the HTTP client hands back the
   * raw text; it is parsed here.
   *
   * @throws {HttpError} On non-2xx status after retries
   * @throws {SyntaxError} If the body is not valid JSON
   */
  async fetchItemDump(): Promise<unknown> {
    logger.info("Fetching item dump", { url: this.catalogSourceUrl });

    const body = await this.httpRequest({
      method: "GET",
      url: this.catalogSourceUrl,
      headers: ALBION_DATA_HTTP_HEADERS,
      timeoutMs: ALBION_ITEM_DUMP_TIMEOUT_MS,
      retry: { maxAttempts: ALBION_DATA_HTTP_MAX_ATTEMPTS },
    });

    if (typeof body === "string") {
      const parsed: unknown = JSON.parse(body);
      return parsed;
    }
    return body;
  }

  /**
   * Fetch current prices for all market locations
   *
   * @throws {HttpError} On non-2xx status after retries
   */
  async fetchCurrentPrices(itemId: string): Promise<CityPrice[]> {
    const url = `${this.apiBaseUrl}/stats/prices/${itemId}`;

    logger.debug("Fetching current prices", { itemId, url });

    const body = await this.httpRequest({
      method: "GET",
      url,
      query: { locations: MARKET_LOCATIONS.join(",") },
      headers: ALBION_DATA_HTTP_HEADERS,
      timeoutMs: ALBION_DATA_HTTP_TIMEOUT_MS,
      retry: { maxAttempts: ALBION_DATA_HTTP_MAX_ATTEMPTS },
    });

    const prices = mapPriceResponse(body);
    logger.debug("Current prices fetched", { itemId, rows: prices.length });
    return prices;
  }

  /**
   * Fetch hourly history starting HISTORY_DAYS before now
   *
   * @throws {HttpError} On non-2xx status after retries
   */
  async fetchPriceHistory(itemId: string, now: Date): Promise<HistorySeries[]> {
    const url = `${this.apiBaseUrl}/stats/charts/${itemId}`;
    const since = new Date(now.getTime() - HISTORY_DAYS * MS_PER_DAY);

    logger.debug("Fetching price history", { itemId, url });

    const body = await this.httpRequest({
      method: "GET",
      url,
      query: {
        date: formatHistoryDate(since),
        locations: MARKET_LOCATIONS.join(","),
        "time-scale": HISTORY_TIME_SCALE,
      },
      headers: ALBION_DATA_HTTP_HEADERS,
      timeoutMs: ALBION_DATA_HTTP_TIMEOUT_MS,
      retry: { maxAttempts: ALBION_DATA_HTTP_MAX_ATTEMPTS },
    });

    return mapHistoryResponse(body);
  }

  itemIconUrl(itemId: string): string {
    return `${ALBION_ITEM_ICON_BASE_URL}${itemId}.png`;
  }
}
