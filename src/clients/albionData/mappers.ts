/**
 * Albion Data payload mappers — convert raw API responses to canonical types
 *
 * Responses arrive as unknown JSON. Rows that do not match the expected
 * shape are dropped (and counted in a debug log) rather than failing
 * the whole lookup.
 */

import type { CityPrice, HistorySeries } from "@/types";
import type {
  AlbionHistoryRow,
  AlbionPriceRow,
} from "@/types/clients/albionData";
import * as logger from "@/logger";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((v) => typeof v === "number");
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

/**
 * Type guard for a /stats/prices row
 */
export function isAlbionPriceRow(value: unknown): value is AlbionPriceRow {
  return (
    isRecord(value) &&
    typeof value.item_id === "string" &&
    typeof value.city === "string" &&
    (value.quality === undefined || typeof value.quality === "number") &&
    typeof value.sell_price_min === "number" &&
    typeof value.sell_price_min_date === "string" &&
    typeof value.buy_price_max === "number" &&
    typeof value.buy_price_max_date === "string"
  );
}

/**
 * Type guard for a /stats/charts row
 */
export function isAlbionHistoryRow(value: unknown): value is AlbionHistoryRow {
  if (
    !isRecord(value) ||
    typeof value.location !== "string" ||
    typeof value.item_id !== "string" ||
    typeof value.quality !== "number" ||
    !isRecord(value.data)
  ) {
    return false;
  }
  const data = value.data;
  return (
    isStringArray(data.timestamps) &&
    isNumberArray(data.prices_avg) &&
    isNumberArray(data.item_count)
  );
}

/**
 * Map a price row to CityPrice
 *
 * Items without quality are reported with quality 0.
 */
export function mapPriceRow(row: AlbionPriceRow): CityPrice {
  return {
    itemId: row.item_id,
    city: row.city,
    quality: row.quality ?? 0,
    sellPriceMin: row.sell_price_min,
    sellPriceMinDate: row.sell_price_min_date,
    buyPriceMax: row.buy_price_max,
    buyPriceMaxDate: row.buy_price_max_date,
  };
}

/**
 * Map a history row to HistorySeries
 */
export function mapHistoryRow(row: AlbionHistoryRow): HistorySeries {
  return {
    location: row.location,
    itemId: row.item_id,
    quality: row.quality,
    timestamps: row.data.timestamps,
    pricesAvg: row.data.prices_avg,
    itemCounts: row.data.item_count,
  };
}

/**
 * Map a /stats/prices response body to CityPrice[]
 *
 * @param body - Parsed response (expected: array of rows)
 * @returns Valid rows in response order; [] when the body is not an array
 */
export function mapPriceResponse(body: unknown): CityPrice[] {
  if (!Array.isArray(body)) {
    logger.warn("Unexpected prices response shape", { type: typeof body });
    return [];
  }
  const rows = body.filter(isAlbionPriceRow);
  if (rows.length !== body.length) {
    logger.debug("Dropped malformed price rows", {
      dropped: body.length - rows.length,
    });
  }
  return rows.map(mapPriceRow);
}

/**
 * Map a /stats/charts response body to HistorySeries[]
 */
export function mapHistoryResponse(body: unknown): HistorySeries[] {
  if (!Array.isArray(body)) {
    logger.warn("Unexpected history response shape", { type: typeof body });
    return [];
  }
  const rows = body.filter(isAlbionHistoryRow);
  if (rows.length !== body.length) {
    logger.debug("Dropped malformed history rows", {
      dropped: body.length - rows.length,
    });
  }
  return rows.map(mapHistoryRow);
}
