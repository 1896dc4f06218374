/**
 * Current price report
 *
 * Turns per-city price rows into printable sell/buy order lines with
 * quality-labelled locations and relative ages.
 */

import type { CityPrice, PriceLine, PriceReport } from "@/types";
import {
  QUALITY_LABELS,
  SECONDS_PER_HOUR,
  SECONDS_PER_MINUTE,
  STALE_PRICE_AGE_SECONDS,
} from "@/constants/pricing";

const EXPLICIT_ZONE_PATTERN = /(Z|[+-]\d{2}:\d{2})$/i;

/**
 * Parse an API timestamp; the API omits the zone but means UTC.
 *
 * @returns Epoch milliseconds, or NaN if unparseable
 */
function parseApiTimestamp(timestamp: string): number {
  const iso = EXPLICIT_ZONE_PATTERN.test(timestamp) ? timestamp : `${timestamp}Z`;
  return Date.parse(iso);
}

/**
 * Relative age of a price timestamp.
 *
 * @example
 * formatPriceAge("2024-03-01T11:58:30", new Date("2024-03-01T12:00:00Z")) // "2 mins ago"
 * formatPriceAge("2024-03-01T09:00:00", new Date("2024-03-01T12:00:00Z")) // "3.0 hours ago"
 * formatPriceAge("0001-01-01T00:00:00", new Date())                       // "NIL"
 */
export function formatPriceAge(timestamp: string, now: Date): string {
  const parsed = parseApiTimestamp(timestamp);
  if (Number.isNaN(parsed)) {
    return "NIL";
  }

  const seconds = (now.getTime() - parsed) / 1000;
  if (seconds >= STALE_PRICE_AGE_SECONDS) {
    return "NIL";
  }
  if (seconds >= SECONDS_PER_HOUR) {
    return `${(seconds / SECONDS_PER_HOUR).toFixed(1)} hours ago`;
  }
  if (seconds >= SECONDS_PER_MINUTE) {
    return `${Math.round(seconds / SECONDS_PER_MINUTE)} mins ago`;
  }
  return `${Math.round(seconds)} sec ago`;
}

/**
 * City name with quality suffix, e.g. "Lymhurst (Good)"
 */
export function formatLocation(city: string, quality: number): string {
  const label = QUALITY_LABELS[quality];
  return label ? `${city} (${label})` : city;
}

/**
 * Build the price report for one item
 *
 * Rows with neither a sell nor a buy price are skipped. A sell line is
 * emitted only for a non-zero sell price, a buy line only for a non-zero
 * buy price.
 *
 * @param rows - Current prices (any order; output keeps it)
 * @param now - Reference time for relative ages
 */
export function buildPriceReport(rows: readonly CityPrice[], now: Date): PriceReport {
  const sellOrders: PriceLine[] = [];
  const buyOrders: PriceLine[] = [];

  for (const row of rows) {
    if (row.sellPriceMin === 0 && row.buyPriceMax === 0) {
      continue;
    }
    const location = formatLocation(row.city, row.quality);

    if (row.sellPriceMin !== 0) {
      sellOrders.push({
        location,
        price: row.sellPriceMin,
        updated: formatPriceAge(row.sellPriceMinDate, now),
      });
    }
    if (row.buyPriceMax !== 0) {
      buyOrders.push({
        location,
        price: row.buyPriceMax,
        updated: formatPriceAge(row.buyPriceMaxDate, now),
      });
    }
  }

  return { sellOrders, buyOrders, hasData: rows.length > 0 };
}
