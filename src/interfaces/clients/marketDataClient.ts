/**
 * MarketDataClient interface — contract for the item catalog and price source
 *
 * The lookup flow only depends on this interface, so tests can swap in
 * an in-process fake without touching HTTP.
 */

import type { CityPrice, HistorySeries } from "@/types";

export interface MarketDataClient {
  /**
   * Download the raw item dump (unvalidated JSON)
   *
   * @returns Parsed dump; shape is checked by validateItemDump
   */
  fetchItemDump(): Promise<unknown>;

  /**
   * Fetch current prices of one item across all market locations
   *
   * @param itemId - Item identifier (uniqueId)
   * @returns One row per city and quality; [] when the API has no data
   */
  fetchCurrentPrices(itemId: string): Promise<CityPrice[]>;

  /**
   * Fetch price history of one item, starting HISTORY_DAYS before `now`
   *
   * @param itemId - Item identifier (uniqueId)
   * @param now - Reference time (UTC)
   */
  fetchPriceHistory(itemId: string, now: Date): Promise<HistorySeries[]>;

  /**
   * URL of the item's rendered icon
   */
  itemIconUrl(itemId: string): string;

  /**
   * URL the item dump is downloaded from
   */
  readonly catalogSourceUrl: string;
}
