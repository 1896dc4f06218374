/**
 * Price lookup flow
 *
 * Resolves a free-text query against the catalog, fetches prices for
 * the best match and renders the report. The remaining ranked entries
 * become suggestions, as ranked (an item may appear more than once).
 */

import type {
  Catalog,
  CatalogItem,
  CityHistory,
  CityPrice,
  Logger,
  PriceReport,
  ResolvedMatch,
} from "@/types";
import type { MarketDataClient } from "@/interfaces";
import { resolveQuery } from "@/matcher";
import { HttpError } from "@/clients/http";
import { buildPriceReport, groupHistoryByCity, renderPriceReport } from "@/pricing";
import { ALIAS_SOURCE_LOCALE, DEFAULT_TOP_K } from "@/constants";
import * as logger from "@/logger";

export interface PriceLookupDeps {
  catalog: Catalog;
  client: MarketDataClient;
  /** Number of ranked matches (primary + suggestions), default 4 */
  topK?: number;
  /** Also fetch and summarize price history */
  includeHistory?: boolean;
  /** Reference time for ages and history window (default: now) */
  now?: Date;
}

export type PriceLookupResult = {
  primary: ResolvedMatch;
  suggestions: ResolvedMatch[];
  prices: CityPrice[];
  report: PriceReport;
  /** Undefined when history was not requested or could not be fetched */
  history?: CityHistory[];
  text: string;
};

/**
 * English display name, falling back to the identifier
 */
export function itemDisplayName(item: CatalogItem): string {
  return item.localizedNames?.[ALIAS_SOURCE_LOCALE] ?? item.uniqueId;
}

/**
 * Fetch cleaned history; an HTTP failure only drops the history section
 */
async function fetchHistory(
  client: MarketDataClient,
  itemId: string,
  now: Date,
  log: Logger,
): Promise<CityHistory[] | undefined> {
  try {
    return groupHistoryByCity(await client.fetchPriceHistory(itemId, now));
  } catch (error) {
    if (error instanceof HttpError) {
      log.warn("Price history unavailable", {
        status: error.status,
        error: error.message,
      });
      return undefined;
    }
    throw error;
  }
}

/**
 * Resolve a query and build its price report
 *
 * @param query - Free-text item name, alias or identifier
 * @param deps - Catalog snapshot, market client and options
 * @throws {EmptyCatalogError} If the catalog is empty
 * @throws {InvalidQueryError} If the query is blank
 * @throws {HttpError} If current prices cannot be fetched
 */
export async function lookupPrices(
  query: string,
  deps: PriceLookupDeps,
): Promise<PriceLookupResult> {
  const now = deps.now ?? new Date();
  const [primary, ...suggestions] = resolveQuery(
    query,
    deps.catalog,
    deps.topK ?? DEFAULT_TOP_K,
  );
  const itemId = primary.item.uniqueId;
  const log = logger.withContext({ query, itemId });

  log.info("Query resolved", {
    distance: primary.distance,
    suggestions: suggestions.map((match) => match.item.uniqueId),
  });

  const prices = await deps.client.fetchCurrentPrices(itemId);
  const report = buildPriceReport(prices, now);
  const history = deps.includeHistory
    ? await fetchHistory(deps.client, itemId, now, log)
    : undefined;

  const text = renderPriceReport({
    itemName: itemDisplayName(primary.item),
    itemId,
    report,
    iconUrl: deps.client.itemIconUrl(itemId),
    suggestions: suggestions.map((match) => ({
      name: itemDisplayName(match.item),
      itemId: match.item.uniqueId,
    })),
    history,
  });

  return { primary, suggestions, prices, report, history, text };
}
