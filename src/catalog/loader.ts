/**
 * Catalog loading
 *
 * Resolves the enriched catalog from the SQLite cache, or downloads
 * the item dump, generates aliases and writes the result back.
 *
 * The database must be open (openDb) before loading.
 */

import type {
  CatalogItem,
  CatalogSnapshot,
  CatalogSource,
} from "@/types/catalog";
import type { MarketDataClient } from "@/interfaces";
import { AlbionDataClient } from "@/clients/albionData";
import { getCatalogCache, saveCatalogCache } from "@/db";
import {
  CatalogValidationError,
  validateCatalogItems,
  validateItemDump,
} from "@/utils/catalogValidation";
import { CATALOG_CACHE_KEY } from "@/constants/catalog";
import { enrichCatalog } from "./aliasNormalizer";
import type { CatalogStore } from "./catalogStore";
import * as logger from "@/logger";

export interface LoadCatalogOptions {
  /** Ignore the cache and download the dump again */
  refresh?: boolean;
  /** Catalog source (defaults to AlbionDataClient) */
  client?: MarketDataClient;
}

export type LoadedCatalog = {
  items: CatalogItem[];
  source: CatalogSource;
};

/**
 * Read the cached catalog
 *
 * A payload that fails to parse or validate is treated as a miss so
 * the caller refetches; it is logged, not thrown.
 *
 * @returns Cached items, or null on miss or corrupt payload
 */
function readCachedCatalog(): CatalogItem[] | null {
  const row = getCatalogCache(CATALOG_CACHE_KEY);
  if (!row) {
    logger.debug("Catalog cache miss", { cacheKey: CATALOG_CACHE_KEY });
    return null;
  }

  try {
    const items = validateCatalogItems(JSON.parse(row.payload));
    logger.debug("Catalog cache hit", {
      cacheKey: CATALOG_CACHE_KEY,
      items: items.length,
      fetchedAt: row.fetched_at,
    });
    return items;
  } catch (error) {
    if (error instanceof SyntaxError || error instanceof CatalogValidationError) {
      logger.warn("Cached catalog is corrupt, refetching", {
        cacheKey: CATALOG_CACHE_KEY,
        error: error.message,
      });
      return null;
    }
    throw error;
  }
}

/**
 * Download, validate and enrich the item dump, then cache it
 *
 * @throws {CatalogValidationError} If the dump is malformed or has no usable items
 */
async function fetchAndEnrich(client: MarketDataClient): Promise<CatalogItem[]> {
  const dump = await client.fetchItemDump();
  const { items: rawItems, skipped } = validateItemDump(dump);

  if (skipped > 0) {
    logger.warn("Dropped item dump entries without UniqueName", { skipped });
  }
  if (rawItems.length === 0) {
    throw new CatalogValidationError("item dump contains no usable items");
  }

  const items = enrichCatalog(rawItems);

  saveCatalogCache({
    cache_key: CATALOG_CACHE_KEY,
    payload: JSON.stringify(items),
    item_count: items.length,
    source_url: client.catalogSourceUrl,
  });

  logger.info("Catalog enriched and cached", {
    items: items.length,
    aliases: items.reduce((sum, item) => sum + item.commonNames.length, 0),
  });

  return items;
}

/**
 * Load the enriched catalog.
 *
 * Steps:
 * 1. Unless refresh is set, return the cached catalog if present and valid
 * 2. Otherwise download the dump, enrich it and persist the blob
 *
 * @returns Items and where they came from
 * @throws {HttpError} If the dump download fails
 * @throws {CatalogValidationError} If the dump is malformed
 *
 * @example
 * openDb();
 * const { items, source } = await loadCatalog();
 * logger.info("Catalog ready", { items: items.length, source });
 */
export async function loadCatalog(
  options: LoadCatalogOptions = {},
): Promise<LoadedCatalog> {
  if (!options.refresh) {
    const cached = readCachedCatalog();
    if (cached) {
      return { items: cached, source: "cache" };
    }
  }

  const client = options.client ?? new AlbionDataClient();
  const items = await fetchAndEnrich(client);
  return { items, source: "remote" };
}

/**
 * Load the catalog and publish it as the store's new snapshot.
 *
 * The previous snapshot stays current until loading has fully succeeded.
 */
export async function loadCatalogIntoStore(
  store: CatalogStore,
  options: LoadCatalogOptions = {},
): Promise<CatalogSnapshot> {
  const { items, source } = await loadCatalog(options);
  return store.swap(items, source);
}
