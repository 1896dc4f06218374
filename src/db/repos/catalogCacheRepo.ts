/**
 * Catalog cache repository
 *
 * Data access layer for catalog_cache table.
 * Stores the enriched catalog as one opaque JSON blob per cache key.
 */

import type { CatalogCacheInput, CatalogCacheRow } from "@/types";
import { getDb } from "@/db";

/**
 * Get cached catalog blob by key
 *
 * @param cacheKey - Cache key (e.g., "items")
 * @returns Cache row or null on cache miss
 */
export function getCatalogCache(cacheKey: string): CatalogCacheRow | null {
  const db = getDb();
  const row = db
    .prepare("SELECT * FROM catalog_cache WHERE cache_key = ?")
    .get(cacheKey) as CatalogCacheRow | undefined;

  return row ?? null;
}

/**
 * Store (or replace) a catalog blob
 *
 * fetched_at is reset to now on every write.
 *
 * @param input - Cache key, payload and metadata
 */
export function saveCatalogCache(input: CatalogCacheInput): void {
  const db = getDb();

  db.prepare(
    `
    INSERT INTO catalog_cache (cache_key, payload, item_count, source_url)
    VALUES (?, ?, ?, ?)
    ON CONFLICT(cache_key) DO UPDATE SET
      payload = excluded.payload,
      item_count = excluded.item_count,
      source_url = excluded.source_url,
      fetched_at = datetime('now')
  `,
  ).run(input.cache_key, input.payload, input.item_count, input.source_url);
}

/**
 * Delete a cached catalog blob (forces a refetch on next load)
 *
 * @param cacheKey - Cache key
 * @returns true if a row was deleted
 */
export function clearCatalogCache(cacheKey: string): boolean {
  const db = getDb();
  const result = db
    .prepare("DELETE FROM catalog_cache WHERE cache_key = ?")
    .run(cacheKey);
  return result.changes > 0;
}
