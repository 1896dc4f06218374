/**
 * Database type definitions
 *
 * Aligned with schema in migrations/0001_catalog_cache.sql
 */

/**
 * Cached catalog blob
 * Stored in catalog_cache table, one row per cache key
 */
export type CatalogCacheRow = {
  cache_key: string;
  /** JSON-encoded CatalogItem[] */
  payload: string;
  item_count: number;
  source_url: string;
  fetched_at: string;
};

/**
 * Input for writing a catalog blob
 */
export type CatalogCacheInput = {
  cache_key: string;
  payload: string;
  item_count: number;
  source_url: string;
};
