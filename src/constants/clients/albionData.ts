/**
 * Albion Data client constants — base URLs, HTTP tunables
 *
 * Albion Data Project API documentation: https://www.albion-online-data.com/
 */

/**
 * Market data API base URL (v2)
 */
export const ALBION_DATA_API_BASE_URL =
  "https://www.albion-online-data.com/api/v2";

/**
 * Item icon renderer base URL (append "<itemId>.png")
 */
export const ALBION_ITEM_ICON_BASE_URL =
  "https://render.albiononline.com/v1/item/";

/**
 * HTTP timeout for price requests (milliseconds)
 */
export const ALBION_DATA_HTTP_TIMEOUT_MS = 15000;

/**
 * HTTP timeout for the item dump download (milliseconds)
 * The dump is several megabytes
 */
export const ALBION_ITEM_DUMP_TIMEOUT_MS = 60000;

/**
 * Maximum retry attempts for transient API failures
 */
export const ALBION_DATA_HTTP_MAX_ATTEMPTS = 2;

/**
 * Default HTTP headers for Albion Data requests
 */
export const ALBION_DATA_HTTP_HEADERS = {
  Accept: "application/json",
  "User-Agent": "albion-price-lookup/1.0",
} as const;
