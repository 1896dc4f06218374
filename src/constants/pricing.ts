/**
 * Pricing constants — market locations, quality labels, report tunables
 */

/**
 * Locations requested from the price API (API spelling, no spaces)
 */
export const MARKET_LOCATIONS = [
  "Caerleon",
  "Lymhurst",
  "Martlock",
  "Bridgewatch",
  "FortSterling",
  "Thetford",
  "ArthursRest",
  "MerlynsRest",
  "MorganasRest",
  "BlackMarket",
] as const;

/**
 * Suffix appended to the city name per item quality.
 * Qualities 0 (no quality) and 1 (normal) have none.
 */
export const QUALITY_LABELS: Readonly<Record<number, string>> = {
  2: "Good",
  3: "Outstanding",
  4: "Excellent",
  5: "Masterpiece",
};

/**
 * Prices older than this (three years, in seconds) are shown as NIL.
 * The API reports never-seen prices with a 0001-01-01 timestamp.
 */
export const STALE_PRICE_AGE_SECONDS = 94_608_000;

export const SECONDS_PER_HOUR = 3600;
export const SECONDS_PER_MINUTE = 60;

/**
 * Number of days of history requested for a lookup
 */
export const HISTORY_DAYS = 7;

/**
 * Quality whose history is charted (normal quality)
 */
export const HISTORY_QUALITY = 1;

/**
 * History time scale in hours
 */
export const HISTORY_TIME_SCALE = 1;

/**
 * Scaled median deviation at or above which a price is an outlier
 */
export const OUTLIER_THRESHOLD = 10;
