/**
 * Pricing type definitions
 *
 * Canonical shapes for market prices, independent of the Albion Data
 * Project payloads (see types/clients/albionData.ts for those).
 */

/**
 * Current market state for one item in one city at one quality.
 */
export type CityPrice = {
  itemId: string;
  city: string;
  /** Item quality (1-5), 0 for items without quality */
  quality: number;
  sellPriceMin: number;
  /** UTC timestamp without zone (e.g., "2024-03-01T12:00:00") */
  sellPriceMinDate: string;
  buyPriceMax: number;
  buyPriceMaxDate: string;
};

/**
 * One printable row of a price report.
 */
export type PriceLine = {
  /** City name plus quality suffix (e.g., "Lymhurst (Good)") */
  location: string;
  price: number;
  /** Relative age of the price (e.g., "3 mins ago") */
  updated: string;
};

/**
 * Current prices split into sell and buy orders.
 */
export type PriceReport = {
  sellOrders: PriceLine[];
  buyOrders: PriceLine[];
  /** False when the API returned no rows at all */
  hasData: boolean;
};

/**
 * Historical series for one location and quality.
 */
export type HistorySeries = {
  location: string;
  itemId: string;
  quality: number;
  timestamps: string[];
  pricesAvg: number[];
  itemCounts: number[];
};

/**
 * History merged per city after outlier rejection.
 */
export type CityHistory = {
  location: string;
  timestamps: string[];
  prices: number[];
  itemCounts: number[];
};

/**
 * Result of outlier rejection over a numeric series.
 */
export type OutlierRejection = {
  kept: number[];
  /** Indices (into the input) of the kept values */
  indices: number[];
};
