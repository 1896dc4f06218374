/**
 * Albion Data Project API type definitions
 *
 * Raw response types from the public market data API.
 * Documentation: https://www.albion-online-data.com/
 *
 * These types must NOT be re-exported from the global types barrel.
 * They are internal to the Albion Data client and are mapped to
 * canonical types (CityPrice, HistorySeries) before leaving it.
 */

/**
 * Row of /stats/prices/{itemId}
 *
 * Only fields used by the mappers are typed.
 */
export type AlbionPriceRow = {
  item_id: string;
  city: string;
  quality?: number;
  sell_price_min: number;
  sell_price_min_date: string;
  buy_price_max: number;
  buy_price_max_date: string;
};

/**
 * Row of /stats/charts/{itemId}
 */
export type AlbionHistoryRow = {
  location: string;
  item_id: string;
  quality: number;
  data: {
    timestamps: string[];
    prices_avg: number[];
    item_count: number[];
  };
};
