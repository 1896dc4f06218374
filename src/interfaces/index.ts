export type { MarketDataClient } from "./clients/marketDataClient";
