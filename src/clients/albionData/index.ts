export { AlbionDataClient, formatHistoryDate } from "./albionDataClient";
export type { AlbionDataClientConfig } from "./albionDataClient";
export {
  isAlbionPriceRow,
  isAlbionHistoryRow,
  mapPriceResponse,
  mapHistoryResponse,
} from "./mappers";
