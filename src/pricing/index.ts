export { buildPriceReport, formatPriceAge, formatLocation } from "./priceReport";
export { groupHistoryByCity, rejectOutliers, median } from "./priceHistory";
export { renderPriceReport, summarizeHistory } from "./renderReport";
export type { RenderReportInput, RenderedSuggestion } from "./renderReport";
