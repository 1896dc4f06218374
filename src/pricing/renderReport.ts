/**
 * Plain-text rendering of a price lookup
 */

import type { CityHistory, PriceLine, PriceReport } from "@/types";
import { HISTORY_DAYS } from "@/constants/pricing";

export type RenderedSuggestion = {
  name: string;
  itemId: string;
};

export type RenderReportInput = {
  itemName: string;
  itemId: string;
  report: PriceReport;
  iconUrl: string;
  suggestions: readonly RenderedSuggestion[];
  /** Cleaned history per city, omitted when history was not requested */
  history?: readonly CityHistory[];
};

function renderLines(title: string, lines: readonly PriceLine[]): string[] {
  if (lines.length === 0) {
    return [];
  }
  return [
    title,
    ...lines.map((line) => `  ${line.location}: ${line.price} (${line.updated})`),
  ];
}

/**
 * One summary line per city with data: min / avg / max and volume
 */
export function summarizeHistory(history: readonly CityHistory[]): string[] {
  const lines: string[] = [];
  for (const city of history) {
    if (city.prices.length === 0) {
      continue;
    }
    const min = Math.min(...city.prices);
    const max = Math.max(...city.prices);
    const avg = Math.round(
      city.prices.reduce((sum, price) => sum + price, 0) / city.prices.length,
    );
    const volume = city.itemCounts.reduce((sum, count) => sum + count, 0);
    lines.push(
      `  ${city.location}: min ${min} / avg ${avg} / max ${max} (volume ${volume})`,
    );
  }
  return lines;
}

/**
 * Render a lookup result as plain text
 *
 * @example
 * Current Prices for: Adept's Bag (T4_BAG)
 * Sell orders:
 *   Lymhurst: 2500 (3 mins ago)
 * Suggestions:
 *   1. Expert's Bag (T5_BAG)
 * Icon: https://render.albiononline.com/v1/item/T4_BAG.png
 */
export function renderPriceReport(input: RenderReportInput): string {
  const lines: string[] = [`Current Prices for: ${input.itemName} (${input.itemId})`];

  if (!input.report.hasData) {
    lines.push("NO DATA", "There are no data for this item.");
  } else {
    lines.push(...renderLines("Sell orders:", input.report.sellOrders));
    lines.push(...renderLines("Buy orders:", input.report.buyOrders));
  }

  if (input.history) {
    const summary = summarizeHistory(input.history);
    if (summary.length > 0) {
      lines.push(`${HISTORY_DAYS}-day history:`, ...summary);
    }
  }

  if (input.suggestions.length > 0) {
    lines.push(
      "Suggestions:",
      ...input.suggestions.map(
        (suggestion, index) => `  ${index + 1}. ${suggestion.name} (${suggestion.itemId})`,
      ),
    );
  }

  lines.push(`Icon: ${input.iconUrl}`);
  return lines.join("\n");
}
