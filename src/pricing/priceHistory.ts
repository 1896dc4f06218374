/**
 * Price history cleanup
 *
 * Merges history series per city and drops price spikes. A single
 * mistyped sell order can be orders of magnitude off and would flatten
 * every other point of the series.
 */

import type { CityHistory, HistorySeries, OutlierRejection } from "@/types";
import { HISTORY_QUALITY, OUTLIER_THRESHOLD } from "@/constants/pricing";

/**
 * Median of a non-empty list (mean of the two middle values for even lengths)
 */
export function median(values: readonly number[]): number {
  if (values.length === 0) {
    throw new RangeError("median of an empty list");
  }
  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1
    ? sorted[middle]
    : (sorted[middle - 1] + sorted[middle]) / 2;
}

/**
 * Drop values far from the median.
 *
 * Each value's distance to the median is divided by the median of those
 * distances; values scoring below `threshold` are kept. When the median
 * distance is 0 every score is 0, so everything is kept.
 *
 * @example
 * rejectOutliers([10, 11, 12, 1000])
 * // { kept: [10, 11, 12], indices: [0, 1, 2] }
 */
export function rejectOutliers(
  values: readonly number[],
  threshold: number = OUTLIER_THRESHOLD,
): OutlierRejection {
  if (values.length === 0) {
    return { kept: [], indices: [] };
  }

  const center = median(values);
  const deviations = values.map((value) => Math.abs(value - center));
  const spread = median(deviations);

  const indices: number[] = [];
  deviations.forEach((deviation, index) => {
    const score = spread ? deviation / spread : 0;
    if (score < threshold) {
      indices.push(index);
    }
  });

  return { kept: indices.map((index) => values[index]), indices };
}

function pick<T>(values: readonly T[], indices: readonly number[]): T[] {
  return indices.filter((index) => index < values.length).map((index) => values[index]);
}

/**
 * Merge series per location and remove price outliers
 *
 * Only series of the given quality are used. Timestamps and item counts
 * follow the prices that survive outlier rejection.
 *
 * @param series - History rows as returned by the API
 * @param quality - Quality to keep (default normal quality)
 * @returns One entry per location, sorted by location name
 */
export function groupHistoryByCity(
  series: readonly HistorySeries[],
  quality: number = HISTORY_QUALITY,
): CityHistory[] {
  const merged = new Map<string, CityHistory>();

  for (const entry of series) {
    if (entry.quality !== quality) {
      continue;
    }
    const city = merged.get(entry.location) ?? {
      location: entry.location,
      timestamps: [],
      prices: [],
      itemCounts: [],
    };
    city.timestamps.push(...entry.timestamps);
    city.prices.push(...entry.pricesAvg);
    city.itemCounts.push(...entry.itemCounts);
    merged.set(entry.location, city);
  }

  return [...merged.values()]
    .sort((a, b) => a.location.localeCompare(b.location))
    .map((city) => {
      const { kept, indices } = rejectOutliers(city.prices);
      return {
        location: city.location,
        timestamps: pick(city.timestamps, indices),
        prices: kept,
        itemCounts: pick(city.itemCounts, indices),
      };
    });
}
