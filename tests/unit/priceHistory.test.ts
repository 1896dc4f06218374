/**
 * Unit tests for price history cleanup
 *
 * Tests median, outlier rejection and per-city grouping
 * No DB, no network, no side effects
 */

import { describe, it, expect } from "vitest";
import { groupHistoryByCity, median, rejectOutliers } from "@/pricing";
import type { HistorySeries } from "@/types";

function createSeries(overrides: Partial<HistorySeries> = {}): HistorySeries {
  return {
    location: "Caerleon",
    itemId: "T4_BAG",
    quality: 1,
    timestamps: [],
    pricesAvg: [],
    itemCounts: [],
    ...overrides,
  };
}

describe("median", () => {
  it("should return the middle value of an odd list", () => {
    expect(median([3, 1, 2])).toBe(2);
  });

  it("should average the two middle values of an even list", () => {
    expect(median([4, 1, 3, 2])).toBe(2.5);
  });

  it("should not reorder the input", () => {
    const values = [3, 1, 2];
    median(values);
    expect(values).toEqual([3, 1, 2]);
  });

  it("should throw on an empty list", () => {
    expect(() => median([])).toThrow(RangeError);
  });
});

describe("rejectOutliers", () => {
  it("should drop a price spike", () => {
    expect(rejectOutliers([10, 11, 12, 1000])).toEqual({
      kept: [10, 11, 12],
      indices: [0, 1, 2],
    });
  });

  it("should keep everything when the median deviation is 0", () => {
    expect(rejectOutliers([5, 5, 5, 500])).toEqual({
      kept: [5, 5, 5, 500],
      indices: [0, 1, 2, 3],
    });
  });

  it("should apply a custom threshold", () => {
    // median 2.5, deviations [1.5, 0.5, 0.5, 7.5], spread 1
    expect(rejectOutliers([1, 2, 3, 10], 2)).toEqual({
      kept: [1, 2, 3],
      indices: [0, 1, 2],
    });
  });

  it("should return empty results for an empty series", () => {
    expect(rejectOutliers([])).toEqual({ kept: [], indices: [] });
  });
});

describe("groupHistoryByCity", () => {
  const series: HistorySeries[] = [
    createSeries({
      location: "Thetford",
      timestamps: ["t1", "t2"],
      pricesAvg: [100, 110],
      itemCounts: [5, 6],
    }),
    createSeries({
      location: "Caerleon",
      timestamps: ["t1"],
      pricesAvg: [200],
      itemCounts: [1],
    }),
    createSeries({
      location: "Caerleon",
      timestamps: ["t2", "t3", "t4"],
      pricesAvg: [210, 205, 9000],
      itemCounts: [2, 3, 1],
    }),
    createSeries({
      location: "Caerleon",
      quality: 2,
      timestamps: ["t1"],
      pricesAvg: [400],
      itemCounts: [1],
    }),
  ];

  it("should merge series per city, sort by name and drop outliers", () => {
    expect(groupHistoryByCity(series)).toEqual([
      {
        location: "Caerleon",
        timestamps: ["t1", "t2", "t3"],
        prices: [200, 210, 205],
        itemCounts: [1, 2, 3],
      },
      {
        location: "Thetford",
        timestamps: ["t1", "t2"],
        prices: [100, 110],
        itemCounts: [5, 6],
      },
    ]);
  });

  it("should only use the requested quality", () => {
    expect(groupHistoryByCity(series, 2)).toEqual([
      {
        location: "Caerleon",
        timestamps: ["t1"],
        prices: [400],
        itemCounts: [1],
      },
    ]);
  });

  it("should keep empty series empty", () => {
    expect(groupHistoryByCity([createSeries()])).toEqual([
      { location: "Caerleon", timestamps: [], prices: [], itemCounts: [] },
    ]);
  });
});
