/**
 * Unit tests for item identifier parsing
 *
 * Pure function, no DB, no network
 */

import { describe, it, expect } from "vitest";
import { parseIdentifier } from "@/catalog";

describe("parseIdentifier", () => {
  describe("well-formed identifiers", () => {
    it("should parse tier, base name and enchant", () => {
      expect(parseIdentifier("T4_ADEPTS_DAGGER@1")).toEqual({
        tier: 4,
        baseName: "ADEPTS_DAGGER",
        enchant: 1,
      });
    });

    it("should default enchant to 0 without an @ suffix", () => {
      expect(parseIdentifier("T4_BAG")).toEqual({
        tier: 4,
        baseName: "BAG",
        enchant: 0,
      });
    });

    it("should keep digits and underscores in the base name", () => {
      expect(parseIdentifier("T4_HIDE_LEVEL1@1")).toEqual({
        tier: 4,
        baseName: "HIDE_LEVEL1",
        enchant: 1,
      });
      expect(parseIdentifier("T8_2H_CLAYMORE@3")).toEqual({
        tier: 8,
        baseName: "2H_CLAYMORE",
        enchant: 3,
      });
    });

    it("should use the first tier pattern found anywhere in the identifier", () => {
      expect(parseIdentifier("QUESTITEM_T5_TOKEN")).toEqual({
        tier: 5,
        baseName: "TOKEN",
        enchant: 0,
      });
    });

    it("should ignore a dangling @ without digits", () => {
      expect(parseIdentifier("T4_BAG@")).toEqual({
        tier: 4,
        baseName: "BAG",
        enchant: 0,
      });
    });
  });

  describe("malformed identifiers", () => {
    it("should fall back to defaults with the whole identifier as base name", () => {
      expect(parseIdentifier("UNIQUE_HIDEOUT")).toEqual({
        tier: 1,
        baseName: "UNIQUE_HIDEOUT",
        enchant: 0,
      });
    });

    it("should treat a missing tier number as no match", () => {
      expect(parseIdentifier("T_BAG")).toEqual({
        tier: 1,
        baseName: "T_BAG",
        enchant: 0,
      });
    });

    it("should be case-sensitive on the tier prefix", () => {
      expect(parseIdentifier("t4_bag")).toEqual({
        tier: 1,
        baseName: "t4_bag",
        enchant: 0,
      });
    });

    it("should handle the empty identifier", () => {
      expect(parseIdentifier("")).toEqual({
        tier: 1,
        baseName: "",
        enchant: 0,
      });
    });

    it("should reset an out-of-range tier but keep the rest", () => {
      expect(parseIdentifier("T9_BAG@2")).toEqual({
        tier: 1,
        baseName: "BAG",
        enchant: 2,
      });
      expect(parseIdentifier("T0_BAG")).toEqual({
        tier: 1,
        baseName: "BAG",
        enchant: 0,
      });
    });
  });

  it("should never throw", () => {
    const inputs = ["", "@", "T", "T4", "T4_", "@@@", "T4_BAG@@1", "🗡️"];
    for (const input of inputs) {
      expect(() => parseIdentifier(input)).not.toThrow();
    }
  });
});
