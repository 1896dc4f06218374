/**
 * Integration Test — Catalog cache repository
 *
 * Real SQLite DB with real migrations. Verifies the blob round trip
 * and upsert semantics of the catalog_cache table.
 */

import { describe, it, expect, afterEach } from "vitest";
import { createTestDb, type TestDbHarness } from "../../helpers/testDb";
import {
  clearCatalogCache,
  getCatalogCache,
  saveCatalogCache,
} from "@/db";

describe("catalogCacheRepo", () => {
  let harness: TestDbHarness | null = null;

  afterEach(() => {
    if (harness) {
      harness.cleanup();
      harness = null;
    }
  });

  it("should return null on a cache miss", () => {
    harness = createTestDb();

    expect(getCatalogCache("items")).toBeNull();
  });

  it("should round-trip a payload", () => {
    harness = createTestDb();
    const payload = JSON.stringify([
      { uniqueId: "T4_BAG", localizedNames: null, commonNames: ["T4.0 BAG"] },
    ]);

    saveCatalogCache({
      cache_key: "items",
      payload,
      item_count: 1,
      source_url: "https://dump.example.test/items.json",
    });

    const row = getCatalogCache("items");
    expect(row).not.toBeNull();
    expect(row?.payload).toBe(payload);
    expect(row?.item_count).toBe(1);
    expect(row?.source_url).toBe("https://dump.example.test/items.json");
    expect(row?.fetched_at).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/);
  });

  it("should overwrite an existing key", () => {
    harness = createTestDb();

    saveCatalogCache({
      cache_key: "items",
      payload: "[1]",
      item_count: 1,
      source_url: "https://dump.example.test/old.json",
    });
    saveCatalogCache({
      cache_key: "items",
      payload: "[1,2]",
      item_count: 2,
      source_url: "https://dump.example.test/new.json",
    });

    const count = harness.db
      .prepare("SELECT COUNT(*) AS n FROM catalog_cache")
      .get();
    expect(count).toEqual({ n: 1 });
    expect(getCatalogCache("items")?.payload).toBe("[1,2]");
    expect(getCatalogCache("items")?.item_count).toBe(2);
  });

  it("should clear a key", () => {
    harness = createTestDb();
    saveCatalogCache({
      cache_key: "items",
      payload: "[]",
      item_count: 0,
      source_url: "https://dump.example.test/items.json",
    });

    expect(clearCatalogCache("items")).toBe(true);
    expect(clearCatalogCache("items")).toBe(false);
    expect(getCatalogCache("items")).toBeNull();
  });
});
