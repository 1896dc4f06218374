/**
 * Integration Test — Catalog loader (offline)
 *
 * Real SQLite DB (temp file, real migrations) and the real
 * AlbionDataClient wired to the mock HTTP harness.
 *
 * Verifies:
 * 1. First load downloads, enriches and caches the dump
 * 2. Second load is served from cache without HTTP
 * 3. refresh bypasses the cache
 * 4. A corrupt cache blob is replaced by a fresh download
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createTestDb, type TestDbHarness } from "../../helpers/testDb";
import {
  createMockHttp,
  loadFixtureText,
  type MockHttp,
} from "../../helpers/mockHttp";
import { AlbionDataClient } from "@/clients/albionData";
import { CatalogStore, loadCatalog, loadCatalogIntoStore } from "@/catalog";
import { getCatalogCache, saveCatalogCache } from "@/db";
import { CatalogValidationError } from "@/utils";

const DUMP_URL = "https://dump.example.test/items.json";

describe("loadCatalog (offline)", () => {
  let harness: TestDbHarness | null = null;
  let mock: MockHttp;
  let client: AlbionDataClient;

  beforeEach(() => {
    harness = createTestDb();
    mock = createMockHttp();
    mock.on("GET", DUMP_URL, loadFixtureText("albionData/items.json"));
    client = new AlbionDataClient({
      httpRequest: mock.request,
      catalogSourceUrl: DUMP_URL,
    });
  });

  afterEach(() => {
    if (harness) {
      harness.cleanup();
      harness = null;
    }
  });

  it("should download, enrich and cache the dump on first load", async () => {
    const { items, source } = await loadCatalog({ client });

    expect(source).toBe("remote");
    expect(items.map((item) => item.uniqueId)).toEqual([
      "T4_BAG",
      "T5_BAG",
      "T4_CAPE",
      "T5_WOOD_LEVEL2@2",
      "UNIQUE_HIDEOUT",
    ]);
    expect(items[3].commonNames).toEqual([
      "T5.2 WOOD_LEVEL2",
      "T5.2 Pine Logs",
      "T5.2 Logs",
    ]);
    expect(items[4]).toEqual({
      uniqueId: "UNIQUE_HIDEOUT",
      localizedNames: null,
      commonNames: ["T1.0 UNIQUE_HIDEOUT", "T1 UNIQUE_HIDEOUT"],
    });

    const row = getCatalogCache("items");
    expect(row?.item_count).toBe(5);
    expect(row?.source_url).toBe(DUMP_URL);
    expect(JSON.parse(row?.payload ?? "null")).toEqual(items);
  });

  it("should serve the second load from cache without HTTP", async () => {
    const first = await loadCatalog({ client });
    const second = await loadCatalog({ client });

    expect(second.source).toBe("cache");
    expect(second.items).toEqual(first.items);
    expect(mock.getRecordedRequests()).toHaveLength(1);
  });

  it("should bypass the cache on refresh", async () => {
    await loadCatalog({ client });
    const refreshed = await loadCatalog({ client, refresh: true });

    expect(refreshed.source).toBe("remote");
    expect(mock.getRecordedRequests()).toHaveLength(2);
  });

  it("should refetch when the cached blob is not JSON", async () => {
    saveCatalogCache({
      cache_key: "items",
      payload: "{not json",
      item_count: 3,
      source_url: DUMP_URL,
    });

    const { source, items } = await loadCatalog({ client });

    expect(source).toBe("remote");
    expect(items).toHaveLength(5);
    expect(getCatalogCache("items")?.item_count).toBe(5);
  });

  it("should refetch when the cached blob has the wrong shape", async () => {
    saveCatalogCache({
      cache_key: "items",
      payload: JSON.stringify([{ uniqueId: "T4_BAG" }]),
      item_count: 1,
      source_url: DUMP_URL,
    });

    const { source } = await loadCatalog({ client });

    expect(source).toBe("remote");
    expect(mock.getRecordedRequests()).toHaveLength(1);
  });

  it("should fail when the dump has no usable items", async () => {
    mock.on("GET", DUMP_URL, [{ LocalizedNames: null }]);

    await expect(loadCatalog({ client })).rejects.toThrow(
      CatalogValidationError,
    );
    expect(getCatalogCache("items")).toBeNull();
  });

  it("should publish the loaded catalog into a store", async () => {
    const store = new CatalogStore();

    const snapshot = await loadCatalogIntoStore(store, { client });

    expect(store.current()).toBe(snapshot);
    expect(snapshot.source).toBe("remote");
    expect(snapshot.items).toHaveLength(5);
  });

  it("should keep the previous snapshot when a refresh fails", async () => {
    const store = new CatalogStore();
    const first = await loadCatalogIntoStore(store, { client });
    mock.onResponse("GET", DUMP_URL, { status: 500, body: "error" });

    await expect(
      loadCatalogIntoStore(store, { client, refresh: true }),
    ).rejects.toThrow("HTTP 500");
    expect(store.current()).toBe(first);
  });
});
