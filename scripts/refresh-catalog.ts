#!/usr/bin/env tsx
/**
 * Rebuild the cached catalog from the item dump
 *
 * Downloads the dump, regenerates aliases and replaces the cached blob.
 *
 * Usage:
 *   npm run catalog:refresh
 */

import "dotenv/config";
import { openDb, closeDb, applyPendingMigrations } from "@/db";
import { loadCatalog } from "@/catalog";
import * as logger from "@/logger";

async function main(): Promise<void> {
  const db = openDb();
  try {
    applyPendingMigrations(db);
    const { items } = await loadCatalog({ refresh: true });
    logger.info("Catalog refreshed", { items: items.length });
  } finally {
    closeDb();
  }
}

main().catch((error: unknown) => {
  logger.error("Catalog refresh failed", {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
