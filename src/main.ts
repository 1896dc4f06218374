#!/usr/bin/env node
/**
 * Price lookup CLI
 *
 * Usage:
 *   npm start -- t4.1 dagger
 *   npm start -- --history "adept's bag"
 *   npm start -- --refresh t4 bag
 *
 * Environment variables:
 *   - LOG_LEVEL: Logging level (debug, info, warn, error)
 *   - DB_PATH: Path to SQLite database file (optional, defaults to data/app.db)
 *   - CATALOG_SOURCE_URL: Item dump URL (optional)
 *   - LOOKUP_TOP_K: Number of ranked matches, primary + suggestions (optional, default 4)
 */

import "dotenv/config";
import { openDb, closeDb, applyPendingMigrations } from "./db";
import { AlbionDataClient } from "./clients/albionData";
import { CatalogStore, loadCatalogIntoStore } from "./catalog";
import { lookupPrices } from "./orchestration/priceLookup";
import { CLI_USAGE, parseCliArgs, resolveTopK } from "./config/cliArgs";
import { LOOKUP_TOP_K_ENV } from "./constants";
import * as logger from "./logger";

async function main(): Promise<void> {
  const options = parseCliArgs(process.argv.slice(2));
  if (!options.query) {
    logger.error(CLI_USAGE);
    process.exitCode = 1;
    return;
  }

  const db = openDb();
  try {
    applyPendingMigrations(db);

    const client = new AlbionDataClient();
    const store = new CatalogStore();
    const snapshot = await loadCatalogIntoStore(store, {
      refresh: options.refresh,
      client,
    });
    logger.debug("Catalog ready", {
      items: snapshot.items.length,
      source: snapshot.source,
    });

    const result = await lookupPrices(options.query, {
      catalog: store.current().items,
      client,
      topK: resolveTopK(process.env[LOOKUP_TOP_K_ENV]),
      includeHistory: options.history,
    });

    console.log(result.text);
  } finally {
    closeDb();
  }
}

main().catch((error: unknown) => {
  logger.error("Fatal error", {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
