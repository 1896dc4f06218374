/**
 * SQLite connection singleton
 *
 * One connection per process. Repositories call getDb(); entry points
 * call openDb() first and closeDb() when done. Tests swap in their own
 * database through setDbForTesting().
 */

import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname, resolve } from "path";
import {
  DB_PATH_ENV,
  DEFAULT_DB_RELATIVE_PATH,
  IN_MEMORY_DB_PATH,
} from "@/constants/db";
import * as logger from "@/logger";

let db: Database.Database | null = null;

/**
 * DB_PATH, or data/app.db under the working directory
 */
export function resolveDbPath(env: NodeJS.ProcessEnv = process.env): string {
  const configured = env[DB_PATH_ENV]?.trim();
  if (configured === IN_MEMORY_DB_PATH) {
    return IN_MEMORY_DB_PATH;
  }
  return configured ? resolve(configured) : resolve(...DEFAULT_DB_RELATIVE_PATH);
}

/**
 * Open the connection (idempotent)
 *
 * Creates the parent directory of a file database. File databases use
 * WAL so a catalog refresh can write while another process reads.
 */
export function openDb(): Database.Database {
  if (db) {
    return db;
  }

  const dbPath = resolveDbPath();
  if (dbPath !== IN_MEMORY_DB_PATH) {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const connection = new Database(dbPath);
  connection.pragma("foreign_keys = ON");
  if (dbPath !== IN_MEMORY_DB_PATH) {
    connection.pragma("journal_mode = WAL");
  }

  logger.debug("Database opened", { dbPath });
  db = connection;
  return connection;
}

export function closeDb(): void {
  if (!db) {
    return;
  }
  db.close();
  db = null;
}

/**
 * Current connection
 *
 * @throws {Error} If openDb() has not been called
 */
export function getDb(): Database.Database {
  if (!db) {
    throw new Error("Database not opened. Call openDb() first.");
  }
  return db;
}

/**
 * Replace the singleton (null clears it). Test use only.
 */
export function setDbForTesting(testDb: Database.Database | null): void {
  db = testDb;
}
