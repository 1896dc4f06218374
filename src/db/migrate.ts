/**
 * Database migrations
 *
 * Applies migrations/*.sql in file-name order. Applied file names are
 * recorded in schema_migrations; each file runs in its own transaction
 * together with its record.
 *
 * Usage:
 *   npm run migrate
 */

import type Database from "better-sqlite3";
import { existsSync, readdirSync, readFileSync } from "fs";
import { join } from "path";
import { MIGRATIONS_DIR } from "@/constants/db";
import * as logger from "@/logger";
import { closeDb, openDb } from "./connection";

type MigrationRecord = { version: string };

function migrationsPath(): string {
  return join(process.cwd(), MIGRATIONS_DIR);
}

/**
 * SQL files in apply order, [] when the directory is missing
 */
function listMigrationFiles(): string[] {
  const dir = migrationsPath();
  if (!existsSync(dir)) {
    logger.warn("Migrations directory not found", { dir });
    return [];
  }
  return readdirSync(dir)
    .filter((file) => file.endsWith(".sql"))
    .sort();
}

function appliedVersions(db: Database.Database): Set<string> {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      version TEXT NOT NULL UNIQUE,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);
  const rows = db
    .prepare("SELECT version FROM schema_migrations")
    .all() as MigrationRecord[];
  return new Set(rows.map((row) => row.version));
}

/**
 * Apply all pending migrations to an open connection
 *
 * @returns File names applied by this call, in order
 */
export function applyPendingMigrations(db: Database.Database): string[] {
  const applied = appliedVersions(db);
  const pending = listMigrationFiles().filter((file) => !applied.has(file));
  const record = db.prepare("INSERT INTO schema_migrations (version) VALUES (?)");

  for (const file of pending) {
    const sql = readFileSync(join(migrationsPath(), file), "utf-8");
    logger.debug("Applying migration", { migration: file });
    db.transaction(() => {
      db.exec(sql);
      record.run(file);
    })();
  }
  return pending;
}

/**
 * Migrate the configured database (DB_PATH), then close it
 */
export function runMigrations(): void {
  const db = openDb();
  try {
    const applied = applyPendingMigrations(db);
    logger.info(applied.length > 0 ? "Migrations complete" : "No pending migrations", {
      applied,
    });
  } finally {
    closeDb();
  }
}

if (require.main === module) {
  runMigrations();
}
