/**
 * Database constants
 */

export const DB_PATH_ENV = "DB_PATH";

/**
 * Default database location, relative to the working directory
 */
export const DEFAULT_DB_RELATIVE_PATH = ["data", "app.db"] as const;

/**
 * SQLite in-memory database path
 */
export const IN_MEMORY_DB_PATH = ":memory:";

/**
 * Directory holding the *.sql migration files, relative to the working directory
 */
export const MIGRATIONS_DIR = "migrations";
