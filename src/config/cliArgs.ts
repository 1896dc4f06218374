/**
 * Command-line and environment options for the lookup CLI
 */

import { DEFAULT_TOP_K } from "@/constants/matching";
import * as logger from "@/logger";

export type CliOptions = {
  /** Query words joined by single spaces ("" when none were given) */
  query: string;
  /** Ignore the catalog cache */
  refresh: boolean;
  /** Fetch price history too */
  history: boolean;
};

export const CLI_USAGE =
  "Usage: npm start -- [--refresh] [--history] <item name or id>";

/**
 * Parse CLI arguments (without the node and script entries)
 *
 * Flags may appear anywhere; every other argument is part of the query.
 *
 * @example
 * parseCliArgs(["--history", "t4", "bag"])
 * // { query: "t4 bag", refresh: false, history: true }
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const words: string[] = [];
  let refresh = false;
  let history = false;

  for (const arg of argv) {
    if (arg === "--refresh") {
      refresh = true;
    } else if (arg === "--history") {
      history = true;
    } else {
      words.push(arg);
    }
  }

  return { query: words.join(" ").trim(), refresh, history };
}

/**
 * Resolve topK from a raw environment value
 *
 * Missing values use the default; invalid ones are logged and use it too.
 */
export function resolveTopK(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === "") {
    return DEFAULT_TOP_K;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    logger.warn("Ignoring invalid LOOKUP_TOP_K", { value: raw, fallback: DEFAULT_TOP_K });
    return DEFAULT_TOP_K;
  }
  return value;
}
