/**
 * Item identifier parsing
 *
 * Extracts the (tier, base name, enchant) triple from identifiers like
 * "T4_ADEPTS_DAGGER@1". Unknown formats degrade to defaults instead of
 * failing, so every item still gets a usable base name.
 */

import type { ParsedIdentifier } from "@/types/catalog";
import {
  DEFAULT_ENCHANT,
  DEFAULT_TIER,
  IDENTIFIER_PATTERN,
  MAX_TIER,
  MIN_TIER,
} from "@/constants/catalog";

/**
 * Parses a digit group, returning the fallback when it is missing or not an integer.
 */
function parseIntOr(value: string | undefined, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isSafeInteger(parsed) ? parsed : fallback;
}

/**
 * Parses an item identifier into its structured parts.
 *
 * The first `T<tier>_<NAME>[@<enchant>]` occurrence is used. Tier and
 * enchant fall back to their defaults independently; a tier outside
 * 1-8 counts as unparseable.
 *
 * @param uniqueId - Raw item identifier
 * @returns Parsed identifier, never throws
 *
 * @example
 * parseIdentifier("T4_ADEPTS_DAGGER@1")
 * // { tier: 4, baseName: "ADEPTS_DAGGER", enchant: 1 }
 *
 * parseIdentifier("UNIQUE_HIDEOUT")
 * // { tier: 1, baseName: "UNIQUE_HIDEOUT", enchant: 0 }
 */
export function parseIdentifier(uniqueId: string): ParsedIdentifier {
  const match = IDENTIFIER_PATTERN.exec(uniqueId);
  if (!match) {
    return { tier: DEFAULT_TIER, baseName: uniqueId, enchant: DEFAULT_ENCHANT };
  }

  const [, rawTier, baseName, rawEnchant] = match;

  const tier = parseIntOr(rawTier, DEFAULT_TIER);
  const enchant = parseIntOr(rawEnchant, DEFAULT_ENCHANT);

  return {
    tier: tier >= MIN_TIER && tier <= MAX_TIER ? tier : DEFAULT_TIER,
    baseName,
    enchant: enchant >= 0 ? enchant : DEFAULT_ENCHANT,
  };
}
