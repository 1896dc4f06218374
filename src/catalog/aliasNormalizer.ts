/**
 * Alias generation for catalog items
 *
 * Players rarely type "Adept's Dagger" or "T4_ADEPTS_DAGGER@1"; they
 * type "t4.1 dagger". Each rule below derives such shorthand names
 * from the identifier and the English display name.
 *
 * Rules (applied in order, appending to commonNames):
 * 1. Tier/enchant shorthand from the identifier ("T4.1 ADEPTS_DAGGER")
 * 2. Long tier word replaced by the tier code ("Adept's Bag" -> "T4.0 Bag")
 * 3. Enchantment word replaced by the tier code, optionally dropping
 *    the material word ("Rare Pine Logs" -> "T5.2 Pine Logs", "T5.2 Logs")
 *
 * Aliases are never deduplicated or case-normalized here; the matcher
 * lowercases at query time.
 */

import type {
  CatalogItem,
  LocalizedNames,
  ParsedIdentifier,
  RawItem,
} from "@/types/catalog";
import {
  ALIAS_SOURCE_LOCALE,
  ENCHANT_LONG_NAMES,
  RESOURCE_NAMES,
  TIER_LONG_NAMES,
} from "@/constants/catalog";
import { parseIdentifier } from "./identifierParser";

/**
 * Dotted tier code, e.g. "T4.1"
 */
function dottedCode(id: ParsedIdentifier): string {
  return `T${id.tier}.${id.enchant}`;
}

/**
 * Bare tier code, e.g. "T4"
 */
function bareCode(id: ParsedIdentifier): string {
  return `T${id.tier}`;
}

/**
 * Tier codes an alias is generated for: the dotted code always,
 * the bare code only for unenchanted items.
 */
function tierCodes(id: ParsedIdentifier): string[] {
  return id.enchant === 0 ? [dottedCode(id), bareCode(id)] : [dottedCode(id)];
}

/**
 * Splits the alias-source display name into words.
 *
 * @returns Words of the name, or null when the locale is missing or the name is blank
 */
function sourceWords(localizedNames: LocalizedNames | null): string[] | null {
  if (!localizedNames) {
    return null;
  }
  const name = localizedNames[ALIAS_SOURCE_LOCALE];
  if (typeof name !== "string") {
    return null;
  }
  const words = name.split(/\s+/).filter((word) => word.length > 0);
  return words.length > 0 ? words : null;
}

function withCode(code: string, words: readonly string[]): string {
  return [code, ...words].join(" ");
}

/**
 * Rule 1: "T{tier}.{enchant} {baseName}", plus "T{tier} {baseName}" when unenchanted.
 */
function tierShorthandAliases(id: ParsedIdentifier): string[] {
  return tierCodes(id).map((code) => `${code} ${id.baseName}`);
}

/**
 * Rule 2: replace a leading long tier word ("Adept's") by the tier code.
 */
function longTierAliases(id: ParsedIdentifier, words: string[] | null): string[] {
  if (!words || !TIER_LONG_NAMES.has(words[0])) {
    return [];
  }
  const rest = words.slice(1);
  return tierCodes(id).map((code) => withCode(code, rest));
}

/**
 * Rule 3: replace a leading enchantment word ("Rare") by the tier code.
 * A material word right after it ("Rare Pine Logs") yields a second
 * alias without the material.
 */
function longEnchantAliases(id: ParsedIdentifier, words: string[] | null): string[] {
  if (!words || !ENCHANT_LONG_NAMES.has(words[0])) {
    return [];
  }
  const rest = words.slice(1);
  const hasMaterial = words.length > 1 && RESOURCE_NAMES.has(words[1]);

  const aliases: string[] = [];
  for (const code of tierCodes(id)) {
    aliases.push(withCode(code, rest));
    if (hasMaterial) {
      aliases.push(withCode(code, words.slice(2)));
    }
  }
  return aliases;
}

/**
 * Generates the common names of a single item, in rule order.
 *
 * @param item - Raw item (or an already enriched one; its previous aliases are ignored)
 * @returns Generated aliases, possibly with duplicates
 */
export function generateCommonNames(item: RawItem): string[] {
  const id = parseIdentifier(item.uniqueId);
  const words = sourceWords(item.localizedNames);

  return [
    ...tierShorthandAliases(id),
    ...longTierAliases(id, words),
    ...longEnchantAliases(id, words),
  ];
}

/**
 * Builds the searchable catalog from raw items.
 *
 * Output order matches input order, so catalog indices stay stable.
 * Input items are not mutated; each output item is a new object.
 *
 * @param rawItems - Validated raw items (or a previously enriched catalog)
 * @returns Enriched catalog
 *
 * @example
 * enrichCatalog([{ uniqueId: "T4_BAG", localizedNames: { "EN-US": "Adept's Bag" } }])
 * // [{ uniqueId: "T4_BAG", localizedNames: {...},
 * //    commonNames: ["T4.0 BAG", "T4 BAG", "T4.0 Bag", "T4 Bag"] }]
 */
export function enrichCatalog(rawItems: readonly RawItem[]): CatalogItem[] {
  return rawItems.map((item) => ({
    uniqueId: item.uniqueId,
    localizedNames: item.localizedNames,
    commonNames: generateCommonNames(item),
  }));
}
