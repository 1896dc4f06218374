/**
 * Catalog configuration constants
 *
 * Identifier grammar, alias-generation word sets and catalog source.
 */

/**
 * Public formatted item dump (JSON array of items).
 *
 * Overridable through the CATALOG_SOURCE_URL environment variable.
 */
export const DEFAULT_CATALOG_SOURCE_URL =
  "https://raw.githubusercontent.com/broderickhyman/ao-bin-dumps/master/formatted/items.json";

export const CATALOG_SOURCE_URL_ENV = "CATALOG_SOURCE_URL";

/**
 * Key of the enriched catalog row in the catalog_cache table
 */
export const CATALOG_CACHE_KEY = "items";

/**
 * Identifier grammar: T<tier>_<NAME>, optionally followed by @<enchant>.
 *
 * Not anchored: the first occurrence anywhere in the identifier wins.
 * Capture groups: 1 = tier, 2 = base name, 3 = enchant.
 */
export const IDENTIFIER_PATTERN = /T(\d+)_(\w+)(?:@(\d+))?/;

export const DEFAULT_TIER = 1;
export const MIN_TIER = 1;
export const MAX_TIER = 8;
export const DEFAULT_ENCHANT = 0;

/**
 * Locale whose display name feeds the long-form substitution rules
 */
export const ALIAS_SOURCE_LOCALE = "EN-US";

/**
 * Leading words that spell out tiers 3-8 (replaced by T<tier>)
 */
export const TIER_LONG_NAMES: ReadonlySet<string> = new Set([
  "Journeyman's",
  "Adept's",
  "Expert's",
  "Master's",
  "Grandmaster's",
  "Elder's",
]);

/**
 * Leading words that spell out enchantments 1-3 on resources
 */
export const ENCHANT_LONG_NAMES: ReadonlySet<string> = new Set([
  "Uncommon",
  "Rare",
  "Exceptional",
  "Cured",
]);

/**
 * Resource material names (woods, ores and metals, hides and leathers, fibers and cloths).
 *
 * When one of these follows an enchantment word, an extra alias
 * without the material is generated ("Rare Pine Logs" -> "T5.2 Logs").
 */
export const RESOURCE_NAMES: ReadonlySet<string> = new Set([
  // Woods
  "Birch",
  "Pine",
  "Cedar",
  "Bloodoak",
  "Ashenbark",
  "Whitewood",
  // Ores and metals
  "Copper",
  "Tin",
  "Iron",
  "Titanium",
  "Runite",
  "Meteorite",
  "Adamantium",
  "Bronze",
  // Hides
  "Rugged",
  "Thin",
  "Medium",
  "Heavy",
  "Robust",
  "Thick",
  "Resilient",
  // Leathers
  "Stiff",
  "Worked",
  "Cured",
  "Hardened",
  "Reinforced",
  "Fortified",
  // Cloths
  "Simple",
  "Neat",
  "Fine",
  "Ornate",
  "Lavish",
  "Opulent",
  "Baroque",
]);
