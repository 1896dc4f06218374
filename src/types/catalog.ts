/**
 * Catalog type definitions
 *
 * The catalog is the fixed list of in-game items that free-text
 * queries are resolved against.
 *
 * Two forms exist:
 * - RawItem: validated subset of a public item dump entry
 *   (UniqueName -> uniqueId, LocalizedNames -> localizedNames)
 * - CatalogItem: enriched item with generated aliases, used for matching
 */

/**
 * Locale code to display name (e.g., { "EN-US": "Adept's Dagger" })
 */
export type LocalizedNames = Readonly<Record<string, string>>;

/**
 * Validated item, before alias generation.
 */
export type RawItem = {
  /** Stable machine-readable key */
  readonly uniqueId: string;
  /** Display names per locale, null when the dump has none */
  readonly localizedNames: LocalizedNames | null;
};

/**
 * Structured view of an item identifier.
 *
 * Never persisted, only used while generating aliases.
 */
export type ParsedIdentifier = {
  /** Item power level (1-8) */
  tier: number;
  /** Middle token of the identifier (e.g., "ADEPTS_DAGGER") */
  baseName: string;
  /** Upgrade level, 0 when the identifier has no @ suffix */
  enchant: number;
};

/**
 * Enriched catalog item, the unit the matcher searches.
 */
export type CatalogItem = RawItem & {
  /** Generated aliases in rule order (duplicates allowed) */
  readonly commonNames: readonly string[];
};

/**
 * Ordered, index-stable item list.
 */
export type Catalog = readonly CatalogItem[];

/**
 * Where a loaded catalog came from.
 */
export type CatalogSource = "cache" | "remote";

/**
 * Immutable catalog snapshot held by the catalog store.
 */
export type CatalogSnapshot = {
  readonly items: Catalog;
  readonly source: CatalogSource;
  /** ISO timestamp of when the snapshot was built */
  readonly loadedAt: string;
};
