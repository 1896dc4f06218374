/**
 * Fuzzy item matcher
 *
 * Ranks catalog items against free-text input by string distance.
 *
 * Every searchable field of every item is scored independently and
 * competes on its own:
 * - the identifier (uniqueId)
 * - the closest localized display name
 * - each generated common name
 *
 * The top-K is taken over that flat candidate list, WITHOUT reducing
 * to one entry per item. An item that wins through two fields appears
 * twice. Callers depend on this ordering (first = primary match, rest
 * = suggestions), so it must not be collapsed.
 */

import type { Catalog, CatalogItem, LocalizedNames } from "@/types/catalog";
import type { MatchCandidate, ResolvedMatch } from "@/types/matching";
import { DEFAULT_TOP_K, MAX_DISTANCE } from "@/constants/matching";
import { sequenceDistance } from "@/utils/text/sequenceSimilarity";
import { EmptyCatalogError, InvalidQueryError } from "./errors";

/**
 * Distance to the identifier, maximal when the identifier is empty.
 */
function identifierDistance(query: string, uniqueId: string): number {
  if (uniqueId.length === 0) {
    return MAX_DISTANCE;
  }
  return sequenceDistance(query, uniqueId.toLowerCase());
}

/**
 * Smallest distance across all locales, maximal when there are none.
 */
function localizedNameDistance(
  query: string,
  localizedNames: LocalizedNames | null,
): number {
  if (!localizedNames) {
    return MAX_DISTANCE;
  }
  const names = Object.values(localizedNames);
  if (names.length === 0) {
    return MAX_DISTANCE;
  }
  return Math.min(
    ...names.map((name) => sequenceDistance(query, name.toLowerCase())),
  );
}

/**
 * Scores all fields of one item, in fixed field order.
 */
function scoreItem(
  query: string,
  item: CatalogItem,
  itemIndex: number,
): MatchCandidate[] {
  const candidates: MatchCandidate[] = [
    { distance: identifierDistance(query, item.uniqueId), itemIndex },
    { distance: localizedNameDistance(query, item.localizedNames), itemIndex },
  ];
  for (const commonName of item.commonNames) {
    candidates.push({
      distance: sequenceDistance(query, commonName.toLowerCase()),
      itemIndex,
    });
  }
  return candidates;
}

function validateTopK(topK: number): void {
  if (!Number.isInteger(topK) || topK < 1) {
    throw new InvalidQueryError(`topK must be a positive integer, got ${topK}`);
  }
}

/**
 * Ranks catalog candidates by distance to the query.
 *
 * Ordering: ascending distance, then ascending item index, then field
 * order within the item (identifier, best localized name, common names).
 * Identical inputs always produce identical output.
 *
 * @param query - Free-text user input (case-insensitive)
 * @param catalog - Enriched catalog, not mutated
 * @param topK - Number of candidates to return (default 4)
 * @returns Best candidates first, possibly repeating an item index
 * @throws {EmptyCatalogError} If the catalog has no items
 * @throws {InvalidQueryError} If the query is blank or topK is not a positive integer
 *
 * @example
 * matchCatalog("t4 bag", catalog)
 * // [{ distance: 0, itemIndex: 12 }, { distance: 0, itemIndex: 12 }, ...]
 */
export function matchCatalog(
  query: string,
  catalog: Catalog,
  topK: number = DEFAULT_TOP_K,
): MatchCandidate[] {
  if (catalog.length === 0) {
    throw new EmptyCatalogError();
  }
  if (query.trim().length === 0) {
    throw new InvalidQueryError("query is empty");
  }
  validateTopK(topK);

  const lowered = query.toLowerCase();

  const candidates: MatchCandidate[] = [];
  catalog.forEach((item, itemIndex) => {
    candidates.push(...scoreItem(lowered, item, itemIndex));
  });

  // Array.prototype.sort is stable: equal keys keep field order
  candidates.sort(
    (x, y) => x.distance - y.distance || x.itemIndex - y.itemIndex,
  );

  return candidates.slice(0, topK);
}

/**
 * Same ranking as matchCatalog, with each candidate's item attached.
 *
 * The first entry is the primary match; the rest are suggestions.
 */
export function resolveQuery(
  query: string,
  catalog: Catalog,
  topK: number = DEFAULT_TOP_K,
): ResolvedMatch[] {
  return matchCatalog(query, catalog, topK).map((candidate) => ({
    ...candidate,
    item: catalog[candidate.itemIndex],
  }));
}
