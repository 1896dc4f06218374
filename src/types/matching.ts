/**
 * Matching type definitions
 *
 * Types for the ranked output of the fuzzy matcher.
 */

import type { CatalogItem } from "./catalog";

/**
 * Single scored candidate.
 *
 * Every searchable field of every item produces one candidate, so the
 * same itemIndex can appear several times in a ranking.
 */
export type MatchCandidate = {
  /** Dissimilarity in [0, 1], 0 = identical */
  distance: number;
  /** Position of the item in the catalog */
  itemIndex: number;
};

/**
 * Candidate paired with the catalog item it points to.
 */
export type ResolvedMatch = MatchCandidate & {
  item: CatalogItem;
};
