/**
 * Matcher error classes
 */

/**
 * Thrown when matching against a catalog with no items.
 *
 * A ranking over zero items has no primary match, so this is a hard
 * precondition failure rather than an empty result.
 */
export class EmptyCatalogError extends Error {
  constructor() {
    super("Cannot match against an empty catalog");
    this.name = "EmptyCatalogError";
  }
}

/**
 * Thrown for queries or options the matcher cannot rank with
 * (blank query, non-positive topK).
 */
export class InvalidQueryError extends Error {
  constructor(message: string) {
    super(`Invalid query: ${message}`);
    this.name = "InvalidQueryError";
  }
}
