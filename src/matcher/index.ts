/**
 * Matcher public API
 */

export { matchCatalog, resolveQuery } from "./fuzzyMatcher";
export { EmptyCatalogError, InvalidQueryError } from "./errors";
