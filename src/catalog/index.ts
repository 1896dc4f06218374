/**
 * Catalog public API
 */

export { parseIdentifier } from "./identifierParser";
export { enrichCatalog, generateCommonNames } from "./aliasNormalizer";
export { CatalogStore, CatalogNotLoadedError } from "./catalogStore";
export { loadCatalog, loadCatalogIntoStore } from "./loader";
export type { LoadCatalogOptions, LoadedCatalog } from "./loader";
