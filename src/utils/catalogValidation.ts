/**
 * Catalog validation module
 *
 * Validates the two JSON shapes the catalog is read from:
 * - the public item dump (array of ItemDumpEntry), mapped to RawItem
 * - the cached enriched catalog (array of CatalogItem)
 *
 * Dump validation drops individual entries without an identifier;
 * anything else malformed throws with the offending field path.
 */

import type {
  CatalogItem,
  LocalizedNames,
  RawItem,
} from "@/types/catalog";

/**
 * Error thrown when catalog validation fails.
 */
export class CatalogValidationError extends Error {
  constructor(message: string) {
    super(`Catalog validation failed: ${message}`);
    this.name = "CatalogValidationError";
  }
}

/**
 * Result of validating an item dump.
 */
export type ItemDumpValidation = {
  items: RawItem[];
  /** Number of entries dropped for lacking a string UniqueName */
  skipped: number;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validates a localized-name map.
 *
 * null/undefined mean "no names". Non-string values are dropped.
 *
 * @param value - Value to check
 * @param fieldPath - Field path for error messages (e.g., "[3].LocalizedNames")
 * @throws {CatalogValidationError} If value is neither null nor an object
 */
function validateLocalizedNames(
  value: unknown,
  fieldPath: string,
): LocalizedNames | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (!isRecord(value)) {
    throw new CatalogValidationError(
      `${fieldPath} must be an object or null, got ${typeof value}`,
    );
  }

  const names: Record<string, string> = {};
  for (const [locale, name] of Object.entries(value)) {
    if (typeof name === "string") {
      names[locale] = name;
    }
  }
  return names;
}

/**
 * Validates a parsed item dump and maps it to raw items.
 *
 * @param data - Parsed JSON from the dump URL
 * @returns Raw items in dump order, plus the count of dropped entries
 * @throws {CatalogValidationError} If the dump is not an array of objects
 */
export function validateItemDump(data: unknown): ItemDumpValidation {
  if (!Array.isArray(data)) {
    throw new CatalogValidationError(
      `item dump must be an array, got ${typeof data}`,
    );
  }

  const items: RawItem[] = [];
  let skipped = 0;

  data.forEach((entry: unknown, index: number) => {
    if (!isRecord(entry)) {
      throw new CatalogValidationError(`[${index}] must be an object`);
    }
    const uniqueId = entry.UniqueName;
    if (typeof uniqueId !== "string" || uniqueId.length === 0) {
      skipped++;
      return;
    }
    items.push({
      uniqueId,
      localizedNames: validateLocalizedNames(
        entry.LocalizedNames,
        `[${index}].LocalizedNames`,
      ),
    });
  });

  return { items, skipped };
}

/**
 * Validates a cached enriched catalog.
 *
 * @param data - Parsed JSON from the cache payload
 * @returns Catalog items in stored order
 * @throws {CatalogValidationError} If any item is malformed
 */
export function validateCatalogItems(data: unknown): CatalogItem[] {
  if (!Array.isArray(data)) {
    throw new CatalogValidationError(
      `cached catalog must be an array, got ${typeof data}`,
    );
  }
  if (data.length === 0) {
    throw new CatalogValidationError("cached catalog cannot be empty");
  }

  return data.map((entry: unknown, index: number): CatalogItem => {
    const prefix = `[${index}]`;
    if (!isRecord(entry)) {
      throw new CatalogValidationError(`${prefix} must be an object`);
    }
    if (typeof entry.uniqueId !== "string") {
      throw new CatalogValidationError(`${prefix}.uniqueId must be a string`);
    }
    const commonNames = entry.commonNames;
    if (
      !Array.isArray(commonNames) ||
      !commonNames.every((name: unknown) => typeof name === "string")
    ) {
      throw new CatalogValidationError(
        `${prefix}.commonNames must be an array of strings`,
      );
    }
    return {
      uniqueId: entry.uniqueId,
      localizedNames: validateLocalizedNames(
        entry.localizedNames,
        `${prefix}.localizedNames`,
      ),
      commonNames: commonNames.filter(
        (name: unknown): name is string => typeof name === "string",
      ),
    };
  });
}
