/**
 * Catalog snapshot store
 *
 * Holds the current catalog as an immutable snapshot. A refresh builds
 * a complete new snapshot and swaps the reference, so a match running
 * against the previous snapshot keeps a consistent view.
 */

import type { Catalog, CatalogSnapshot, CatalogSource } from "@/types/catalog";

/**
 * Error thrown when the catalog is read before the first load.
 */
export class CatalogNotLoadedError extends Error {
  constructor() {
    super("Catalog has not been loaded yet");
    this.name = "CatalogNotLoadedError";
  }
}

/**
 * Freeze the item list and each item so readers cannot mutate a shared snapshot.
 */
function freezeCatalog(items: Catalog): Catalog {
  for (const item of items) {
    Object.freeze(item.commonNames);
    Object.freeze(item);
  }
  return Object.freeze(items);
}

export class CatalogStore {
  private snapshot: CatalogSnapshot | null = null;

  /**
   * Replace the current snapshot
   *
   * @param items - Fully enriched catalog (frozen in place)
   * @param source - Where the items came from
   * @param now - Snapshot timestamp (defaults to current time)
   * @returns The new snapshot
   */
  swap(items: Catalog, source: CatalogSource, now: Date = new Date()): CatalogSnapshot {
    const next: CatalogSnapshot = Object.freeze({
      items: freezeCatalog(items),
      source,
      loadedAt: now.toISOString(),
    });
    this.snapshot = next;
    return next;
  }

  /**
   * Current snapshot
   *
   * @throws {CatalogNotLoadedError} Before the first swap
   */
  current(): CatalogSnapshot {
    if (!this.snapshot) {
      throw new CatalogNotLoadedError();
    }
    return this.snapshot;
  }

  isLoaded(): boolean {
    return this.snapshot !== null;
  }
}
