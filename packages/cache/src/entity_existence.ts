import type { EntityId } from "@pagewise/ids";

export interface EntityExistenceCacheOptions {
  maxEntries: number;
}

/**
 * Remembers entities known to exist downstream, evicting the least recently used.
 * Only positive answers are kept: an absent entity may be created at any moment.
 */
export class EntityExistenceCache {
  private readonly maxEntries: number;
  private readonly known = new Map<EntityId, true>();

  constructor(options: EntityExistenceCacheOptions) {
    if (!Number.isInteger(options.maxEntries) || options.maxEntries <= 0) {
      throw new Error(`maxEntries must be a positive integer: ${options.maxEntries}`);
    }
    this.maxEntries = options.maxEntries;
  }

  get size(): number {
    return this.known.size;
  }

  entityExists(entityId: EntityId): boolean | undefined {
    if (!this.known.has(entityId)) return undefined;
    this.known.delete(entityId);
    this.known.set(entityId, true);
    return true;
  }

  putEntityExists(entityId: EntityId, exists: boolean): void {
    if (!exists) return;
    this.known.delete(entityId);
    while (this.known.size >= this.maxEntries) {
      const oldest = this.known.keys().next();
      if (oldest.done) break;
      this.known.delete(oldest.value);
    }
    this.known.set(entityId, true);
  }
}
