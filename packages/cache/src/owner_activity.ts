import type { EntityId, OwnerId } from "@pagewise/ids";

export type Clock = () => number;

export interface OwnerActivityCacheOptions {
  ttlMs: number;
  maxEntries: number;
  now?: Clock;
}

interface OwnerActivityEntry {
  entityIds: Set<EntityId>;
  expiresAt: number;
}

/**
 * Per-owner set of entity ids already recorded downstream.
 *
 * Entries live for `ttlMs` from the last `putOwnerActivity` and are re-queried,
 * not refreshed, once expired. An empty set is a valid cached answer.
 * When full, expired entries go first, then the least recently used one.
 */
export class OwnerActivityCache {
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: Clock;
  private readonly entries = new Map<OwnerId, OwnerActivityEntry>();

  constructor(options: OwnerActivityCacheOptions) {
    if (!Number.isFinite(options.ttlMs) || options.ttlMs <= 0) {
      throw new Error(`ttlMs must be positive: ${options.ttlMs}`);
    }
    if (!Number.isInteger(options.maxEntries) || options.maxEntries <= 0) {
      throw new Error(`maxEntries must be a positive integer: ${options.maxEntries}`);
    }
    this.ttlMs = options.ttlMs;
    this.maxEntries = options.maxEntries;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  getOwnerActivity(ownerId: OwnerId): ReadonlySet<EntityId> | undefined {
    const entry = this.liveEntry(ownerId);
    if (!entry) return undefined;
    this.entries.delete(ownerId);
    this.entries.set(ownerId, entry);
    return new Set(entry.entityIds);
  }

  putOwnerActivity(ownerId: OwnerId, entityIds: Iterable<EntityId>): void {
    this.entries.delete(ownerId);
    this.makeRoom();
    this.entries.set(ownerId, {
      entityIds: new Set(entityIds),
      expiresAt: this.now() + this.ttlMs,
    });
  }

  /** Adds freshly written ids to a live entry. The deadline stays where it was. */
  recordOwnerActivity(ownerId: OwnerId, entityIds: Iterable<EntityId>): void {
    const entry = this.liveEntry(ownerId);
    if (!entry) return;
    for (const entityId of entityIds) entry.entityIds.add(entityId);
  }

  private liveEntry(ownerId: OwnerId): OwnerActivityEntry | undefined {
    const entry = this.entries.get(ownerId);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(ownerId);
      return undefined;
    }
    return entry;
  }

  private makeRoom(): void {
    if (this.entries.size < this.maxEntries) return;

    const now = this.now();
    for (const [ownerId, entry] of this.entries) {
      if (entry.expiresAt <= now) this.entries.delete(ownerId);
    }

    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }
}
