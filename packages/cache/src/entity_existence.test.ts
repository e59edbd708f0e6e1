import { EntityId } from "@pagewise/ids";
import { describe, expect, it } from "vitest";
import { EntityExistenceCache } from "./entity_existence.js";

const entity1 = EntityId(1);
const entity2 = EntityId(2);
const entity3 = EntityId(3);

describe("EntityExistenceCache", () => {
  it("returns undefined for unknown entities", () => {
    const cache = new EntityExistenceCache({ maxEntries: 10 });
    expect(cache.entityExists(entity1)).toBeUndefined();
  });

  it("remembers positive answers", () => {
    const cache = new EntityExistenceCache({ maxEntries: 10 });
    cache.putEntityExists(entity1, true);
    expect(cache.entityExists(entity1)).toBe(true);
  });

  it("never stores a negative answer", () => {
    const cache = new EntityExistenceCache({ maxEntries: 10 });
    cache.putEntityExists(entity1, false);
    expect(cache.entityExists(entity1)).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it("evicts the least recently used entity", () => {
    const cache = new EntityExistenceCache({ maxEntries: 2 });
    cache.putEntityExists(entity1, true);
    cache.putEntityExists(entity2, true);
    expect(cache.entityExists(entity1)).toBe(true);
    cache.putEntityExists(entity3, true);

    expect(cache.size).toBe(2);
    expect(cache.entityExists(entity2)).toBeUndefined();
    expect(cache.entityExists(entity1)).toBe(true);
    expect(cache.entityExists(entity3)).toBe(true);
  });
});
