import type { EntityExistenceCache } from "@pagewise/cache";
import type { EntityId } from "@pagewise/ids";
import type { Logger } from "@pagewise/observability";
import type { EnqueueResult } from "@pagewise/tasks";
import type { CatalogApi, Enqueuer } from "./types.js";

export interface AcquisitionSchedulerOptions {
  catalog: Pick<CatalogApi, "getPopularity" | "getExistingEntityIds">;
  entityExistence: EntityExistenceCache;
  enqueuer: Enqueuer;
  popularityThreshold: number;
  logger: Logger;
}

/**
 * Queues acquisition for referenced entities that are popular enough and not yet
 * in the catalog. Entities whose popularity cannot be read are skipped.
 */
export class AcquisitionScheduler {
  private readonly options: AcquisitionSchedulerOptions;

  constructor(options: AcquisitionSchedulerOptions) {
    this.options = options;
  }

  async scheduleEntities(entityIds: readonly EntityId[]): Promise<EnqueueResult[]> {
    const { catalog, entityExistence, enqueuer, popularityThreshold, logger } = this.options;
    const distinct = Array.from(new Set(entityIds));
    if (distinct.length === 0) return [];

    const popularity = await catalog.getPopularity(distinct, { limit: popularityThreshold });
    const popular = distinct.filter((entityId) => {
      const count = popularity.get(entityId);
      return count !== undefined && count >= popularityThreshold;
    });

    const unresolved = popular.filter(
      (entityId) => entityExistence.entityExists(entityId) !== true,
    );
    if (unresolved.length === 0) {
      logger.debug({ referenced: distinct.length, popular: popular.length }, "Nothing to acquire");
      return [];
    }

    const existing = await catalog.getExistingEntityIds(unresolved);
    for (const entityId of existing) entityExistence.putEntityExists(entityId, true);

    const missing = unresolved.filter((entityId) => !existing.has(entityId));
    const tasks = await enqueuer.enqueueAll(
      missing.map((entityId) => ({ kind: "entity", entityId }) as const),
    );

    logger.info(
      {
        referenced: distinct.length,
        popular: popular.length,
        scheduled: tasks.filter((task) => task !== "duplicate").length,
        duplicates: tasks.filter((task) => task === "duplicate").length,
      },
      "Acquisition scheduling finished",
    );
    return tasks;
  }
}
