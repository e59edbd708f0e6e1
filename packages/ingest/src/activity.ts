import { CatalogApiClientError } from "@pagewise/catalog-api";
import type { EntityId, OwnerId } from "@pagewise/ids";
import type { Logger } from "@pagewise/observability";
import { activityRecordSchema, validateItems } from "./records.js";
import type { ActivityRecord } from "./records.js";
import type { AcquisitionScheduler } from "./scheduler.js";
import type { Auditor, CatalogApi, IngestCaches, IngestResult } from "./types.js";

export interface ActivityIngestServiceOptions {
  catalog: CatalogApi;
  caches: IngestCaches;
  audit: Auditor;
  scheduler: Pick<AcquisitionScheduler, "scheduleEntities">;
  logger: Logger;
}

/** Groups records by owner; a repeated (owner, entity) pair keeps its first occurrence. */
export function groupByOwner(records: readonly ActivityRecord[]): Map<OwnerId, ActivityRecord[]> {
  const groups = new Map<OwnerId, ActivityRecord[]>();
  const seen = new Map<OwnerId, Set<EntityId>>();
  for (const record of records) {
    const ownerSeen = seen.get(record.owner_id) ?? new Set<EntityId>();
    if (ownerSeen.has(record.entity_id)) continue;
    ownerSeen.add(record.entity_id);
    seen.set(record.owner_id, ownerSeen);

    const group = groups.get(record.owner_id);
    if (group) {
      group.push(record);
    } else {
      groups.set(record.owner_id, [record]);
    }
  }
  return groups;
}

export class ActivityIngestService {
  private readonly options: ActivityIngestServiceOptions;

  constructor(options: ActivityIngestServiceOptions) {
    this.options = options;
  }

  /**
   * Writes activity the catalog does not have yet, mirrors it to the audit topic
   * and schedules acquisition for popular referenced entities.
   * A server error from the catalog aborts the batch before any audit publish.
   */
  async ingest(items: readonly unknown[]): Promise<IngestResult> {
    const { catalog, caches, audit, scheduler, logger } = this.options;
    const { valid } = validateItems(items, activityRecordSchema, { logger, kind: "activity" });

    let indexed = 0;
    const written: ActivityRecord[] = [];

    for (const [ownerId, records] of groupByOwner(valid)) {
      const existing = await this.existingEntityIds(ownerId);
      const fresh = records.filter((record) => !existing.has(record.entity_id));
      if (fresh.length === 0) {
        logger.debug({ ownerId, received: records.length }, "Owner activity already recorded");
        continue;
      }

      try {
        const result = await catalog.createActivityBatch(fresh);
        indexed += result.indexed;
      } catch (error) {
        if (error instanceof CatalogApiClientError) {
          logger.warn(
            { ownerId, records: fresh.length, status: error.status, error },
            "Catalog rejected owner activity",
          );
          continue;
        }
        throw error;
      }

      caches.ownerActivity.recordOwnerActivity(
        ownerId,
        fresh.map((record) => record.entity_id),
      );
      written.push(...fresh);
    }

    if (written.length > 0) {
      await audit.sendBatch("activity", written);
    }

    const tasks = await scheduler.scheduleEntities(valid.map((record) => record.entity_id));

    logger.info(
      { received: items.length, valid: valid.length, indexed, tasks: tasks.length },
      "Activity batch ingested",
    );
    return { indexed, tasks };
  }

  private async existingEntityIds(ownerId: OwnerId): Promise<ReadonlySet<EntityId>> {
    const { catalog, caches } = this.options;
    const cached = caches.ownerActivity.getOwnerActivity(ownerId);
    if (cached) return cached;

    const fetched = await catalog.getOwnerEntityIds(ownerId);
    caches.ownerActivity.putOwnerActivity(ownerId, fetched);
    return new Set(fetched);
  }
}
