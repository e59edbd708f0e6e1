import { CatalogApiClientError } from "@pagewise/catalog-api";
import type { EntityId } from "@pagewise/ids";
import type { Logger } from "@pagewise/observability";
import { catalogRecordSchema, validateItems } from "./records.js";
import type { CatalogRecord } from "./records.js";
import type { Auditor, CatalogApi, IngestCaches, IngestResult } from "./types.js";

export interface EntityIngestServiceOptions {
  catalog: CatalogApi;
  caches: Pick<IngestCaches, "entityExistence">;
  audit: Auditor;
  logger: Logger;
}

export class EntityIngestService {
  private readonly options: EntityIngestServiceOptions;

  constructor(options: EntityIngestServiceOptions) {
    this.options = options;
  }

  async ingest(items: readonly unknown[]): Promise<IngestResult> {
    const { catalog, caches, audit, logger } = this.options;
    const { valid } = validateItems(items, catalogRecordSchema, { logger, kind: "entity" });

    const candidates = await this.unseen(valid);
    let indexed = 0;
    const written: CatalogRecord[] = [];

    for (const record of candidates) {
      try {
        await catalog.createEntity(record);
      } catch (error) {
        if (error instanceof CatalogApiClientError) {
          logger.warn(
            { entityId: record.entity_id, status: error.status, error },
            "Catalog rejected entity",
          );
          continue;
        }
        throw error;
      }
      caches.entityExistence.putEntityExists(record.entity_id, true);
      indexed += 1;
      written.push(record);
    }

    if (written.length > 0) {
      await audit.sendBatch("entities", written);
    }

    logger.info(
      { received: items.length, valid: valid.length, indexed },
      "Entity batch ingested",
    );
    return { indexed, tasks: [] };
  }

  /** Drops repeats inside the batch, then entities the cache or the catalog already knows. */
  private async unseen(records: readonly CatalogRecord[]): Promise<CatalogRecord[]> {
    const { catalog, caches } = this.options;
    const byId = new Map<EntityId, CatalogRecord>();
    for (const record of records) {
      if (byId.has(record.entity_id)) continue;
      if (caches.entityExistence.entityExists(record.entity_id) === true) continue;
      byId.set(record.entity_id, record);
    }
    if (byId.size === 0) return [];

    const existing = await catalog.getExistingEntityIds(Array.from(byId.keys()));
    for (const entityId of existing) {
      caches.entityExistence.putEntityExists(entityId, true);
      byId.delete(entityId);
    }
    return Array.from(byId.values());
  }
}
