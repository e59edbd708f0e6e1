import type { EntityExistenceCache, OwnerActivityCache } from "@pagewise/cache";
import type { CatalogApiClient } from "@pagewise/catalog-api";
import type { EnqueueResult, TaskEnqueuer } from "@pagewise/tasks";
import type { AuditPublisher } from "@pagewise/audit";

export type CatalogApi = Pick<
  CatalogApiClient,
  | "createActivityBatch"
  | "createEntity"
  | "getExistingEntityIds"
  | "getOwnerEntityIds"
  | "getPopularity"
>;

export type Enqueuer = Pick<TaskEnqueuer, "enqueue" | "enqueueAll">;
export type Auditor = Pick<AuditPublisher, "sendBatch">;

export interface IngestCaches {
  ownerActivity: OwnerActivityCache;
  entityExistence: EntityExistenceCache;
}

/** Acknowledgement for one batch: records written and one enqueue result per scheduled job. */
export interface IngestResult {
  indexed: number;
  tasks: EnqueueResult[];
}
