export { ActivityIngestService, groupByOwner } from "./activity.js";
export type { ActivityIngestServiceOptions } from "./activity.js";
export { EntityIngestService } from "./entities.js";
export type { EntityIngestServiceOptions } from "./entities.js";
export { pushEnvelopeSchema, pushMessageSchema, unpackEnvelope } from "./envelope.js";
export type { PushEnvelope, UnpackFailureReason, UnpackResult } from "./envelope.js";
export { OwnerIngestService } from "./owners.js";
export type { OwnerIngestServiceOptions } from "./owners.js";
export {
  activityRecordSchema,
  catalogRecordSchema,
  isValidIsbn10,
  isValidIsbn13,
  ownerRecordSchema,
  validateItems,
} from "./records.js";
export type { ActivityRecord, CatalogRecord, OwnerRecord, ValidatedItems } from "./records.js";
export { AcquisitionScheduler } from "./scheduler.js";
export type { AcquisitionSchedulerOptions } from "./scheduler.js";
export type { Auditor, CatalogApi, Enqueuer, IngestCaches, IngestResult } from "./types.js";
