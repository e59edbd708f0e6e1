export { EntityExistenceCache } from "./entity_existence.js";
export type { EntityExistenceCacheOptions } from "./entity_existence.js";
export { OwnerActivityCache } from "./owner_activity.js";
export type { Clock, OwnerActivityCacheOptions } from "./owner_activity.js";
