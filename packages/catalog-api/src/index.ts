export { CatalogApiClient } from "./client.js";
export type { CatalogApiClientOptions } from "./client.js";
export {
  CatalogApiClientError,
  CatalogApiError,
  CatalogApiServerError,
  CatalogApiTransportError,
} from "./errors.js";
export {
  classifyPopularityResponse,
  collectPopularity,
  isRetryablePopularityStatus,
  withPopularityRetries,
} from "./popularity.js";
export type {
  ActivityBatchResult,
  ActivityEntry,
  CatalogEntity,
  JsonArray,
  JsonObject,
  JsonPrimitive,
  JsonValue,
  PopularityOutcome,
  RequestSnapshot,
  ResponseSnapshot,
} from "./types.js";
