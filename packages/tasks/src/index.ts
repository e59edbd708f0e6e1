export { AcquisitionDispatcher, backoffDelayMs } from "./dispatcher.js";
export type { DispatcherOptions, DispatchSummary } from "./dispatcher.js";
export { TaskEnqueuer } from "./enqueuer.js";
export type { EnqueueResult, TaskEnqueuerOptions } from "./enqueuer.js";
export { ScraperRequestError, TaskQueueError } from "./errors.js";
export {
  buildCrawlRequest,
  crawlRequestSchema,
  ENTITY_SPIDER_NAME,
  jobHandleFor,
  jobNameFor,
  OWNER_SPIDER_NAME,
} from "./jobs.js";
export type {
  AcquisitionJob,
  AcquisitionJobKind,
  CrawlRequest,
  CrawlTarget,
  JobHandle,
} from "./jobs.js";
export { InMemoryJobStore } from "./memory_store.js";
export type { MemoryJobRecord } from "./memory_store.js";
export { runDispatchLoop } from "./run_loop.js";
export { ScraperClient } from "./scraper.js";
export type { ScraperClientOptions } from "./scraper.js";
export { PostgresJobStore } from "./store.js";
export type { ClaimParams, JobStore, NewQueuedJob, QueuedJob } from "./store.js";
