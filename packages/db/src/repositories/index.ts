export * from "./acquisition_jobs.js";
export * from "./worker_heartbeats.js";
