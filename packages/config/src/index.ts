export { loadApiEnv, loadBaseEnv, loadWorkerEnv } from "./env.js";
export type {
  AcquisitionConfig,
  ApiEnv,
  BaseEnv,
  CacheConfig,
  CatalogApiConfig,
  DbConfig,
  DeployEnv,
  DispatchConfig,
  LogLevel,
  NodeEnv,
  PubSubConfig,
  WorkerEnv,
} from "./env.js";
