export type { Db, DbConfig, DbOrTx } from "./db.js";
export type {
  AcquisitionJobKind,
  AcquisitionJobRow,
  AcquisitionJobStatus,
  Database,
  JsonObject,
  JsonValue,
} from "./schema.js";
export { createDb, destroyDb, pingDb } from "./db.js";
export {
  createMigrator,
  migrateToLatest,
  migrateToLatestWithLock,
  summarizeMigrations,
} from "./migrate.js";
export type { MigrateOptions, MigrationSummary } from "./migrate.js";
export * from "./repositories/index.js";
