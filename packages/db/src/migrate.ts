import path from "node:path";
import { fileURLToPath } from "node:url";
import { promises as fs } from "node:fs";
import { FileMigrationProvider, Migrator, sql } from "kysely";
import type { MigrationResult } from "kysely";
import type { Logger } from "@pagewise/observability";
import type { Db } from "./db.js";

const migrationsFolder = path.join(path.dirname(fileURLToPath(import.meta.url)), "migrations");
const MIGRATION_LOCK_KEY = "pagewise:migrations";

export interface MigrationSummary {
  applied: string[];
  failed: string[];
  skipped: string[];
}

export interface MigrateOptions {
  logger?: Pick<Logger, "info" | "error">;
}

export function summarizeMigrations(results: readonly MigrationResult[]): MigrationSummary {
  const summary: MigrationSummary = { applied: [], failed: [], skipped: [] };
  for (const result of results) {
    switch (result.status) {
      case "Success":
        summary.applied.push(result.migrationName);
        break;
      case "Error":
        summary.failed.push(result.migrationName);
        break;
      case "NotExecuted":
        summary.skipped.push(result.migrationName);
        break;
    }
  }
  return summary;
}

function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  try {
    return JSON.stringify(error);
  } catch {
    return "unknown error";
  }
}

export function createMigrator(db: Db): Migrator {
  return new Migrator({
    db,
    provider: new FileMigrationProvider({
      fs,
      path,
      migrationFolder: migrationsFolder,
    }),
  });
}

export async function migrateToLatest(
  db: Db,
  options: MigrateOptions = {},
): Promise<MigrationResult[]> {
  const { error, results = [] } = await createMigrator(db).migrateToLatest();
  const summary = summarizeMigrations(results);

  if (error) {
    options.logger?.error({ ...summary, error }, "migrations failed");
    throw error instanceof Error
      ? error
      : new Error(`Migration failed: ${describeError(error)}`, { cause: error });
  }

  options.logger?.info(summary, "migrations up to date");
  return results;
}

/** Serializes concurrent migrators on a Postgres advisory lock. */
export async function migrateToLatestWithLock(
  db: Db,
  options: MigrateOptions = {},
): Promise<MigrationResult[]> {
  await sql`select pg_advisory_lock(hashtext(${MIGRATION_LOCK_KEY})::bigint)`.execute(db);
  try {
    return await migrateToLatest(db, options);
  } finally {
    await sql`select pg_advisory_unlock(hashtext(${MIGRATION_LOCK_KEY})::bigint)`.execute(db);
  }
}
