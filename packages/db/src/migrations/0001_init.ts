import { sql } from "kysely";
import type { Kysely } from "kysely";

export async function up(db: Kysely<unknown>): Promise<void> {
  await sql`
    create type acquisition_job_kind as enum (
      'entity',
      'owner'
    )
  `.execute(db);

  await sql`
    create type acquisition_job_status as enum (
      'pending',
      'dispatched',
      'failed'
    )
  `.execute(db);

  await db.schema
    .createTable("acquisition_jobs")
    .addColumn("name", "text", (col) => col.primaryKey())
    .addColumn("queue", "text", (col) => col.notNull())
    .addColumn("kind", sql`acquisition_job_kind`, (col) => col.notNull())
    .addColumn("payload", "jsonb", (col) => col.notNull())
    .addColumn("status", sql`acquisition_job_status`, (col) =>
      col.notNull().defaultTo(sql`'pending'`),
    )
    .addColumn("attempts", "integer", (col) => col.notNull().defaultTo(0))
    .addColumn("run_after", "timestamptz", (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn("last_error", "text")
    .addColumn("created_at", "timestamptz", (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn("updated_at", "timestamptz", (col) => col.notNull().defaultTo(sql`now()`))
    .addCheckConstraint("acquisition_jobs_attempts_nonnegative", sql`attempts >= 0`)
    .execute();

  await sql`
    create index acquisition_jobs_due_idx
    on acquisition_jobs (queue, run_after)
    where status = 'pending'
  `.execute(db);

  await db.schema
    .createTable("worker_heartbeats")
    .addColumn("service", "text", (col) => col.notNull())
    .addColumn("worker_id", "text", (col) => col.notNull())
    .addColumn("started_at", "timestamptz", (col) => col.notNull())
    .addColumn("last_heartbeat_at", "timestamptz", (col) => col.notNull())
    .addPrimaryKeyConstraint("worker_heartbeats_pkey", ["service", "worker_id"])
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable("worker_heartbeats").ifExists().execute();
  await db.schema.dropTable("acquisition_jobs").ifExists().execute();
  await sql`drop type if exists acquisition_job_status`.execute(db);
  await sql`drop type if exists acquisition_job_kind`.execute(db);
}
