import { sql } from "kysely";
import type { DbOrTx } from "../db.js";
import type { AcquisitionJobKind, AcquisitionJobRow, JsonValue } from "../schema.js";

export interface AcquisitionJobInput {
  name: string;
  queue: string;
  kind: AcquisitionJobKind;
  payload: JsonValue;
}

export interface ClaimAcquisitionJobsParams {
  queue: string;
  limit: number;
  leaseMs: number;
}

export function buildInsertAcquisitionJob(db: DbOrTx, job: AcquisitionJobInput) {
  return db
    .insertInto("acquisition_jobs")
    .values({
      name: job.name,
      queue: job.queue,
      kind: job.kind,
      payload: job.payload,
    })
    .onConflict((oc) =>
      oc
        .column("name")
        .doUpdateSet((eb) => ({
          status: "pending",
          attempts: 0,
          run_after: sql<Date>`now()`,
          last_error: null,
          payload: eb.ref("excluded.payload"),
          updated_at: sql<Date>`now()`,
        }))
        .where("acquisition_jobs.status", "=", "failed"),
    )
    .returning(["name"]);
}

/**
 * Inserts a job unless one with the same name is already pending or dispatched.
 * A job left `failed` is re-armed. Returns false for a duplicate.
 */
export async function insertAcquisitionJob(
  db: DbOrTx,
  job: AcquisitionJobInput,
): Promise<boolean> {
  const row = await buildInsertAcquisitionJob(db, job).executeTakeFirst();
  return row !== undefined;
}

export function buildClaimDueAcquisitionJobs(db: DbOrTx, params: ClaimAcquisitionJobsParams) {
  const due = db
    .selectFrom("acquisition_jobs")
    .select("name")
    .where("queue", "=", params.queue)
    .where("status", "=", "pending")
    .where("run_after", "<=", sql<Date>`now()`)
    .orderBy("run_after")
    .limit(params.limit)
    .forUpdate()
    .skipLocked();

  return db
    .updateTable("acquisition_jobs")
    .set((eb) => ({
      attempts: eb("attempts", "+", 1),
      run_after: sql<Date>`now() + ${params.leaseMs} * interval '1 millisecond'`,
      updated_at: sql<Date>`now()`,
    }))
    .where("name", "in", due)
    .returningAll();
}

/**
 * Claims up to `limit` due pending jobs. Each claim bumps `attempts` and pushes
 * `run_after` out by `leaseMs`, so jobs held by a crashed dispatcher come back later.
 */
export async function claimDueAcquisitionJobs(
  db: DbOrTx,
  params: ClaimAcquisitionJobsParams,
): Promise<AcquisitionJobRow[]> {
  return buildClaimDueAcquisitionJobs(db, params).execute();
}

export async function markAcquisitionJobDispatched(db: DbOrTx, name: string): Promise<void> {
  await db
    .updateTable("acquisition_jobs")
    .set({ status: "dispatched", last_error: null, updated_at: sql<Date>`now()` })
    .where("name", "=", name)
    .execute();
}

export function buildRescheduleAcquisitionJob(
  db: DbOrTx,
  params: { name: string; delayMs: number; lastError: string },
) {
  return db
    .updateTable("acquisition_jobs")
    .set({
      run_after: sql<Date>`now() + ${params.delayMs} * interval '1 millisecond'`,
      last_error: params.lastError,
      updated_at: sql<Date>`now()`,
    })
    .where("name", "=", params.name);
}

export async function rescheduleAcquisitionJob(
  db: DbOrTx,
  params: { name: string; delayMs: number; lastError: string },
): Promise<void> {
  await buildRescheduleAcquisitionJob(db, params).execute();
}

export async function markAcquisitionJobFailed(
  db: DbOrTx,
  params: { name: string; lastError: string },
): Promise<void> {
  await db
    .updateTable("acquisition_jobs")
    .set({ status: "failed", last_error: params.lastError, updated_at: sql<Date>`now()` })
    .where("name", "=", params.name)
    .execute();
}
