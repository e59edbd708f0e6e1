import {
  claimDueAcquisitionJobs,
  insertAcquisitionJob,
  markAcquisitionJobDispatched,
  markAcquisitionJobFailed,
  pingDb,
  rescheduleAcquisitionJob,
} from "@pagewise/db";
import type { Db, JsonValue } from "@pagewise/db";
import { JobName } from "@pagewise/ids";
import type { AcquisitionJobKind, CrawlRequest } from "./jobs.js";

export interface NewQueuedJob {
  name: JobName;
  queue: string;
  kind: AcquisitionJobKind;
  payload: CrawlRequest;
}

export interface QueuedJob {
  name: JobName;
  queue: string;
  kind: AcquisitionJobKind;
  /** Stored crawl request. Validated by the dispatcher before use. */
  payload: JsonValue;
  attempts: number;
}

export interface ClaimParams {
  queue: string;
  limit: number;
  leaseMs: number;
}

/** Durable home of acquisition jobs. Implementations must treat `name` as unique. */
export interface JobStore {
  insert(job: NewQueuedJob): Promise<"inserted" | "duplicate">;
  claimDue(params: ClaimParams): Promise<QueuedJob[]>;
  markDispatched(name: JobName): Promise<void>;
  reschedule(name: JobName, params: { delayMs: number; lastError: string }): Promise<void>;
  markFailed(name: JobName, lastError: string): Promise<void>;
  ping(): Promise<void>;
}

export class PostgresJobStore implements JobStore {
  constructor(private readonly db: Db) {}

  async insert(job: NewQueuedJob): Promise<"inserted" | "duplicate"> {
    const inserted = await insertAcquisitionJob(this.db, {
      name: job.name,
      queue: job.queue,
      kind: job.kind,
      payload: job.payload,
    });
    return inserted ? "inserted" : "duplicate";
  }

  async claimDue(params: ClaimParams): Promise<QueuedJob[]> {
    const rows = await claimDueAcquisitionJobs(this.db, params);
    return rows.map((row) => ({
      name: JobName(row.name),
      queue: row.queue,
      kind: row.kind,
      payload: row.payload,
      attempts: row.attempts,
    }));
  }

  async markDispatched(name: JobName): Promise<void> {
    await markAcquisitionJobDispatched(this.db, name);
  }

  async reschedule(name: JobName, params: { delayMs: number; lastError: string }): Promise<void> {
    await rescheduleAcquisitionJob(this.db, { name, ...params });
  }

  async markFailed(name: JobName, lastError: string): Promise<void> {
    await markAcquisitionJobFailed(this.db, { name, lastError });
  }

  async ping(): Promise<void> {
    await pingDb(this.db);
  }
}
