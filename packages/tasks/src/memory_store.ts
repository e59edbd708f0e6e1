import type { JobName } from "@pagewise/ids";
import type { ClaimParams, JobStore, NewQueuedJob, QueuedJob } from "./store.js";

type MemoryJobStatus = "pending" | "dispatched" | "failed";

export interface MemoryJobRecord extends QueuedJob {
  status: MemoryJobStatus;
  runAfter: number;
  lastError: string | null;
}

/**
 * In-process JobStore with the same duplicate and re-arm rules as the Postgres store.
 * Used by tests and local runs without a database.
 */
export class InMemoryJobStore implements JobStore {
  private readonly jobs = new Map<JobName, MemoryJobRecord>();
  private readonly now: () => number;
  private failure: Error | null = null;

  constructor(options: { now?: () => number } = {}) {
    this.now = options.now ?? Date.now;
  }

  /** Makes every subsequent call reject with `error`, or recover with null. */
  failWith(error: Error | null): void {
    this.failure = error;
  }

  list(): MemoryJobRecord[] {
    return Array.from(this.jobs.values(), (job) => ({ ...job }));
  }

  get(name: JobName): MemoryJobRecord | undefined {
    const job = this.jobs.get(name);
    return job ? { ...job } : undefined;
  }

  async insert(job: NewQueuedJob): Promise<"inserted" | "duplicate"> {
    this.throwIfFailing();
    const existing = this.jobs.get(job.name);
    if (existing && existing.status !== "failed") return "duplicate";
    this.jobs.set(job.name, {
      ...job,
      attempts: 0,
      status: "pending",
      runAfter: this.now(),
      lastError: null,
    });
    return "inserted";
  }

  async claimDue(params: ClaimParams): Promise<QueuedJob[]> {
    this.throwIfFailing();
    const now = this.now();
    const due = Array.from(this.jobs.values())
      .filter(
        (job) => job.queue === params.queue && job.status === "pending" && job.runAfter <= now,
      )
      .sort((a, b) => a.runAfter - b.runAfter)
      .slice(0, params.limit);

    return due.map((job) => {
      job.attempts += 1;
      job.runAfter = now + params.leaseMs;
      return {
        name: job.name,
        queue: job.queue,
        kind: job.kind,
        payload: job.payload,
        attempts: job.attempts,
      };
    });
  }

  async markDispatched(name: JobName): Promise<void> {
    this.throwIfFailing();
    this.update(name, { status: "dispatched", lastError: null });
  }

  async reschedule(name: JobName, params: { delayMs: number; lastError: string }): Promise<void> {
    this.throwIfFailing();
    this.update(name, { runAfter: this.now() + params.delayMs, lastError: params.lastError });
  }

  async markFailed(name: JobName, lastError: string): Promise<void> {
    this.throwIfFailing();
    this.update(name, { status: "failed", lastError });
  }

  async ping(): Promise<void> {
    this.throwIfFailing();
  }

  private update(name: JobName, patch: Partial<MemoryJobRecord>): void {
    const job = this.jobs.get(name);
    if (!job) return;
    this.jobs.set(name, { ...job, ...patch });
  }

  private throwIfFailing(): void {
    if (this.failure) throw this.failure;
  }
}
