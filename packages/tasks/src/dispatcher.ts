import type { Logger } from "@pagewise/observability";
import { ScraperRequestError } from "./errors.js";
import { crawlRequestSchema } from "./jobs.js";
import type { ScraperClient } from "./scraper.js";
import type { JobStore, QueuedJob } from "./store.js";

export interface DispatcherOptions {
  store: JobStore;
  scraper: Pick<ScraperClient, "triggerCrawl">;
  logger: Logger;
  queueName: string;
  batchSize: number;
  maxAttempts: number;
  retryBackoffMs: number;
  leaseMs?: number;
}

export interface DispatchSummary {
  claimed: number;
  dispatched: number;
  rescheduled: number;
  failed: number;
}

const DEFAULT_LEASE_MS = 5 * 60_000;
const MAX_BACKOFF_MS = 60 * 60_000;

/** Moves due jobs from the store to the scraper. */
export class AcquisitionDispatcher {
  private readonly options: DispatcherOptions;

  constructor(options: DispatcherOptions) {
    this.options = options;
  }

  async dispatchDue(): Promise<DispatchSummary> {
    const { store, queueName, batchSize } = this.options;
    const jobs = await store.claimDue({
      queue: queueName,
      limit: batchSize,
      leaseMs: this.options.leaseMs ?? DEFAULT_LEASE_MS,
    });

    const summary: DispatchSummary = {
      claimed: jobs.length,
      dispatched: 0,
      rescheduled: 0,
      failed: 0,
    };
    for (const job of jobs) {
      const outcome = await this.dispatchOne(job);
      summary[outcome] += 1;
    }

    if (jobs.length > 0) {
      this.options.logger.info({ queue: queueName, ...summary }, "Dispatch pass finished");
    }
    return summary;
  }

  private async dispatchOne(job: QueuedJob): Promise<"dispatched" | "rescheduled" | "failed"> {
    const { store, logger } = this.options;

    const parsed = crawlRequestSchema.safeParse(job.payload);
    if (!parsed.success) {
      const lastError = `invalid crawl request: ${parsed.error.message}`;
      logger.error({ job: job.name }, "Stored crawl request is invalid");
      await store.markFailed(job.name, lastError);
      return "failed";
    }

    try {
      await this.options.scraper.triggerCrawl(parsed.data);
    } catch (error) {
      const lastError = error instanceof Error ? error.message : String(error);
      const retryable = !(error instanceof ScraperRequestError) || error.retryable;

      if (!retryable || job.attempts >= this.options.maxAttempts) {
        logger.error({ job: job.name, attempts: job.attempts, error }, "Acquisition job failed");
        await store.markFailed(job.name, lastError);
        return "failed";
      }

      const delayMs = backoffDelayMs(this.options.retryBackoffMs, job.attempts);
      logger.warn(
        { job: job.name, attempts: job.attempts, delayMs, error },
        "Acquisition job rescheduled",
      );
      await store.reschedule(job.name, { delayMs, lastError });
      return "rescheduled";
    }

    await store.markDispatched(job.name);
    logger.info({ job: job.name, attempts: job.attempts }, "Acquisition job dispatched");
    return "dispatched";
  }
}

export function backoffDelayMs(baseMs: number, attempts: number): number {
  const exponent = Math.max(0, attempts - 1);
  return Math.min(MAX_BACKOFF_MS, baseMs * 2 ** exponent);
}
