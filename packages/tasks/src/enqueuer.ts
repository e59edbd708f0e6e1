import type { Logger } from "@pagewise/observability";
import { TaskQueueError } from "./errors.js";
import { buildCrawlRequest, jobHandleFor, jobNameFor } from "./jobs.js";
import type { AcquisitionJob, CrawlTarget, JobHandle } from "./jobs.js";
import type { JobStore } from "./store.js";

export type EnqueueResult = JobHandle | "duplicate";

export interface TaskEnqueuerOptions {
  store: JobStore;
  queueName: string;
  crawlTarget: CrawlTarget;
  logger: Logger;
}

export class TaskEnqueuer {
  private readonly store: JobStore;
  private readonly queueName: string;
  private readonly crawlTarget: CrawlTarget;
  private readonly logger: Logger;

  constructor(options: TaskEnqueuerOptions) {
    this.store = options.store;
    this.queueName = options.queueName;
    this.crawlTarget = options.crawlTarget;
    this.logger = options.logger;
  }

  /**
   * Schedules an acquisition job. A job with the same name that is still pending
   * or already dispatched yields "duplicate". Store failures raise TaskQueueError.
   */
  async enqueue(job: AcquisitionJob): Promise<EnqueueResult> {
    const name = jobNameFor(job);

    let outcome: "inserted" | "duplicate";
    try {
      outcome = await this.store.insert({
        name,
        queue: this.queueName,
        kind: job.kind,
        payload: buildCrawlRequest(job, this.crawlTarget),
      });
    } catch (error) {
      throw new TaskQueueError(`Failed to enqueue ${name}`, { cause: error });
    }

    if (outcome === "duplicate") {
      this.logger.debug({ job: name, queue: this.queueName }, "Acquisition job already queued");
      return "duplicate";
    }

    const handle = jobHandleFor(this.queueName, name);
    this.logger.info({ job: name, handle }, "Acquisition job queued");
    return handle;
  }

  async enqueueAll(jobs: readonly AcquisitionJob[]): Promise<EnqueueResult[]> {
    const results: EnqueueResult[] = [];
    for (const job of jobs) {
      results.push(await this.enqueue(job));
    }
    return results;
  }
}
