import type { Logger } from "@pagewise/observability";
import { ownerRecordSchema, validateItems } from "./records.js";
import type { Enqueuer, IngestResult } from "./types.js";

export interface OwnerIngestServiceOptions {
  enqueuer: Enqueuer;
  logger: Logger;
}

/** Turns owner records into activity acquisition jobs. */
export class OwnerIngestService {
  private readonly options: OwnerIngestServiceOptions;

  constructor(options: OwnerIngestServiceOptions) {
    this.options = options;
  }

  async ingest(items: readonly unknown[]): Promise<IngestResult> {
    const { enqueuer, logger } = this.options;
    const { valid } = validateItems(items, ownerRecordSchema, { logger, kind: "owner" });
    const ownerIds = Array.from(new Set(valid.map((record) => record.owner_id)));

    const tasks = await enqueuer.enqueueAll(
      ownerIds.map((ownerId) => ({ kind: "owner", ownerId }) as const),
    );
    logger.info({ received: items.length, owners: ownerIds.length }, "Owner batch ingested");
    return { indexed: 0, tasks };
  }
}
