import { setTimeout as delay } from "node:timers/promises";
import type { Logger } from "@pagewise/observability";
import type { MessagePublisher } from "./publisher.js";

export type AuditTopic = "entities" | "activity";

export interface AuditPublisherOptions {
  publisher: MessagePublisher;
  topics: Record<AuditTopic, string>;
  logger: Logger;
  timeoutMs?: number;
}

export interface AuditBatchResult {
  published: number;
  failed: number;
  timedOut: number;
}

type PublishOutcome =
  | { kind: "published"; messageId: string }
  | { kind: "failed"; error: unknown }
  | { kind: "timeout" };

const DEFAULT_TIMEOUT_MS = 60_000;

/**
 * Mirrors written records onto the audit topics. Every publish is awaited up to
 * `timeoutMs`; failures and timeouts are logged and counted, never thrown.
 */
export class AuditPublisher {
  private readonly publisher: MessagePublisher;
  private readonly topics: Record<AuditTopic, string>;
  private readonly logger: Logger;
  private readonly timeoutMs: number;

  constructor(options: AuditPublisherOptions) {
    this.publisher = options.publisher;
    this.topics = options.topics;
    this.logger = options.logger;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async sendBatch(topic: AuditTopic, records: readonly unknown[]): Promise<AuditBatchResult> {
    const result: AuditBatchResult = { published: 0, failed: 0, timedOut: 0 };
    if (records.length === 0) return result;

    const topicName = this.topics[topic];
    const start = Date.now();
    const outcomes = await Promise.all(
      records.map((record) => this.publishOne(topicName, JSON.stringify(record))),
    );

    outcomes.forEach((outcome, index) => {
      switch (outcome.kind) {
        case "published":
          result.published += 1;
          return;
        case "failed":
          result.failed += 1;
          this.logger.error(
            { topic: topicName, index, error: outcome.error },
            "Audit publish failed",
          );
          return;
        case "timeout":
          result.timedOut += 1;
          this.logger.error(
            { topic: topicName, index, timeoutMs: this.timeoutMs },
            "Audit publish timed out",
          );
          return;
      }
    });

    this.logger.info(
      { topic: topicName, ...result, durationMs: Date.now() - start },
      "Audit batch sent",
    );
    return result;
  }

  private async publishOne(topicName: string, payload: string): Promise<PublishOutcome> {
    const controller = new AbortController();
    const publish = this.publisher
      .publish(topicName, Buffer.from(payload, "utf8"))
      .then(
        (messageId): PublishOutcome => ({ kind: "published", messageId }),
        (error: unknown): PublishOutcome => ({ kind: "failed", error }),
      );
    const timeout = delay<PublishOutcome>(this.timeoutMs, { kind: "timeout" }, {
      signal: controller.signal,
    });

    try {
      return await Promise.race([publish, timeout]);
    } finally {
      controller.abort();
    }
  }
}
