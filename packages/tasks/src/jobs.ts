import { z } from "zod";
import { JobName } from "@pagewise/ids";
import type { EntityId, OwnerId } from "@pagewise/ids";

export type AcquisitionJob =
  | { kind: "entity"; entityId: EntityId }
  | { kind: "owner"; ownerId: OwnerId };

export type AcquisitionJobKind = AcquisitionJob["kind"];

export type JobHandle = `queues/${string}/jobs/${string}`;

export const ENTITY_SPIDER_NAME = "entity";
export const OWNER_SPIDER_NAME = "owner_activity";

export interface CrawlTarget {
  projectId: string;
  entityResultTopic: string;
  activityResultTopic: string;
}

const entityCrawlArgsSchema = z
  .object({
    entity_ids: z.string().regex(/^\d+(,\d+)*$/),
    project_id: z.string().min(1),
    topic_name: z.string().min(1),
  })
  .strict();

const ownerCrawlArgsSchema = z
  .object({
    owner_id: z.string().regex(/^\d+$/),
    project_id: z.string().min(1),
    topic_name: z.string().min(1),
  })
  .strict();

export const crawlRequestSchema = z.discriminatedUnion("spider_name", [
  z
    .object({
      spider_name: z.literal(ENTITY_SPIDER_NAME),
      start_requests: z.literal(true),
      crawl_args: entityCrawlArgsSchema,
    })
    .strict(),
  z
    .object({
      spider_name: z.literal(OWNER_SPIDER_NAME),
      start_requests: z.literal(true),
      crawl_args: ownerCrawlArgsSchema,
    })
    .strict(),
]);

export type CrawlRequest = z.infer<typeof crawlRequestSchema>;

/** Deterministic job name, so the same logical job always collides with itself. */
export function jobNameFor(job: AcquisitionJob): JobName {
  switch (job.kind) {
    case "entity":
      return JobName(`entity-${job.entityId}`);
    case "owner":
      return JobName(`owner-${job.ownerId}`);
  }
}

export function jobHandleFor(queue: string, name: JobName): JobHandle {
  return `queues/${queue}/jobs/${name}`;
}

export function buildCrawlRequest(job: AcquisitionJob, target: CrawlTarget): CrawlRequest {
  switch (job.kind) {
    case "entity":
      return {
        spider_name: ENTITY_SPIDER_NAME,
        start_requests: true,
        crawl_args: {
          entity_ids: String(job.entityId),
          project_id: target.projectId,
          topic_name: target.entityResultTopic,
        },
      };
    case "owner":
      return {
        spider_name: OWNER_SPIDER_NAME,
        start_requests: true,
        crawl_args: {
          owner_id: String(job.ownerId),
          project_id: target.projectId,
          topic_name: target.activityResultTopic,
        },
      };
  }
}
