import { describe, expect, it } from "vitest";
import { createSilentLogger } from "@pagewise/observability";
import { InMemoryJobStore, TaskEnqueuer, TaskQueueError } from "@pagewise/tasks";
import { OwnerIngestService } from "./owners.js";

function createHarness() {
  const store = new InMemoryJobStore();
  const logger = createSilentLogger();
  const enqueuer = new TaskEnqueuer({
    store,
    queueName: "acquisition",
    crawlTarget: {
      projectId: "pagewise-test",
      entityResultTopic: "scraper-entities-v1",
      activityResultTopic: "scraper-activity-v1",
    },
    logger,
  });
  return { store, service: new OwnerIngestService({ enqueuer, logger }) };
}

describe("OwnerIngestService", () => {
  it("queues one activity acquisition per owner", async () => {
    const { store, service } = createHarness();

    await expect(service.ingest([{ owner_id: 11 }, { owner_id: "12" }])).resolves.toEqual({
      indexed: 0,
      tasks: ["queues/acquisition/jobs/owner-11", "queues/acquisition/jobs/owner-12"],
    });
    expect(store.list().map((job) => job.payload)).toEqual([
      {
        spider_name: "owner_activity",
        start_requests: true,
        crawl_args: {
          owner_id: "11",
          project_id: "pagewise-test",
          topic_name: "scraper-activity-v1",
        },
      },
      {
        spider_name: "owner_activity",
        start_requests: true,
        crawl_args: {
          owner_id: "12",
          project_id: "pagewise-test",
          topic_name: "scraper-activity-v1",
        },
      },
    ]);
  });

  it("reports duplicates on redelivery", async () => {
    const { service } = createHarness();

    await service.ingest([{ owner_id: 11 }]);
    await expect(service.ingest([{ owner_id: 11 }, { owner_id: 11 }])).resolves.toEqual({
      indexed: 0,
      tasks: ["duplicate"],
    });
  });

  it("ignores invalid owner records", async () => {
    const { service } = createHarness();

    await expect(service.ingest([{ owner_id: -1 }, { owner: 3 }])).resolves.toEqual({
      indexed: 0,
      tasks: [],
    });
  });

  it("surfaces queue failures", async () => {
    const { store, service } = createHarness();
    store.failWith(new Error("connection refused"));

    await expect(service.ingest([{ owner_id: 11 }])).rejects.toBeInstanceOf(TaskQueueError);
  });
});
