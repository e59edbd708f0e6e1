import { describe, expect, it } from "vitest";
import type { AuditTopic } from "@pagewise/audit";
import { EntityExistenceCache, OwnerActivityCache } from "@pagewise/cache";
import { CatalogApiClient, CatalogApiServerError } from "@pagewise/catalog-api";
import { FakeCatalogApi } from "@pagewise/catalog-api/testing";
import { createSilentLogger } from "@pagewise/observability";
import { InMemoryJobStore, TaskEnqueuer } from "@pagewise/tasks";
import { ActivityIngestService } from "./activity.js";
import { AcquisitionScheduler } from "./scheduler.js";

const OWNER_ACTIVITY_TTL_MS = 600_000;

function createHarness() {
  const api = new FakeCatalogApi();
  const logger = createSilentLogger();
  const catalog = new CatalogApiClient({
    baseUrl: "https://catalog.test",
    fetch: api.fetch,
    popularity: { maxAttempts: 3, retryDelayMs: 0 },
  });
  let now = 0;
  const caches = {
    ownerActivity: new OwnerActivityCache({
      ttlMs: OWNER_ACTIVITY_TTL_MS,
      maxEntries: 2000,
      now: () => now,
    }),
    entityExistence: new EntityExistenceCache({ maxEntries: 100 }),
  };
  const store = new InMemoryJobStore();
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
  const published: { topic: AuditTopic; records: unknown[] }[] = [];
  const audit = {
    sendBatch: (topic: AuditTopic, records: readonly unknown[]) => {
      published.push({ topic, records: [...records] });
      return Promise.resolve({ published: records.length, failed: 0, timedOut: 0 });
    },
  };
  const scheduler = new AcquisitionScheduler({
    catalog,
    entityExistence: caches.entityExistence,
    enqueuer,
    popularityThreshold: 5,
    logger,
  });
  const service = new ActivityIngestService({ catalog, caches, audit, scheduler, logger });

  return {
    api,
    service,
    store,
    published,
    advance(ms: number) {
      now += ms;
    },
  };
}

function activity(ownerId: number, entityId: number) {
  return {
    owner_id: ownerId,
    entity_id: entityId,
    rating: 4,
    occurred_at: "2023-06-01T12:00:00Z",
    observed_at: "2024-01-02T03:04:05Z",
  };
}

const OWNER_LOOKUP = /^\/owners\/\d+\/entity-ids$/;
const ACTIVITY_WRITE = /^\/activity\/batch\/create$/;
const EXISTS_CHECK = /^\/entities\/batch\/exists$/;

describe("ActivityIngestService", () => {
  it("writes new activity and schedules a popular missing entity", async () => {
    const { api, service, published } = createHarness();
    api.popularity.set(2, 5);

    await expect(service.ingest([activity(1, 2)])).resolves.toEqual({
      indexed: 1,
      tasks: ["queues/acquisition/jobs/entity-2"],
    });
    expect(api.activity.get(1)).toEqual(new Set([2]));
    expect(published).toEqual([
      {
        topic: "activity",
        records: [
          {
            owner_id: 1,
            entity_id: 2,
            rating: 4,
            occurred_at: "2023-06-01T12:00:00.000Z",
            observed_at: "2024-01-02T03:04:05.000Z",
          },
        ],
      },
    ]);
  });

  it("indexes nothing and creates no new job on redelivery", async () => {
    const { api, service, store } = createHarness();
    api.popularity.set(2, 5);

    await service.ingest([activity(1, 2)]);
    await expect(service.ingest([activity(1, 2)])).resolves.toEqual({
      indexed: 0,
      tasks: ["duplicate"],
    });
    expect(api.callCount("POST", ACTIVITY_WRITE)).toBe(1);
    expect(store.list()).toHaveLength(1);
  });

  it("skips pairs the owner already has downstream", async () => {
    const { api, service } = createHarness();
    api.addActivity(1, [2]);

    await expect(service.ingest([activity(1, 2), activity(1, 3)])).resolves.toEqual({
      indexed: 1,
      tasks: [],
    });
    const write = api.calls.find((call) => call.method === "POST" && ACTIVITY_WRITE.test(call.path));
    expect(write?.body).toEqual({
      activity: [
        {
          owner_id: 1,
          entity_id: 3,
          rating: 4,
          occurred_at: "2023-06-01T12:00:00.000Z",
          observed_at: "2024-01-02T03:04:05.000Z",
        },
      ],
    });
  });

  it("collapses a repeated pair within one batch", async () => {
    const { service } = createHarness();

    await expect(service.ingest([activity(1, 2), activity(1, 2)])).resolves.toEqual({
      indexed: 1,
      tasks: [],
    });
  });

  it("drops invalid items and keeps the rest", async () => {
    const { service } = createHarness();

    await expect(
      service.ingest([activity(1, 2), { ...activity(1, 3), rating: 9 }, "garbage"]),
    ).resolves.toEqual({ indexed: 1, tasks: [] });
  });

  it("continues past an owner the catalog rejects", async () => {
    const { api, service, published } = createHarness();
    api.respondWith("POST", ACTIVITY_WRITE, 422);

    await expect(service.ingest([activity(1, 2), activity(3, 4)])).resolves.toEqual({
      indexed: 1,
      tasks: [],
    });
    expect(api.activity.has(1)).toBe(false);
    expect(published).toHaveLength(1);
    expect(published[0]?.records).toHaveLength(1);
  });

  it("aborts the batch on a server error without publishing audit records", async () => {
    const { api, service, published } = createHarness();
    api.respondWith("POST", ACTIVITY_WRITE, 503);
    api.respondWith("POST", ACTIVITY_WRITE, 503);

    await expect(service.ingest([activity(1, 2), activity(3, 4)])).rejects.toBeInstanceOf(
      CatalogApiServerError,
    );
    expect(published).toHaveLength(0);
  });

  it("withholds audit records when a later owner fails", async () => {
    const { api, service, published } = createHarness();
    api.respondWith("GET", /^\/owners\/3\/entity-ids$/, 500);

    await expect(service.ingest([activity(1, 2), activity(3, 4)])).rejects.toBeInstanceOf(
      CatalogApiServerError,
    );
    expect(api.activity.get(1)).toEqual(new Set([2]));
    expect(published).toHaveLength(0);
  });

  it("reuses an owner's cached activity until the ttl expires", async () => {
    const { api, service, advance } = createHarness();

    await service.ingest([activity(1, 2)]);
    await service.ingest([activity(1, 3)]);
    expect(api.callCount("GET", OWNER_LOOKUP)).toBe(1);

    advance(OWNER_ACTIVITY_TTL_MS);
    await expect(service.ingest([activity(1, 3)])).resolves.toEqual({ indexed: 0, tasks: [] });
    expect(api.callCount("GET", OWNER_LOOKUP)).toBe(2);
  });

  it("schedules a popular entity once per batch and once across batches", async () => {
    const { api, service } = createHarness();
    api.popularity.set(2, 9);

    await expect(service.ingest([activity(1, 2), activity(3, 2)])).resolves.toEqual({
      indexed: 2,
      tasks: ["queues/acquisition/jobs/entity-2"],
    });
    await expect(service.ingest([activity(4, 2)])).resolves.toEqual({
      indexed: 1,
      tasks: ["duplicate"],
    });
  });

  it("does not schedule entities below the threshold", async () => {
    const { api, service } = createHarness();
    api.popularity.set(2, 4);

    await expect(service.ingest([activity(1, 2)])).resolves.toEqual({ indexed: 1, tasks: [] });
    expect(api.callCount("POST", EXISTS_CHECK)).toBe(0);
  });

  it("does not schedule entities that already exist and remembers them", async () => {
    const { api, service } = createHarness();
    api.popularity.set(2, 5);
    api.entities.add(2);

    await expect(service.ingest([activity(1, 2)])).resolves.toEqual({ indexed: 1, tasks: [] });
    await expect(service.ingest([activity(3, 2)])).resolves.toEqual({ indexed: 1, tasks: [] });
    expect(api.callCount("POST", EXISTS_CHECK)).toBe(1);
  });

  it("counts a popularity lookup that recovers on the third attempt", async () => {
    const { api, service } = createHarness();
    api.popularity.set(2, 5);
    api.respondWith("GET", /^\/entities\/2\/popularity$/, 503, 2);

    await expect(service.ingest([activity(1, 2)])).resolves.toEqual({
      indexed: 1,
      tasks: ["queues/acquisition/jobs/entity-2"],
    });
  });

  it("leaves out an entity whose popularity never answers", async () => {
    const { api, service } = createHarness();
    api.popularity.set(2, 5);
    api.respondWith("GET", /^\/entities\/2\/popularity$/, 503, 3);

    await expect(service.ingest([activity(1, 2)])).resolves.toEqual({ indexed: 1, tasks: [] });
    expect(api.callCount("GET", /^\/entities\/2\/popularity$/)).toBe(3);
  });
});
