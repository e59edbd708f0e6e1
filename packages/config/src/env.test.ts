import { describe, expect, it } from "vitest";
import { loadApiEnv, loadBaseEnv, loadWorkerEnv } from "./env.js";

const baseVars = {
  NODE_ENV: "test",
  LOG_LEVEL: "info",
  DATABASE_URL: "postgres://example",
} as const;

describe("loadBaseEnv", () => {
  it("requires DATABASE_URL", () => {
    expect(() => loadBaseEnv({ NODE_ENV: "test" })).toThrow();
  });

  it("lets LOG_LEVEL override the yaml level", () => {
    const env = loadBaseEnv({ ...baseVars, LOG_LEVEL: "debug" });
    expect(env.LOG_LEVEL).toBe("debug");
  });

  it("applies db pool overrides", () => {
    const env = loadBaseEnv({ ...baseVars, DB_MAX_CONNECTIONS: "3" });
    expect(env.db.maxConnections).toBe(3);
    expect(env.db.statementTimeoutMs).toBe(30_000);
  });
});

describe("loadApiEnv", () => {
  it("reads defaults from base.yaml", () => {
    const env = loadApiEnv({ ...baseVars });

    expect(env.DEPLOY_ENV).toBe("development");
    expect(env.PORT).toBe(8080);
    expect(env.catalogApi.popularityThreshold).toBe(5);
    expect(env.catalogApi.popularityMaxAttempts).toBe(3);
    expect(env.catalogApi.popularityRetryDelayMs).toBe(500);
    expect(env.cache).toEqual({
      ownerActivityTtlMs: 600_000,
      ownerActivityMaxEntries: 2000,
      entityExistsMaxEntries: 10_000,
    });
    expect(env.pubsub.publishTimeoutMs).toBe(60_000);
    expect(env.acquisition.queueName).toBe("acquisition");
  });

  it("parses catalog and cache overrides", () => {
    const env = loadApiEnv({
      ...baseVars,
      PORT: "9000",
      CATALOG_API_BASE_URL: "http://catalog.internal:8000",
      POPULARITY_THRESHOLD: "10",
      OWNER_ACTIVITY_CACHE_TTL_MS: "1000",
      PUBSUB_ENTITY_AUDIT_TOPIC: "entities-audit-test",
    });

    expect(env.PORT).toBe(9000);
    expect(env.catalogApi.baseUrl).toBe("http://catalog.internal:8000");
    expect(env.catalogApi.popularityThreshold).toBe(10);
    expect(env.cache.ownerActivityTtlMs).toBe(1000);
    expect(env.pubsub.entityAuditTopic).toBe("entities-audit-test");
  });

  it("rejects a malformed catalog base url", () => {
    expect(() => loadApiEnv({ ...baseVars, CATALOG_API_BASE_URL: "not a url" })).toThrow();
  });
});

describe("loadWorkerEnv", () => {
  it("defaults RUN_MIGRATIONS to true", () => {
    const env = loadWorkerEnv({ ...baseVars });

    expect(env.DEPLOY_ENV).toBe("development");
    expect(env.RUN_MIGRATIONS).toBe(true);
    expect(env.WORKER_SINGLE_TICK).toBe(false);
    expect(env.WORKER_HEALTH_PORT).toBeNull();
    expect(env.dispatch.batchSize).toBe(25);
  });

  it("parses RUN_MIGRATIONS=false", () => {
    const env = loadWorkerEnv({ ...baseVars, RUN_MIGRATIONS: "false" });
    expect(env.RUN_MIGRATIONS).toBe(false);
  });

  it("rejects a non-boolean RUN_MIGRATIONS", () => {
    expect(() => loadWorkerEnv({ ...baseVars, RUN_MIGRATIONS: "maybe" })).toThrow();
  });

  it("parses dispatch overrides", () => {
    const env = loadWorkerEnv({
      ...baseVars,
      DISPATCH_BATCH_SIZE: "5",
      DISPATCH_MAX_ATTEMPTS: "2",
      WORKER_SINGLE_TICK: "1",
      WORKER_HEALTH_PORT: "9100",
    });

    expect(env.dispatch.batchSize).toBe(5);
    expect(env.dispatch.maxAttempts).toBe(2);
    expect(env.WORKER_SINGLE_TICK).toBe(true);
    expect(env.WORKER_HEALTH_PORT).toBe(9100);
  });

  it("defaults DEPLOY_ENV to production when NODE_ENV=production", () => {
    const env = loadWorkerEnv({ ...baseVars, NODE_ENV: "production" });
    expect(env.DEPLOY_ENV).toBe("production");
  });
});
