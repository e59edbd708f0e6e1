import { PubSub } from "@google-cloud/pubsub";
import { AuditPublisher, PubSubMessagePublisher } from "@pagewise/audit";
import { EntityExistenceCache, OwnerActivityCache } from "@pagewise/cache";
import { CatalogApiClient } from "@pagewise/catalog-api";
import { loadApiEnv } from "@pagewise/config";
import { createDb, destroyDb } from "@pagewise/db";
import {
  AcquisitionScheduler,
  ActivityIngestService,
  EntityIngestService,
  OwnerIngestService,
} from "@pagewise/ingest";
import { createLogger, createPinoOptions } from "@pagewise/observability";
import { PostgresJobStore, TaskEnqueuer } from "@pagewise/tasks";
import { buildServer } from "./server.js";

const env = loadApiEnv();
const loggerParams = { env: env.DEPLOY_ENV, level: env.LOG_LEVEL, service: "api" };
const logger = createLogger(loggerParams);

const db = createDb(env.DATABASE_URL, env.db);
const jobStore = new PostgresJobStore(db);

// Process-wide caches, shared by every request.
const caches = {
  ownerActivity: new OwnerActivityCache({
    ttlMs: env.cache.ownerActivityTtlMs,
    maxEntries: env.cache.ownerActivityMaxEntries,
  }),
  entityExistence: new EntityExistenceCache({ maxEntries: env.cache.entityExistsMaxEntries }),
};

const catalog = new CatalogApiClient({
  baseUrl: env.catalogApi.baseUrl,
  logger,
  popularity: {
    maxAttempts: env.catalogApi.popularityMaxAttempts,
    retryDelayMs: env.catalogApi.popularityRetryDelayMs,
  },
});

const enqueuer = new TaskEnqueuer({
  store: jobStore,
  queueName: env.acquisition.queueName,
  crawlTarget: {
    projectId: env.pubsub.projectId,
    entityResultTopic: env.acquisition.entityResultTopic,
    activityResultTopic: env.acquisition.activityResultTopic,
  },
  logger,
});

const publisher = new PubSubMessagePublisher(new PubSub({ projectId: env.pubsub.projectId }));
const audit = new AuditPublisher({
  publisher,
  topics: {
    entities: env.pubsub.entityAuditTopic,
    activity: env.pubsub.activityAuditTopic,
  },
  logger,
  timeoutMs: env.pubsub.publishTimeoutMs,
});

const scheduler = new AcquisitionScheduler({
  catalog,
  entityExistence: caches.entityExistence,
  enqueuer,
  popularityThreshold: env.catalogApi.popularityThreshold,
  logger,
});

const server = buildServer({
  loggerOptions: createPinoOptions(loggerParams),
  handlers: {
    entities: new EntityIngestService({ catalog, caches, audit, logger }),
    activity: new ActivityIngestService({ catalog, caches, audit, scheduler, logger }),
    owners: new OwnerIngestService({ enqueuer, logger }),
  },
  readiness: { catalog, jobStore },
});

let shuttingDown = false;
async function shutdown(signal: "SIGINT" | "SIGTERM") {
  if (shuttingDown) return;
  shuttingDown = true;

  server.log.info({ signal }, "shutting down");
  await server.close();
  await publisher.close();
  await destroyDb(db);
}

process.once("SIGINT", () => void shutdown("SIGINT"));
process.once("SIGTERM", () => void shutdown("SIGTERM"));

try {
  await server.listen({ host: env.HOST, port: env.PORT });
  server.log.info({ host: env.HOST, port: env.PORT }, "api listening");
} catch (error) {
  server.log.error({ error }, "api failed to start");
  process.exitCode = 1;
  await shutdown("SIGTERM");
}
