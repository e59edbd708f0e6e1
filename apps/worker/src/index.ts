import { loadWorkerEnv } from "@pagewise/config";
import {
  createDb,
  destroyDb,
  migrateToLatestWithLock,
  pingDb,
  recordWorkerHeartbeat,
} from "@pagewise/db";
import { parseWorkerId } from "@pagewise/ids";
import { createLogger } from "@pagewise/observability";
import {
  AcquisitionDispatcher,
  PostgresJobStore,
  ScraperClient,
  runDispatchLoop,
} from "@pagewise/tasks";
import http from "node:http";
import os from "node:os";

const env = loadWorkerEnv();
const logger = createLogger({ env: env.DEPLOY_ENV, level: env.LOG_LEVEL, service: "worker" });
const db = createDb(env.DATABASE_URL, env.db);

const abortController = new AbortController();
process.once("SIGINT", () => {
  abortController.abort();
});
process.once("SIGTERM", () => {
  abortController.abort();
});

const workerId = parseWorkerId(`${os.hostname()}:${process.pid}`);
const heartbeatIntervalMs = 60_000;
let heartbeatTimer: NodeJS.Timeout | null = null;
let healthServer: http.Server | null = null;

async function recordHeartbeat() {
  await recordWorkerHeartbeat(db, {
    service: "worker",
    workerId,
    lastHeartbeatAt: new Date(),
  });
}

try {
  if (env.WORKER_HEALTH_PORT) {
    healthServer = http.createServer((req, res) => {
      if (req.url === "/healthz") {
        void pingDb(db).then(
          () => {
            res.writeHead(200, { "content-type": "application/json" });
            res.end(JSON.stringify({ ok: true }));
          },
          (error: unknown) => {
            logger.warn({ error }, "worker health check failed");
            res.writeHead(503, { "content-type": "application/json" });
            res.end(JSON.stringify({ ok: false }));
          },
        );
        return;
      }
      res.writeHead(404, { "content-type": "application/json" });
      res.end(JSON.stringify({ error: "not_found" }));
    });
    healthServer.listen(env.WORKER_HEALTH_PORT, () => {
      logger.info({ port: env.WORKER_HEALTH_PORT }, "worker health server listening");
    });
  }

  if (env.RUN_MIGRATIONS) {
    await migrateToLatestWithLock(db, { logger });
  }

  await recordHeartbeat();
  heartbeatTimer = setInterval(() => {
    void recordHeartbeat().catch((error: unknown) => {
      logger.warn({ error }, "failed to record worker heartbeat");
    });
  }, heartbeatIntervalMs);

  const dispatcher = new AcquisitionDispatcher({
    store: new PostgresJobStore(db),
    scraper: new ScraperClient({ baseUrl: env.acquisition.scraperBaseUrl }),
    logger,
    queueName: env.acquisition.queueName,
    batchSize: env.dispatch.batchSize,
    maxAttempts: env.dispatch.maxAttempts,
    retryBackoffMs: env.dispatch.retryBackoffMs,
  });
  await runDispatchLoop({
    tick: () => dispatcher.dispatchDue(),
    intervalMs: env.dispatch.intervalMs,
    signal: abortController.signal,
    singleTick: env.WORKER_SINGLE_TICK,
    onError: (error) => {
      logger.error({ error }, "dispatch tick failed");
    },
  });
} catch (error: unknown) {
  logger.error({ error }, "worker failed");
  process.exitCode = 1;
} finally {
  if (heartbeatTimer) {
    clearInterval(heartbeatTimer);
  }
  if (healthServer) {
    await new Promise<void>((resolve) => {
      healthServer?.close(() => {
        resolve();
      });
    });
  }
  await destroyDb(db);
}
