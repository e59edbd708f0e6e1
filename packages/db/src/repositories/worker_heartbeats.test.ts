import { parseWorkerId } from "@pagewise/ids";
import {
  DummyDriver,
  Kysely,
  PostgresAdapter,
  PostgresIntrospector,
  PostgresQueryCompiler,
} from "kysely";
import { describe, expect, it } from "vitest";
import type { Database } from "../schema.js";
import { buildRecordWorkerHeartbeat } from "./worker_heartbeats.js";

const db = new Kysely<Database>({
  dialect: {
    createAdapter: () => new PostgresAdapter(),
    createDriver: () => new DummyDriver(),
    createIntrospector: (instance) => new PostgresIntrospector(instance),
    createQueryCompiler: () => new PostgresQueryCompiler(),
  },
});

describe("worker heartbeat query", () => {
  it("upserts the heartbeat and keeps the start time", () => {
    const at = new Date("2024-01-02T03:04:05.000Z");
    const compiled = buildRecordWorkerHeartbeat(db, {
      service: "worker",
      workerId: parseWorkerId(" host-a:42 "),
      lastHeartbeatAt: at,
    }).compile();

    expect(compiled.sql).toBe(
      'insert into "worker_heartbeats" ' +
        '("service", "worker_id", "started_at", "last_heartbeat_at") ' +
        'values ($1, $2, $3, $4) on conflict ("service", "worker_id") do update set ' +
        '"last_heartbeat_at" = $5',
    );
    expect(compiled.parameters).toEqual(["worker", "host-a:42", at, at, at]);
  });
});
