import type { WorkerId } from "@pagewise/ids";
import type { DbOrTx } from "../db.js";

export interface WorkerHeartbeatParams {
  service: string;
  workerId: WorkerId;
  lastHeartbeatAt: Date;
}

export function buildRecordWorkerHeartbeat(db: DbOrTx, params: WorkerHeartbeatParams) {
  return db
    .insertInto("worker_heartbeats")
    .values({
      service: params.service,
      worker_id: params.workerId,
      started_at: params.lastHeartbeatAt,
      last_heartbeat_at: params.lastHeartbeatAt,
    })
    .onConflict((oc) =>
      oc.columns(["service", "worker_id"]).doUpdateSet({
        last_heartbeat_at: params.lastHeartbeatAt,
      }),
    );
}

export async function recordWorkerHeartbeat(
  db: DbOrTx,
  params: WorkerHeartbeatParams,
): Promise<void> {
  await buildRecordWorkerHeartbeat(db, params).execute();
}
