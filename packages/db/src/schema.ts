import type { ColumnType, Generated, Selectable } from "kysely";

export type JsonPrimitive = boolean | null | number | string;
export type JsonValue = JsonPrimitive | JsonObject | JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

export type Timestamp = ColumnType<Date, Date | string, Date | string>;
/** Timestamp with a database default: optional on insert. */
export type GeneratedTimestamp = ColumnType<Date, Date | string | undefined, Date | string>;

export type AcquisitionJobKind = "entity" | "owner";
export type AcquisitionJobStatus = "pending" | "dispatched" | "failed";

export interface AcquisitionJobsTable {
  name: string;
  queue: string;
  kind: AcquisitionJobKind;
  payload: JsonValue;
  status: Generated<AcquisitionJobStatus>;
  attempts: Generated<number>;
  run_after: GeneratedTimestamp;
  last_error: string | null;
  created_at: GeneratedTimestamp;
  updated_at: GeneratedTimestamp;
}

export interface WorkerHeartbeatsTable {
  service: string;
  worker_id: string;
  started_at: Timestamp;
  last_heartbeat_at: Timestamp;
}

export interface Database {
  acquisition_jobs: AcquisitionJobsTable;
  worker_heartbeats: WorkerHeartbeatsTable;
}

export type AcquisitionJobRow = Selectable<AcquisitionJobsTable>;
