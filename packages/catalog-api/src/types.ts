import type { EntityId } from "@pagewise/ids";

export type JsonPrimitive = boolean | null | number | string;
export type JsonValue = JsonPrimitive | JsonObject | JsonArray;
export interface JsonObject {
  [key: string]: JsonValue;
}
export type JsonArray = JsonValue[];

export interface RequestSnapshot extends JsonObject {
  method: string;
  url: string;
  headers: Record<string, string>;
}

export interface ResponseSnapshot extends JsonObject {
  statusCode: number;
  headers: Record<string, string>;
  body: string;
}

/** Catalog item as written to `PUT /entities/{id}`. Timestamps are ISO-8601 UTC. */
export interface CatalogEntity {
  entity_id: number;
  work_id: number;
  work_internal_id: string;
  title: string;
  original_title?: string | null | undefined;
  description?: string | null | undefined;
  author: string;
  author_url: string;
  entity_url: string;
  num_ratings?: number | null | undefined;
  num_reviews?: number | null | undefined;
  avg_rating: number;
  rating_histogram: number[];
  num_pages?: number | null | undefined;
  language?: string | null | undefined;
  isbn?: string | null | undefined;
  isbn13?: string | null | undefined;
  asin?: string | null | undefined;
  series?: string | null | undefined;
  genres: string[];
  publish_date?: string | null | undefined;
  scrape_time: string;
}

/** One owner's rating of one entity, as sent to `POST /activity/batch/create`. */
export interface ActivityEntry {
  owner_id: number;
  entity_id: number;
  rating: number;
  occurred_at: string;
  observed_at: string;
}

export interface ActivityBatchResult {
  indexed: number;
}

export type PopularityOutcome =
  | { kind: "success"; entityId: EntityId; count: number }
  | { kind: "retryable"; entityId: EntityId; reason: string }
  | { kind: "non_retryable"; entityId: EntityId; reason: string };
