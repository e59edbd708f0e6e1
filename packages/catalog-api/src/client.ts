import { setTimeout as delay } from "node:timers/promises";
import { EntityId, isIntegerId } from "@pagewise/ids";
import type { OwnerId } from "@pagewise/ids";
import type { Logger } from "@pagewise/observability";
import {
  CatalogApiClientError,
  CatalogApiServerError,
  CatalogApiTransportError,
} from "./errors.js";
import {
  classifyPopularityResponse,
  collectPopularity,
  withPopularityRetries,
} from "./popularity.js";
import type {
  ActivityBatchResult,
  ActivityEntry,
  CatalogEntity,
  JsonObject,
  JsonValue,
  PopularityOutcome,
  RequestSnapshot,
  ResponseSnapshot,
} from "./types.js";

export interface CatalogApiClientOptions {
  baseUrl: string;
  fetch?: typeof fetch;
  logger?: Logger;
  popularity?: {
    maxAttempts?: number;
    retryDelayMs?: number;
  };
}

type HttpMethod = "GET" | "POST" | "PUT";

interface Exchange {
  status: number;
  body: JsonValue;
  bodyParseFailed: boolean;
  request: RequestSnapshot;
  response: ResponseSnapshot;
}

const DEFAULT_POPULARITY_MAX_ATTEMPTS = 3;
const DEFAULT_POPULARITY_RETRY_DELAY_MS = 500;

export class CatalogApiClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger | undefined;
  private readonly popularityMaxAttempts: number;
  private readonly popularityRetryDelayMs: number;

  constructor(options: CatalogApiClientOptions) {
    this.baseUrl = options.baseUrl;
    this.fetchImpl = options.fetch ?? globalThis.fetch;
    this.logger = options.logger;
    this.popularityMaxAttempts =
      options.popularity?.maxAttempts ?? DEFAULT_POPULARITY_MAX_ATTEMPTS;
    this.popularityRetryDelayMs =
      options.popularity?.retryDelayMs ?? DEFAULT_POPULARITY_RETRY_DELAY_MS;
  }

  async createEntity(entity: CatalogEntity): Promise<void> {
    await this.requestJson("PUT", `/entities/${entity.entity_id}`, { body: entity });
  }

  async createActivityBatch(entries: readonly ActivityEntry[]): Promise<ActivityBatchResult> {
    if (entries.length === 0) return { indexed: 0 };
    const { body } = await this.requestJson("POST", "/activity/batch/create", {
      body: { activity: entries },
    });
    const indexed = isJsonObject(body) ? body["indexed"] : undefined;
    if (typeof indexed !== "number" || !Number.isInteger(indexed) || indexed < 0) {
      throw new CatalogApiServerError("Activity batch response missing indexed count");
    }
    return { indexed };
  }

  /** Subset of `entityIds` that already exist downstream. A 4xx answers "none". */
  async getExistingEntityIds(entityIds: readonly EntityId[]): Promise<Set<EntityId>> {
    if (entityIds.length === 0) return new Set<EntityId>();
    const unique = Array.from(new Set(entityIds));
    try {
      const { body } = await this.requestJson("POST", "/entities/batch/exists", {
        body: { entity_ids: unique },
      });
      return new Set(readEntityIds(body));
    } catch (error) {
      if (error instanceof CatalogApiClientError) return new Set<EntityId>();
      throw error;
    }
  }

  /** Entity ids the owner already has activity for. A 4xx answers "none". */
  async getOwnerEntityIds(ownerId: OwnerId): Promise<EntityId[]> {
    try {
      const { body } = await this.requestJson("GET", `/owners/${ownerId}/entity-ids`);
      return readEntityIds(body);
    } catch (error) {
      if (error instanceof CatalogApiClientError) return [];
      throw error;
    }
  }

  /**
   * One popularity lookup per entity, all in flight together. Entities whose
   * lookup never succeeds are left out of the result.
   */
  async getPopularity(
    entityIds: readonly EntityId[],
    params: { limit: number },
  ): Promise<Map<EntityId, number>> {
    const unique = Array.from(new Set(entityIds));
    const outcomes = await Promise.all(
      unique.map(async (entityId) => {
        const { outcome, attempts } = await withPopularityRetries(
          () => this.fetchPopularityOnce(entityId, params.limit),
          {
            maxAttempts: this.popularityMaxAttempts,
            delay: () => delay(this.popularityRetryDelayMs),
          },
        );
        if (outcome.kind !== "success") {
          this.logger?.warn(
            { entityId, attempts, outcome: outcome.kind, reason: outcome.reason },
            "Popularity lookup gave up",
          );
        }
        return outcome;
      }),
    );
    return collectPopularity(outcomes);
  }

  async isReady(): Promise<boolean> {
    try {
      const exchange = await this.exchange("GET", "/health");
      return exchange.status >= 200 && exchange.status < 300;
    } catch (error) {
      if (error instanceof CatalogApiTransportError) return false;
      throw error;
    }
  }

  private async fetchPopularityOnce(entityId: EntityId, limit: number): Promise<PopularityOutcome> {
    let exchange: Exchange;
    try {
      exchange = await this.exchange("GET", `/entities/${entityId}/popularity`, {
        query: { limit },
      });
    } catch (error) {
      if (error instanceof CatalogApiTransportError) {
        return { kind: "retryable", entityId, reason: "transport failure" };
      }
      throw error;
    }
    if (exchange.bodyParseFailed && exchange.status < 300) {
      return { kind: "non_retryable", entityId, reason: "invalid JSON" };
    }
    return classifyPopularityResponse(entityId, exchange.status, exchange.body);
  }

  private async requestJson(
    method: HttpMethod,
    path: string,
    options: { body?: unknown; query?: Record<string, string | number> } = {},
  ): Promise<Exchange> {
    const exchange = await this.exchange(method, path, options);
    const { status, request, response } = exchange;

    if (status === 429 || status >= 500) {
      throw new CatalogApiServerError(`catalog API returned ${status}`, {
        status,
        request,
        response,
      });
    }

    if (status >= 400) {
      const message = extractMessage(exchange.body) ?? `catalog API returned ${status}`;
      throw new CatalogApiClientError(message, { status, request, response });
    }

    if (exchange.bodyParseFailed) {
      throw new CatalogApiServerError("catalog API returned invalid JSON", {
        status,
        request,
        response,
      });
    }

    return exchange;
  }

  private async exchange(
    method: HttpMethod,
    path: string,
    options: { body?: unknown; query?: Record<string, string | number> } = {},
  ): Promise<Exchange> {
    const url = new URL(path, this.baseUrl);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      url.searchParams.set(key, String(value));
    }

    const headers: Record<string, string> = { Accept: "application/json" };
    const init: RequestInit = { method, headers };
    if (options.body !== undefined) {
      headers["Content-Type"] = "application/json";
      init.body = JSON.stringify(options.body);
    }

    const request: RequestSnapshot = { method, url: url.toString(), headers: { ...headers } };

    let response: Response;
    try {
      response = await this.fetchImpl(url, init);
    } catch (error) {
      throw new CatalogApiTransportError("catalog API request failed", error, { request });
    }

    let bodyText: string;
    try {
      bodyText = await response.text();
    } catch (error) {
      throw new CatalogApiTransportError("catalog API response body failed", error, { request });
    }

    const responseSnapshot: ResponseSnapshot = {
      statusCode: response.status,
      headers: Object.fromEntries(response.headers.entries()),
      body: bodyText,
    };

    let body: JsonValue = null;
    let bodyParseFailed = false;
    if (bodyText.trim().length > 0) {
      try {
        body = parseJsonValue(bodyText);
      } catch {
        bodyParseFailed = true;
      }
    }

    return { status: response.status, body, bodyParseFailed, request, response: responseSnapshot };
  }
}

function parseJsonValue(text: string): JsonValue {
  const parsed: unknown = JSON.parse(text);
  if (!isJsonValue(parsed)) throw new Error("Unexpected JSON value");
  return parsed;
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return true;
  }
  if (Array.isArray(value)) {
    return value.every(isJsonValue);
  }
  return isJsonObject(value);
}

function extractMessage(value: JsonValue): string | null {
  if (!isJsonObject(value)) return null;
  const message = value["message"] ?? value["detail"];
  return typeof message === "string" ? message : null;
}

function readEntityIds(body: JsonValue): EntityId[] {
  if (!isJsonObject(body)) {
    throw new CatalogApiServerError("catalog API returned non-object entity id list");
  }
  const ids = body["entity_ids"];
  if (!Array.isArray(ids)) {
    throw new CatalogApiServerError("catalog API response missing entity_ids");
  }
  return ids.filter(isIntegerId).map((id) => EntityId(id));
}
