interface FakeCall {
  method: string;
  path: string;
  body: unknown;
}

interface ScriptedResponse {
  method: string;
  path: RegExp;
  status: number;
  remaining: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

function readIds(value: unknown): number[] {
  return Array.isArray(value)
    ? value.filter((item): item is number => typeof item === "number")
    : [];
}

/**
 * In-process stand-in for the catalog API, served through an injected `fetch`.
 * Holds entities, owner activity and popularity counts in memory.
 */
export class FakeCatalogApi {
  readonly entities = new Set<number>();
  readonly activity = new Map<number, Set<number>>();
  readonly popularity = new Map<number, number>();
  readonly calls: FakeCall[] = [];
  private readonly scripted: ScriptedResponse[] = [];

  readonly fetch: typeof fetch = async (input, init) => {
    const url = new URL(input instanceof Request ? input.url : input.toString());
    const method = init?.method ?? "GET";
    const rawBody = init?.body;
    const body: unknown = typeof rawBody === "string" ? JSON.parse(rawBody) : undefined;
    this.calls.push({ method, path: url.pathname, body });
    return this.handle(method, url, body);
  };

  /** Answers the next `times` matching requests with `status` instead of the normal route. */
  respondWith(method: string, path: RegExp, status: number, times = 1): void {
    this.scripted.push({ method, path, status, remaining: times });
  }

  addActivity(ownerId: number, entityIds: readonly number[]): void {
    const existing = this.activity.get(ownerId) ?? new Set<number>();
    for (const entityId of entityIds) existing.add(entityId);
    this.activity.set(ownerId, existing);
  }

  callCount(method: string, path: RegExp): number {
    return this.calls.filter((call) => call.method === method && path.test(call.path)).length;
  }

  private handle(method: string, url: URL, body: unknown): Response {
    const scripted = this.scripted.find(
      (entry) => entry.remaining > 0 && entry.method === method && entry.path.test(url.pathname),
    );
    if (scripted) {
      scripted.remaining -= 1;
      return json({ detail: `scripted ${scripted.status}` }, scripted.status);
    }

    const segments = url.pathname.split("/").filter((segment) => segment.length > 0);

    if (method === "GET" && url.pathname === "/health") {
      return json({ status: "ok" });
    }

    if (method === "PUT" && segments.length === 2 && segments[0] === "entities") {
      this.entities.add(Number(segments[1]));
      return json({});
    }

    if (method === "POST" && url.pathname === "/activity/batch/create") {
      const entries = isRecord(body) && Array.isArray(body["activity"]) ? body["activity"] : [];
      let indexed = 0;
      for (const entry of entries) {
        if (!isRecord(entry)) continue;
        const ownerId = entry["owner_id"];
        const entityId = entry["entity_id"];
        if (typeof ownerId !== "number" || typeof entityId !== "number") continue;
        this.addActivity(ownerId, [entityId]);
        indexed += 1;
      }
      return json({ indexed });
    }

    if (method === "POST" && url.pathname === "/entities/batch/exists") {
      const requested = isRecord(body) ? readIds(body["entity_ids"]) : [];
      return json({ entity_ids: requested.filter((id) => this.entities.has(id)) });
    }

    if (
      method === "GET" &&
      segments.length === 3 &&
      segments[0] === "owners" &&
      segments[2] === "entity-ids"
    ) {
      const owned = this.activity.get(Number(segments[1]));
      if (!owned) return json({ detail: "owner not found" }, 404);
      return json({ entity_ids: Array.from(owned) });
    }

    if (
      method === "GET" &&
      segments.length === 3 &&
      segments[0] === "entities" &&
      segments[2] === "popularity"
    ) {
      return json({ count: this.popularity.get(Number(segments[1])) ?? 0 });
    }

    return json({ detail: "not found" }, 404);
  }
}
