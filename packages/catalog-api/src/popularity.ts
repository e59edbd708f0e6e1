import type { EntityId } from "@pagewise/ids";
import type { PopularityOutcome } from "./types.js";

const RETRYABLE_STATUSES = new Set([429, 503, 504]);

export function isRetryablePopularityStatus(status: number): boolean {
  return RETRYABLE_STATUSES.has(status);
}

export function classifyPopularityResponse(
  entityId: EntityId,
  status: number,
  body: unknown,
): PopularityOutcome {
  if (status >= 200 && status < 300) {
    const count = readCount(body);
    if (count === null) {
      return { kind: "non_retryable", entityId, reason: "popularity response missing count" };
    }
    return { kind: "success", entityId, count };
  }
  if (isRetryablePopularityStatus(status)) {
    return { kind: "retryable", entityId, reason: `status ${status}` };
  }
  return { kind: "non_retryable", entityId, reason: `status ${status}` };
}

/**
 * Runs `attempt` until it stops answering `retryable` or `maxAttempts` is reached,
 * waiting `delay` between attempts. Returns the last outcome.
 */
export async function withPopularityRetries(
  attempt: () => Promise<PopularityOutcome>,
  params: { maxAttempts: number; delay: () => Promise<void> },
): Promise<{ outcome: PopularityOutcome; attempts: number }> {
  let attempts = 1;
  let outcome = await attempt();
  while (outcome.kind === "retryable" && attempts < params.maxAttempts) {
    await params.delay();
    attempts += 1;
    outcome = await attempt();
  }
  return { outcome, attempts };
}

export function collectPopularity(outcomes: readonly PopularityOutcome[]): Map<EntityId, number> {
  const counts = new Map<EntityId, number>();
  for (const outcome of outcomes) {
    if (outcome.kind === "success") counts.set(outcome.entityId, outcome.count);
  }
  return counts;
}

function readCount(body: unknown): number | null {
  if (typeof body !== "object" || body === null || Array.isArray(body)) return null;
  const count: unknown = Reflect.get(body, "count");
  if (typeof count !== "number" || !Number.isInteger(count) || count < 0) return null;
  return count;
}
