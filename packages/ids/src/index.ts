declare const brandSymbol: unique symbol;

export type Brand<T, B extends string> = T & { readonly [brandSymbol]: B };

function asBrand<T, B extends string>(value: T): Brand<T, B> {
  return value as Brand<T, B>;
}

export function parseIntegerId(value: string, label: string): number {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new Error(`${label} must be a non-empty integer`);
  }
  if (!/^\d+$/.test(trimmed)) {
    throw new Error(`Invalid ${label}: ${value}`);
  }
  const parsed = Number(trimmed);
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new Error(`${label} must be a positive safe integer: ${value}`);
  }
  return parsed;
}

export function parseStringId(value: string, label: string): string {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new Error(`${label} must be a non-empty string`);
  }
  return trimmed;
}

export function isIntegerId(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value > 0;
}

export type EntityId = Brand<number, "EntityId">;
export function EntityId(value: number): EntityId {
  return asBrand(value);
}
export function parseEntityId(value: string): EntityId {
  return EntityId(parseIntegerId(value, "EntityId"));
}

export type OwnerId = Brand<number, "OwnerId">;
export function OwnerId(value: number): OwnerId {
  return asBrand(value);
}
export function parseOwnerId(value: string): OwnerId {
  return OwnerId(parseIntegerId(value, "OwnerId"));
}

export type JobName = Brand<string, "JobName">;
export function JobName(value: string): JobName {
  return asBrand(value);
}
export function parseJobName(value: string): JobName {
  const trimmed = parseStringId(value, "JobName");
  if (!/^[A-Za-z0-9_-]{1,500}$/.test(trimmed)) {
    throw new Error(`Invalid JobName: ${value}`);
  }
  return JobName(trimmed);
}

export type WorkerId = Brand<string, "WorkerId">;
export function WorkerId(value: string): WorkerId {
  return asBrand(value);
}
export function parseWorkerId(value: string): WorkerId {
  return WorkerId(parseStringId(value, "WorkerId"));
}
