import { z } from "zod";
import { EntityId, OwnerId, isIntegerId, parseIntegerId } from "@pagewise/ids";
import type { Logger } from "@pagewise/observability";

const DAY_MS = 24 * 60 * 60 * 1000;
const YEAR_MS = 366 * DAY_MS;

function integerIdField<T>(label: string, brand: (value: number) => T) {
  return z.union([z.number(), z.string()]).transform((value, ctx) => {
    if (typeof value === "number") {
      if (isIntegerId(value)) return brand(value);
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${label} must be a positive safe integer`,
      });
      return z.NEVER;
    }
    try {
      return brand(parseIntegerId(value, label));
    } catch (error) {
      const message = error instanceof Error ? error.message : `Invalid ${label}`;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message });
      return z.NEVER;
    }
  });
}

const ISO_TIMESTAMP =
  /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)(Z|[+-]\d{2}:?\d{2})?)?$/i;

/** Reads an ISO-8601 date or date-time; one without an offset is taken as UTC. */
export function parseUtcTimestamp(value: string): Date | undefined {
  const match = ISO_TIMESTAMP.exec(value.trim());
  if (!match) return undefined;
  const [, day, time, offset = "Z"] = match;
  const zone =
    offset.toUpperCase() === "Z" ? "Z" : offset.replace(/^([+-]\d{2}):?(\d{2})$/, "$1:$2");
  const date = new Date(time ? `${day}T${time}${zone}` : `${day}T00:00:00Z`);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

/** Parses a timestamp and normalizes it to ISO-8601 UTC, within [earliest, now + maxAheadMs]. */
function timestampField(params: { earliest: Date; maxAheadMs: number }) {
  return z.string().transform((value, ctx) => {
    const date = parseUtcTimestamp(value);
    if (!date) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid timestamp: ${value}` });
      return z.NEVER;
    }
    if (date.getTime() < params.earliest.getTime()) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Timestamp before ${params.earliest.toISOString()}: ${value}`,
      });
      return z.NEVER;
    }
    if (date.getTime() > Date.now() + params.maxAheadMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Timestamp too far in the future: ${value}`,
      });
      return z.NEVER;
    }
    return date.toISOString();
  });
}

export function isValidIsbn10(value: string): boolean {
  if (!/^\d{9}[\dX]$/.test(value)) return false;
  let sum = 0;
  for (let index = 0; index < 10; index += 1) {
    const char = value.charAt(index);
    const digit = char === "X" ? 10 : Number(char);
    sum += digit * (10 - index);
  }
  return sum % 11 === 0;
}

export function isValidIsbn13(value: string): boolean {
  if (!/^\d{13}$/.test(value)) return false;
  let sum = 0;
  for (let index = 0; index < 13; index += 1) {
    sum += Number(value.charAt(index)) * (index % 2 === 0 ? 1 : 3);
  }
  return sum % 10 === 0;
}

function stripIsbnSeparators(value: string): string {
  return value.replace(/[\s-]/g, "").toUpperCase();
}

const optionalText = z.string().nullish();
const optionalCount = z.number().int().nonnegative().nullish();
const requiredText = z.string().trim().min(1);

export const catalogRecordSchema = z.object({
  entity_id: integerIdField("EntityId", EntityId),
  work_id: integerIdField("work_id", (value) => value),
  work_internal_id: requiredText,
  title: requiredText,
  original_title: optionalText,
  description: optionalText,
  author: requiredText,
  author_url: requiredText,
  entity_url: requiredText,
  num_ratings: optionalCount,
  num_reviews: optionalCount,
  avg_rating: z.number().min(0).max(5),
  rating_histogram: z.array(z.number().int().nonnegative()).length(5),
  num_pages: optionalCount,
  language: optionalText,
  isbn: z
    .string()
    .transform(stripIsbnSeparators)
    .refine(isValidIsbn10, { message: "Invalid ISBN-10 checksum" })
    .nullish(),
  isbn13: z
    .string()
    .transform(stripIsbnSeparators)
    .refine(isValidIsbn13, { message: "Invalid ISBN-13 checksum" })
    .nullish(),
  asin: optionalText,
  series: optionalText,
  genres: z.array(z.string()).default([]),
  publish_date: timestampField({
    earliest: new Date("1000-01-01T00:00:00.000Z"),
    maxAheadMs: YEAR_MS,
  }).nullish(),
  scrape_time: timestampField({
    earliest: new Date("2000-01-01T00:00:00.000Z"),
    maxAheadMs: DAY_MS,
  }),
});

export type CatalogRecord = z.infer<typeof catalogRecordSchema>;

export const activityRecordSchema = z.object({
  owner_id: integerIdField("OwnerId", OwnerId),
  entity_id: integerIdField("EntityId", EntityId),
  rating: z.number().int().min(0).max(5),
  occurred_at: timestampField({
    earliest: new Date("1900-01-01T00:00:00.000Z"),
    maxAheadMs: DAY_MS,
  }),
  observed_at: timestampField({
    earliest: new Date("2000-01-01T00:00:00.000Z"),
    maxAheadMs: DAY_MS,
  }),
});

export type ActivityRecord = z.infer<typeof activityRecordSchema>;

export const ownerRecordSchema = z.object({
  owner_id: integerIdField("OwnerId", OwnerId),
});

export type OwnerRecord = z.infer<typeof ownerRecordSchema>;

export interface ValidatedItems<T> {
  valid: T[];
  dropped: number;
}

/** Parses every item on its own; failures are logged and dropped. */
export function validateItems<T>(
  items: readonly unknown[],
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  params: { logger: Logger; kind: string },
): ValidatedItems<T> {
  const valid: T[] = [];
  let dropped = 0;
  items.forEach((item, index) => {
    const parsed = schema.safeParse(item);
    if (parsed.success) {
      valid.push(parsed.data);
      return;
    }
    dropped += 1;
    params.logger.warn(
      {
        kind: params.kind,
        index,
        issues: parsed.error.issues.map((issue) => ({
          path: issue.path.join("."),
          message: issue.message,
        })),
      },
      "Dropping invalid item",
    );
  });
  return { valid, dropped };
}
