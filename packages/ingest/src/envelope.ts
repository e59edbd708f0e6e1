import { z } from "zod";
import type { Logger } from "@pagewise/observability";

export const pushMessageSchema = z.object({
  data: z.string(),
  message_id: z.string(),
  publish_time: z.string(),
  attributes: z.record(z.string()).nullish(),
});

/** Body of a Pub/Sub push request. Unknown keys are ignored. */
export const pushEnvelopeSchema = z.object({
  message: pushMessageSchema,
  subscription: z.string(),
});

export type PushEnvelope = z.infer<typeof pushEnvelopeSchema>;

export type UnpackFailureReason =
  | "invalid_base64"
  | "invalid_utf8"
  | "invalid_json"
  | "invalid_shape";

export type UnpackResult =
  | { ok: true; items: unknown[] }
  | { ok: false; reason: UnpackFailureReason; message: string };

const itemBatchSchema = z.object({ items: z.array(z.unknown()) });

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

function decodeData(data: string): UnpackResult {
  const compact = data.replace(/\s+/g, "");
  if (!BASE64_PATTERN.test(compact)) {
    return { ok: false, reason: "invalid_base64", message: "message data is not valid base64" };
  }

  let text: string;
  try {
    text = new TextDecoder("utf-8", { fatal: true }).decode(Buffer.from(compact, "base64"));
  } catch {
    return { ok: false, reason: "invalid_utf8", message: "message data is not valid UTF-8" };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    const detail = error instanceof Error ? error.message : "unparseable";
    return { ok: false, reason: "invalid_json", message: `message data is not JSON: ${detail}` };
  }

  const batch = itemBatchSchema.safeParse(parsed);
  if (!batch.success) {
    return {
      ok: false,
      reason: "invalid_shape",
      message: `message data is not an item batch: ${batch.error.issues
        .map((issue) => `${issue.path.join(".") || "<root>"} ${issue.message}`)
        .join("; ")}`,
    };
  }

  return { ok: true, items: batch.data.items };
}

/**
 * Decodes the batch carried by a push envelope. A payload that can never be read
 * is logged and reported as a failure; this never throws.
 */
export function unpackEnvelope(
  envelope: PushEnvelope,
  logger: Pick<Logger, "debug" | "error">,
): UnpackResult {
  const { message, subscription } = envelope;
  logger.debug(
    {
      messageId: message.message_id,
      publishTime: message.publish_time,
      attributes: message.attributes ?? {},
      subscription,
    },
    "Unpacking push message",
  );

  const result = decodeData(message.data);
  if (!result.ok) {
    logger.error(
      { messageId: message.message_id, reason: result.reason, detail: result.message },
      "Dropping unreadable push message",
    );
  }
  return result;
}
