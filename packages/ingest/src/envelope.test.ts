import { describe, expect, it } from "vitest";
import { createSilentLogger } from "@pagewise/observability";
import { pushEnvelopeSchema, unpackEnvelope } from "./envelope.js";
import type { PushEnvelope } from "./envelope.js";

const logger = createSilentLogger();

function envelopeWithData(data: string): PushEnvelope {
  return {
    message: {
      data,
      message_id: "2070443601311540",
      publish_time: "2024-02-26T19:13:55.749Z",
      attributes: { origin: "test" },
    },
    subscription: "projects/pagewise-test/subscriptions/activity",
  };
}

function encode(value: string | Uint8Array): string {
  return Buffer.from(value).toString("base64");
}

describe("unpackEnvelope", () => {
  it("returns items in delivery order", () => {
    const data = encode(JSON.stringify({ items: [{ id: 1 }, { id: 2 }, "three"] }));

    expect(unpackEnvelope(envelopeWithData(data), logger)).toEqual({
      ok: true,
      items: [{ id: 1 }, { id: 2 }, "three"],
    });
  });

  it("accepts an empty batch", () => {
    const data = encode(JSON.stringify({ items: [] }));
    expect(unpackEnvelope(envelopeWithData(data), logger)).toEqual({ ok: true, items: [] });
  });

  it("rejects data that is not base64", () => {
    const result = unpackEnvelope(envelopeWithData("not base64!"), logger);
    expect(result).toMatchObject({ ok: false, reason: "invalid_base64" });
  });

  it("rejects bytes that are not UTF-8", () => {
    const result = unpackEnvelope(envelopeWithData(encode(new Uint8Array([0xff, 0xfe, 0x7b]))), logger);
    expect(result).toMatchObject({ ok: false, reason: "invalid_utf8" });
  });

  it("rejects text that is not JSON", () => {
    const result = unpackEnvelope(envelopeWithData(encode("{items:")), logger);
    expect(result).toMatchObject({ ok: false, reason: "invalid_json" });
  });

  it("rejects JSON without an items array", () => {
    const result = unpackEnvelope(envelopeWithData(encode(JSON.stringify({ items: "nope" }))), logger);
    expect(result).toMatchObject({ ok: false, reason: "invalid_shape" });
    if (!result.ok) {
      expect(result.message).toBe("message data is not an item batch: items Expected array, received string");
    }
  });
});

describe("pushEnvelopeSchema", () => {
  it("ignores unknown keys", () => {
    const parsed = pushEnvelopeSchema.safeParse({
      ...envelopeWithData("e30="),
      deliveryAttempt: 3,
    });
    expect(parsed.success).toBe(true);
    if (parsed.success) {
      expect(parsed.data).not.toHaveProperty("deliveryAttempt");
    }
  });

  it("requires message data", () => {
    const parsed = pushEnvelopeSchema.safeParse({
      message: { message_id: "1", publish_time: "2024-02-26T19:13:55.749Z" },
      subscription: "projects/pagewise-test/subscriptions/activity",
    });
    expect(parsed.success).toBe(false);
  });
});
