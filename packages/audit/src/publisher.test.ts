import type { PubSub } from "@google-cloud/pubsub";
import { expectTypeOf } from "expect-type";
import { describe, expect, it } from "vitest";
import { PubSubMessagePublisher } from "./publisher.js";
import type { TopicHandle, TopicSource } from "./publisher.js";

class FakeTopic implements TopicHandle {
  readonly published: string[] = [];
  flushes = 0;

  constructor(readonly name: string) {}

  publishMessage(message: { data: Buffer }): Promise<string> {
    this.published.push(message.data.toString("utf8"));
    return Promise.resolve(`${this.name}-${this.published.length}`);
  }

  flush(): Promise<void> {
    this.flushes += 1;
    return Promise.resolve();
  }
}

class FakePubSub implements TopicSource {
  readonly created: FakeTopic[] = [];
  closed = false;

  topic(name: string): FakeTopic {
    const topic = new FakeTopic(name);
    this.created.push(topic);
    return topic;
  }

  close(): Promise<void> {
    this.closed = true;
    return Promise.resolve();
  }
}

describe("PubSubMessagePublisher", () => {
  it("accepts the Pub/Sub client", () => {
    expectTypeOf<PubSub>().toExtend<TopicSource>();
  });

  it("reuses one topic handle per name", async () => {
    const pubsub = new FakePubSub();
    const publisher = new PubSubMessagePublisher(pubsub);

    await expect(publisher.publish("activity-audit", Buffer.from("a"))).resolves.toBe(
      "activity-audit-1",
    );
    await expect(publisher.publish("activity-audit", Buffer.from("b"))).resolves.toBe(
      "activity-audit-2",
    );
    await publisher.publish("entities-audit", Buffer.from("c"));

    expect(pubsub.created.map((topic) => topic.name)).toEqual(["activity-audit", "entities-audit"]);
    expect(pubsub.created[0]?.published).toEqual(["a", "b"]);
  });

  it("flushes every topic before closing the client", async () => {
    const pubsub = new FakePubSub();
    const publisher = new PubSubMessagePublisher(pubsub);
    await publisher.publish("activity-audit", Buffer.from("a"));
    await publisher.publish("entities-audit", Buffer.from("b"));

    await publisher.close();

    expect(pubsub.created.map((topic) => topic.flushes)).toEqual([1, 1]);
    expect(pubsub.closed).toBe(true);
  });
});
