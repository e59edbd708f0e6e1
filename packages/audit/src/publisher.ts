/** Narrow view of a message bus: publish one payload, get its message id. */
export interface MessagePublisher {
  publish(topicName: string, data: Buffer): Promise<string>;
}

/** The part of a Pub/Sub `Topic` used for publishing. */
export interface TopicHandle {
  publishMessage(message: { data: Buffer }): Promise<string>;
  flush(): Promise<void>;
}

/** The part of the `PubSub` client used here. */
export interface TopicSource {
  topic(name: string): TopicHandle;
  close(): Promise<void>;
}

/**
 * Publishes through one topic handle per name, so messages to a topic share its
 * batching publisher. `close()` flushes each topic before closing the client.
 */
export class PubSubMessagePublisher implements MessagePublisher {
  private readonly topics = new Map<string, TopicHandle>();

  constructor(private readonly pubsub: TopicSource) {}

  async publish(topicName: string, data: Buffer): Promise<string> {
    return this.topic(topicName).publishMessage({ data });
  }

  async close(): Promise<void> {
    await Promise.all([...this.topics.values()].map((topic) => topic.flush()));
    this.topics.clear();
    await this.pubsub.close();
  }

  private topic(topicName: string): TopicHandle {
    let topic = this.topics.get(topicName);
    if (!topic) {
      topic = this.pubsub.topic(topicName);
      this.topics.set(topicName, topic);
    }
    return topic;
  }
}
