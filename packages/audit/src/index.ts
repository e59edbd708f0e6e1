export { AuditPublisher } from "./audit.js";
export type { AuditBatchResult, AuditPublisherOptions, AuditTopic } from "./audit.js";
export { PubSubMessagePublisher } from "./publisher.js";
export type { MessagePublisher, TopicHandle, TopicSource } from "./publisher.js";
