export { startConsumer, readBatch, completeBatch } from './stream-consumer.js';
export type { BatchHandler, ConsumerOptions, StreamBatch } from './stream-consumer.js';
