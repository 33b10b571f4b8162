export type MessageIdStrategy = "sequence" | "uuid";

export interface IQueueStorageConfig {
  maxDepth?: number; // per destination, unbounded when absent
  evictEmptyQueues?: boolean; // true default
  idStrategy?: MessageIdStrategy; // "sequence" default
  idPrefix?: string; // sequence ids only
  logBufferSize?: number; // log entries flushed per tick, 50 default
}
