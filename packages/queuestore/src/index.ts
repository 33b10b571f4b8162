export * from "@domain/entities/Frame";
export * from "@domain/errors/StorageError";
export * from "@domain/models/DequeueResult";
export type * from "@domain/interfaces/ILogDriver";
export type * from "@domain/interfaces/ILogger";
export type * from "@domain/interfaces/IQueueStorageConfig";
export type * from "@domain/ports/IFrameStore";
export type * from "@domain/ports/IMessageIdGenerator";
export type * from "@domain/ports/IOperationOptions";
export type * from "@domain/ports/IQueueStorage";
export * from "@domain/services/assertOperable";
export * from "@infra/factories/MemoryQueueStorageFactory";
export * from "@infra/id/RandomMessageIdGenerator";
export * from "@infra/id/SequentialMessageIdGenerator";
export * from "@infra/memory/MemoryFrameStore";
