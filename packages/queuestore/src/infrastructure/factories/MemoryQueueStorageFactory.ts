import { QueueStorage } from "@app/QueueStorage";
import { MessageIdAssigner } from "@app/services/MessageIdAssigner";
import { CollectMetrics } from "@app/usecases/CollectMetrics";
import { DequeueFrame } from "@app/usecases/DequeueFrame";
import { EnqueueFrame } from "@app/usecases/EnqueueFrame";
import { GetQueueDepth } from "@app/usecases/GetQueueDepth";
import { RequeueFrame } from "@app/usecases/RequeueFrame";
import { StartStorage } from "@app/usecases/StartStorage";
import { StopStorage } from "@app/usecases/StopStorage";
import type { ILogDriver } from "@domain/interfaces/ILogDriver";
import type { IQueueStorageConfig } from "@domain/interfaces/IQueueStorageConfig";
import type { IMessageIdGenerator } from "@domain/ports/IMessageIdGenerator";
import type { IQueueStorage } from "@domain/ports/IQueueStorage";
import { QueueStorageConfigValidator } from "@infra/config/QueueStorageConfigValidator";
import { RandomMessageIdGenerator } from "@infra/id/RandomMessageIdGenerator";
import { SequentialMessageIdGenerator } from "@infra/id/SequentialMessageIdGenerator";
import { BufferLoggerFactory } from "@infra/logging/BufferLoggerFactory";
import { MemoryFrameStore } from "@infra/memory/MemoryFrameStore";

export interface IMemoryQueueStorageDeps {
  logDriver?: ILogDriver;
  idGenerator?: IMessageIdGenerator; // overrides idStrategy
}

export class MemoryQueueStorageFactory {
  constructor(
    private readonly validator = new QueueStorageConfigValidator()
  ) {}

  create(
    config: IQueueStorageConfig = {},
    { logDriver = console, idGenerator }: IMemoryQueueStorageDeps = {}
  ): IQueueStorage {
    const validated = this.validator.validate(config);
    // the schema lets optional keys through as null, so defaults go on here
    const maxDepth = validated.maxDepth ?? undefined;
    const evictEmptyQueues = validated.evictEmptyQueues ?? true;
    const idStrategy = validated.idStrategy ?? "sequence";
    const idPrefix = validated.idPrefix ?? "";
    const logBufferSize = validated.logBufferSize ?? 50;

    const logger = new BufferLoggerFactory(logDriver, logBufferSize).create(
      "queue-storage"
    );

    const store = new MemoryFrameStore(logger, {
      maxDepth,
      evictEmptyQueues,
    });

    const idAssigner = new MessageIdAssigner(
      idGenerator ??
        (idStrategy === "uuid"
          ? new RandomMessageIdGenerator()
          : new SequentialMessageIdGenerator(idPrefix))
    );

    return new QueueStorage(
      new StartStorage(store, logger),
      new StopStorage(store, logger),
      new EnqueueFrame(store, idAssigner),
      new RequeueFrame(store, idAssigner, logger),
      new DequeueFrame(store),
      new GetQueueDepth(store),
      new CollectMetrics(store)
    );
  }
}
