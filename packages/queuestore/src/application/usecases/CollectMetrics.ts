import type { IFrameStore } from "@domain/ports/IFrameStore";
import type { IQueueStorageMetrics } from "@domain/ports/IQueueStorage";

export class CollectMetrics {
  constructor(private store: IFrameStore) {}

  execute(): IQueueStorageMetrics {
    return { isStarted: this.store.isOpen, ...this.store.stats() };
  }
}
