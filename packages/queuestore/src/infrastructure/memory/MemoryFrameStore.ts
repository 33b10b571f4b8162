import type { Frame } from "@domain/entities/Frame";
import { StorageError } from "@domain/errors/StorageError";
import type { IDeque } from "@domain/interfaces/IDeque";
import type { ILogger } from "@domain/interfaces/ILogger";
import type { IFrameStore } from "@domain/ports/IFrameStore";
import type { IOperationOptions } from "@domain/ports/IOperationOptions";
import { Mutex } from "@infra/util/Mutex";
import { LinkedListDeque } from "./LinkedListDeque";

interface IQueueEntry {
  frames: IDeque<Frame>;
  mutex: Mutex;
  retired: boolean;
}

export interface IMemoryFrameStoreOptions {
  maxDepth?: number;
  evictEmptyQueues?: boolean;
}

/**
 * Keeps one deque per destination, each behind its own mutex. The
 * destination map is only touched synchronously, so a queue is created
 * once per name no matter how many first writes race for it.
 */
export class MemoryFrameStore implements IFrameStore {
  private queues?: Map<string, IQueueEntry>;
  private maxDepth = Infinity;
  private evictEmptyQueues = true;

  constructor(
    private logger?: ILogger,
    { maxDepth, evictEmptyQueues }: IMemoryFrameStoreOptions = {}
  ) {
    if (maxDepth) this.maxDepth = maxDepth;
    if (typeof evictEmptyQueues === "boolean") {
      this.evictEmptyQueues = evictEmptyQueues;
    }
  }

  get isOpen() {
    return this.queues !== undefined;
  }

  async open() {
    if (this.queues) {
      this.logger?.log("Frame store is already open", {}, "warn");
      return;
    }

    this.queues = new Map();
    this.logger?.log("Frame store opened", {
      maxDepth: this.maxDepth,
      evictEmptyQueues: this.evictEmptyQueues,
    });
  }

  async close() {
    const { queues } = this;
    if (!queues) return;

    const { destinations, frames } = this.count(queues);
    this.queues = undefined;

    for (const entry of queues.values()) {
      entry.retired = true;
      entry.frames.clear();
    }

    this.logger?.log("Frame store closed", { destinations, discarded: frames });
  }

  async append(destination: string, frame: Frame, { signal }: IOperationOptions = {}) {
    return this.write(destination, signal, (frames) => frames.pushBack(frame));
  }

  async prepend(destination: string, frame: Frame, { signal }: IOperationOptions = {}) {
    return this.write(destination, signal, (frames) => frames.pushFront(frame));
  }

  async take(destination: string, { signal }: IOperationOptions = {}) {
    const entry = this.getQueues(destination).get(destination);
    if (!entry) return;

    return this.withLock(destination, entry, signal, () => entry.frames.shift());
  }

  depth(destination: string) {
    return this.getQueues(destination).get(destination)?.frames.size() ?? 0;
  }

  stats() {
    if (!this.queues) return { destinations: 0, frames: 0 };
    return this.count(this.queues);
  }

  private write(
    destination: string,
    signal: AbortSignal | undefined,
    push: (frames: IDeque<Frame>) => void
  ) {
    const entry = this.entryFor(destination);

    return this.withLock(destination, entry, signal, () => {
      if (entry.frames.size() >= this.maxDepth) {
        throw new StorageError(
          "QUEUE_FULL",
          `Queue ${destination} reached its max depth of ${this.maxDepth}`,
          { destination }
        );
      }

      push(entry.frames);
      return entry.frames.size();
    });
  }

  private async withLock<T>(
    destination: string,
    entry: IQueueEntry,
    signal: AbortSignal | undefined,
    task: () => T
  ): Promise<T> {
    try {
      await entry.mutex.acquire(signal);
    } catch (cause) {
      if (!entry.mutex.locked) this.evictIfIdle(destination, entry);
      throw new StorageError("CANCELLED", "Operation cancelled", {
        destination,
        cause,
      });
    }

    try {
      if (entry.retired) {
        throw new StorageError("NOT_STARTED", "Queue storage was stopped", {
          destination,
        });
      }

      return task();
    } finally {
      this.evictIfIdle(destination, entry);
      entry.mutex.release();
    }
  }

  private entryFor(destination: string) {
    const queues = this.getQueues(destination);
    let entry = queues.get(destination);

    if (!entry) {
      entry = {
        frames: new LinkedListDeque<Frame>(),
        mutex: new Mutex(),
        retired: false,
      };
      queues.set(destination, entry);
      this.logger?.log("Queue created", { destination }, "debug");
    }

    return entry;
  }

  // only safe while nobody else holds or waits for the entry's lock
  private evictIfIdle(destination: string, entry: IQueueEntry) {
    if (!this.evictEmptyQueues || entry.retired) return;
    if (!entry.frames.isEmpty() || entry.mutex.waiting > 0) return;
    const { queues } = this;
    if (!queues || queues.get(destination) !== entry) return;

    queues.delete(destination);
    this.logger?.log("Queue evicted", { destination }, "debug");
  }

  private getQueues(destination: string) {
    if (!this.queues) {
      throw new StorageError("NOT_STARTED", "Queue storage is not started", {
        destination,
      });
    }

    return this.queues;
  }

  private count(queues: Map<string, IQueueEntry>) {
    let frames = 0;
    for (const entry of queues.values()) {
      frames += entry.frames.size();
    }
    return { destinations: queues.size, frames };
  }
}
