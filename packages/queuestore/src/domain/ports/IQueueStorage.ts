import type { Frame } from "@domain/entities/Frame";
import type { DequeueResult } from "@domain/models/DequeueResult";
import type { IOperationOptions } from "./IOperationOptions";

export interface IQueueStorageMetrics {
  isStarted: boolean;
  destinations: number;
  frames: number;
}

export interface IQueueStorage {
  start(): Promise<void>;
  stop(): Promise<void>;
  enqueue(destination: string, frame: Frame, options?: IOperationOptions): Promise<void>;
  requeue(destination: string, frame: Frame, options?: IOperationOptions): Promise<void>;
  dequeue(destination: string, options?: IOperationOptions): Promise<DequeueResult>;
  depth(destination: string): Promise<number>;
  getMetrics(): IQueueStorageMetrics;
}
