import type { Frame } from "@domain/entities/Frame";
import type { DequeueResult } from "@domain/models/DequeueResult";
import type { IOperationOptions } from "@domain/ports/IOperationOptions";
import type { IQueueStorage } from "@domain/ports/IQueueStorage";
import type { CollectMetrics } from "./usecases/CollectMetrics";
import type { DequeueFrame } from "./usecases/DequeueFrame";
import type { EnqueueFrame } from "./usecases/EnqueueFrame";
import type { GetQueueDepth } from "./usecases/GetQueueDepth";
import type { RequeueFrame } from "./usecases/RequeueFrame";
import type { StartStorage } from "./usecases/StartStorage";
import type { StopStorage } from "./usecases/StopStorage";

export class QueueStorage implements IQueueStorage {
  constructor(
    private starter: StartStorage,
    private stopper: StopStorage,
    private enqueuer: EnqueueFrame,
    private requeuer: RequeueFrame,
    private dequeuer: DequeueFrame,
    private depthGetter: GetQueueDepth,
    private metricsCollector: CollectMetrics
  ) {}

  async start() {
    return this.starter.execute();
  }

  async stop() {
    return this.stopper.execute();
  }

  async enqueue(destination: string, frame: Frame, options?: IOperationOptions) {
    return this.enqueuer.execute(destination, frame, options);
  }

  async requeue(destination: string, frame: Frame, options?: IOperationOptions) {
    return this.requeuer.execute(destination, frame, options);
  }

  async dequeue(destination: string, options?: IOperationOptions): Promise<DequeueResult> {
    return this.dequeuer.execute(destination, options);
  }

  async depth(destination: string) {
    return this.depthGetter.execute(destination);
  }

  getMetrics() {
    return this.metricsCollector.execute();
  }
}
