import type { ILogger } from "@domain/interfaces/ILogger";
import type { IFrameStore } from "@domain/ports/IFrameStore";

export class StopStorage {
  constructor(
    private store: IFrameStore,
    private logger?: ILogger
  ) {}

  // shutdown goes on even when the store fails to close
  async execute() {
    try {
      await this.store.close();
      this.logger?.log("Queue storage stopped");
    } catch (error) {
      this.logger?.log("Failed to stop queue storage", { error }, "error");
    } finally {
      this.logger?.flush();
      this.logger?.destroy();
    }
  }
}
