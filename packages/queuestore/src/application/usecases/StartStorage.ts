import type { ILogger } from "@domain/interfaces/ILogger";
import type { IFrameStore } from "@domain/ports/IFrameStore";

export class StartStorage {
  constructor(
    private store: IFrameStore,
    private logger?: ILogger
  ) {}

  async execute() {
    try {
      await this.store.open();
    } catch (cause) {
      throw new Error("Failed to start queue storage", { cause });
    }
    this.logger?.log("Queue storage started");
  }
}
