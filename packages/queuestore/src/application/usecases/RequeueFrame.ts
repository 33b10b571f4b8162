import type { Frame } from "@domain/entities/Frame";
import { toStorageError } from "@domain/errors/StorageError";
import type { ILogger } from "@domain/interfaces/ILogger";
import type { IFrameStore } from "@domain/ports/IFrameStore";
import type { IOperationOptions } from "@domain/ports/IOperationOptions";
import { assertOperable } from "@domain/services/assertOperable";
import type { MessageIdAssigner } from "../services/MessageIdAssigner";

export class RequeueFrame {
  constructor(
    private store: IFrameStore,
    private idAssigner: MessageIdAssigner,
    private logger?: ILogger
  ) {}

  async execute(destination: string, frame: Frame, options?: IOperationOptions) {
    assertOperable(this.store, destination, options?.signal);

    if (this.idAssigner.assignIfAbsent(frame)) {
      this.logger?.log(
        "Requeued frame had no message-id",
        { destination, messageId: frame.messageId },
        "warn"
      );
    }

    try {
      await this.store.prepend(destination, frame, options);
    } catch (cause) {
      throw toStorageError(cause, destination);
    }
  }
}
