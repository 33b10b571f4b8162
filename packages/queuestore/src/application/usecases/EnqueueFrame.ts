import type { Frame } from "@domain/entities/Frame";
import { toStorageError } from "@domain/errors/StorageError";
import type { IFrameStore } from "@domain/ports/IFrameStore";
import type { IOperationOptions } from "@domain/ports/IOperationOptions";
import { assertOperable } from "@domain/services/assertOperable";
import type { MessageIdAssigner } from "../services/MessageIdAssigner";

export class EnqueueFrame {
  constructor(
    private store: IFrameStore,
    private idAssigner: MessageIdAssigner
  ) {}

  async execute(destination: string, frame: Frame, options?: IOperationOptions) {
    assertOperable(this.store, destination, options?.signal);
    this.idAssigner.assignIfAbsent(frame);

    try {
      await this.store.append(destination, frame, options);
    } catch (cause) {
      throw toStorageError(cause, destination);
    }
  }
}
