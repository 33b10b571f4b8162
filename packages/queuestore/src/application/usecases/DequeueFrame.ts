import { toStorageError } from "@domain/errors/StorageError";
import { EMPTY_RESULT, type DequeueResult } from "@domain/models/DequeueResult";
import type { IFrameStore } from "@domain/ports/IFrameStore";
import type { IOperationOptions } from "@domain/ports/IOperationOptions";
import { assertOperable } from "@domain/services/assertOperable";

export class DequeueFrame {
  constructor(private store: IFrameStore) {}

  async execute(destination: string, options?: IOperationOptions): Promise<DequeueResult> {
    assertOperable(this.store, destination, options?.signal);

    try {
      const frame = await this.store.take(destination, options);
      return frame ? { status: "dequeued", frame } : EMPTY_RESULT;
    } catch (cause) {
      throw toStorageError(cause, destination);
    }
  }
}
