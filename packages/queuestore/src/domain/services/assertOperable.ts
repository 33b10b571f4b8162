import { StorageError } from "@domain/errors/StorageError";
import type { IFrameStore } from "@domain/ports/IFrameStore";

export const isValidDestination = (destination: unknown): destination is string =>
  typeof destination === "string" && destination.trim().length > 0;

export function assertOperable(
  store: IFrameStore,
  destination: string,
  signal?: AbortSignal
) {
  if (!store.isOpen) {
    throw new StorageError("NOT_STARTED", "Queue storage is not started", {
      destination,
    });
  }

  if (!isValidDestination(destination)) {
    throw new StorageError(
      "INVALID_DESTINATION",
      `Invalid destination: ${JSON.stringify(destination)}`,
      { destination }
    );
  }

  if (signal?.aborted) {
    throw new StorageError("CANCELLED", "Operation cancelled", {
      destination,
      cause: signal.reason,
    });
  }
}
