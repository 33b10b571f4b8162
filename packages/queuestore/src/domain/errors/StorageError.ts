export type StorageErrorCode =
  | "NOT_STARTED"
  | "INVALID_DESTINATION"
  | "STORAGE_FAILURE"
  | "QUEUE_FULL"
  | "CANCELLED";

export interface IStorageErrorOptions extends ErrorOptions {
  destination?: string;
}

export class StorageError extends Error {
  override name = "StorageError";
  readonly destination?: string;

  constructor(
    readonly code: StorageErrorCode,
    message: string,
    { destination, ...options }: IStorageErrorOptions = {}
  ) {
    super(message, options);
    this.destination = destination;
  }
}

export const isStorageError = (
  value: unknown,
  code?: StorageErrorCode
): value is StorageError =>
  value instanceof StorageError && (code === undefined || value.code === code);

/**
 * Passes storage errors through untouched and wraps anything else
 * as a STORAGE_FAILURE carrying the original as `cause`.
 */
export const toStorageError = (cause: unknown, destination?: string) =>
  isStorageError(cause)
    ? cause
    : new StorageError("STORAGE_FAILURE", "Queue storage operation failed", {
        destination,
        cause,
      });
