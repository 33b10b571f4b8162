import type { Frame } from "@domain/entities/Frame";
import type { IOperationOptions } from "./IOperationOptions";

/**
 * Backend holding the per-destination frame sequences.
 *
 * Implementations reject with a StorageError: NOT_STARTED while closed,
 * QUEUE_FULL past capacity, CANCELLED when the signal fires before the
 * frame is written. A rejected write leaves the destination unchanged.
 */
export interface IFrameStore {
  readonly isOpen: boolean;
  open(): Promise<void>;
  close(): Promise<void>;
  /** Resolves to the destination depth after the write. */
  append(destination: string, frame: Frame, options?: IOperationOptions): Promise<number>;
  prepend(destination: string, frame: Frame, options?: IOperationOptions): Promise<number>;
  take(destination: string, options?: IOperationOptions): Promise<Frame | undefined>;
  depth(destination: string): number;
  stats(): { destinations: number; frames: number };
}
