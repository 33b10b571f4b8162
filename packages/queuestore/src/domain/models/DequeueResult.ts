import type { Frame } from "@domain/entities/Frame";

export type DequeueResult =
  | { status: "dequeued"; frame: Frame }
  | { status: "empty" };

export const EMPTY_RESULT: DequeueResult = Object.freeze({ status: "empty" });
