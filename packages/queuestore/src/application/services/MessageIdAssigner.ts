import { MESSAGE_ID_HEADER, type Frame } from "@domain/entities/Frame";
import type { IMessageIdGenerator } from "@domain/ports/IMessageIdGenerator";

export class MessageIdAssigner {
  constructor(private generator: IMessageIdGenerator) {}

  /**
   * Gives the frame an id unless it already carries one.
   * Returns true when a new id was written.
   */
  assignIfAbsent(frame: Frame) {
    if (frame.messageId !== undefined) return false;
    frame.headers.set(MESSAGE_ID_HEADER, this.generator.next());
    return true;
  }
}
