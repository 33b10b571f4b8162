import type { IMessageIdGenerator } from "@domain/ports/IMessageIdGenerator";

export class SequentialMessageIdGenerator implements IMessageIdGenerator {
  private counter = 0;

  constructor(private readonly prefix = "") {}

  next() {
    return `${this.prefix}${++this.counter}`;
  }
}
