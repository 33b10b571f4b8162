import { randomUUID } from "node:crypto";
import type { IMessageIdGenerator } from "@domain/ports/IMessageIdGenerator";

export class RandomMessageIdGenerator implements IMessageIdGenerator {
  next() {
    return randomUUID();
  }
}
