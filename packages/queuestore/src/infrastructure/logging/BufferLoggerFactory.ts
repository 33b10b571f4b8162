import type { ILogDriver } from "@domain/interfaces/ILogDriver";
import type { ILogger, ILoggerFactory } from "@domain/interfaces/ILogger";
import { BufferedLogger } from "./BufferedLogger";

export class BufferLoggerFactory implements ILoggerFactory {
  constructor(
    private driver: ILogDriver = console,
    private chunkSize = 50
  ) {}

  create(label?: string): ILogger {
    return new BufferedLogger(this.driver, this.chunkSize, label);
  }
}
