import type { ILogDriver, LogLevel } from "@domain/interfaces/ILogDriver";
import type { ILogger } from "@domain/interfaces/ILogger";

type LogEntry = [string, object, LogLevel];

export class BufferedLogger implements ILogger {
  private flushId?: NodeJS.Immediate;
  private buffer: LogEntry[] = [];

  constructor(
    private driver: ILogDriver,
    private chunkSize = 50,
    private label?: string
  ) {}

  log(msg: string, extra?: object, level: LogLevel = "info") {
    this.buffer.push([msg, { ...extra }, level]);
    this.scheduleFlush();
  }

  // writes everything buffered so far
  flush = () => {
    this.drain(Infinity);
  };

  destroy() {
    clearImmediate(this.flushId);
    this.flushId = undefined;
    this.buffer = [];
  }

  private scheduleFlush() {
    this.flushId ??= setImmediate(this.flushChunk);
  }

  private flushChunk = () => {
    this.drain(this.chunkSize);
  };

  private drain(limit: number) {
    clearImmediate(this.flushId);
    this.flushId = undefined;
    const ts = Date.now();
    const { label } = this;

    for (let count = 0; count < limit; count++) {
      const entry = this.buffer.shift();
      if (!entry) break;
      const [message, extra, level] = entry;
      this.driver[level]?.(message, { ...extra, label, ts });
    }

    if (this.buffer.length > 0) {
      this.scheduleFlush();
    }
  }
}
