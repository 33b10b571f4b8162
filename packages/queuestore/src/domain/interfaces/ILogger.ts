import type { LogLevel } from "./ILogDriver";

export interface ILogger {
  log(msg: string, extra?: object, level?: LogLevel): void;
  flush: () => void;
  destroy(): void;
}

export interface ILoggerFactory {
  create(label?: string): ILogger;
}
