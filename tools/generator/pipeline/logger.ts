import { emitProcessorEvent } from "./events.js";
import type { EventType, LogLevel, ProcessorEvent, StageName } from "./types.js";

export interface LogMeta {
  stage?: StageName | "system";
  eventType?: EventType;
  phase?: ProcessorEvent["phase"];
  durationMs?: number;
  path?: string;
  bytes?: number;
  errorCode?: string;
  [key: string]: unknown;
}

export class Logger {
  constructor(private readonly defaults: LogMeta = {}) {}

  child(meta: LogMeta): Logger {
    return new Logger({ ...this.defaults, ...meta });
  }

  debug(message: string, meta: LogMeta = {}): void {
    this.emit("debug", message, meta);
  }

  info(message: string, meta: LogMeta = {}): void {
    this.emit("info", message, meta);
  }

  warn(message: string, meta: LogMeta = {}): void {
    this.emit("warn", message, meta);
  }

  error(message: string, meta: LogMeta = {}): void {
    this.emit("error", message, meta);
  }

  private emit(level: LogLevel, message: string, meta: LogMeta): void {
    const merged: LogMeta = { ...this.defaults, ...meta };
    emitProcessorEvent({
      level,
      message,
      eventType: merged.eventType ?? "stage.lifecycle",
      ...merged,
    });
  }
}
