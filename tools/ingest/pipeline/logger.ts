import type { EventType, StageName } from "./types.js";
import { emitEvent, type LogLevel } from "./events.js";

export interface LogMeta {
  stage?: StageName | "system";
  attempt?: number;
  eventType?: EventType;
  phase?: "start" | "end" | "fail" | "progress";
  action?: string;
  durationMs?: number;
  statusCode?: number;
  bytes?: number;
  path?: string;
  url?: string;
  retryable?: boolean;
  errorCode?: string;
  [key: string]: unknown;
}

export class Logger {
  constructor(private readonly defaults: LogMeta = {}) {}

  /** Returns a logger whose events carry `meta` unless overridden per call. */
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
    const merged = { ...this.defaults, ...meta };
    emitEvent({
      ...merged,
      level,
      message,
      eventType: merged.eventType ?? "stage.lifecycle",
    });
  }
}
