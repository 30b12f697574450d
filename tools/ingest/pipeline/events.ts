import { appendFileSync, mkdirSync } from "fs";
import { dirname } from "path";
import { getTelemetryContext } from "./telemetry-context.js";
import type { EventType, LogRuntimeConfig, PipelineEvent } from "./types.js";

export type LogLevel = PipelineEvent["level"];

export interface EmitInput {
  level: LogLevel;
  message: string;
  eventType?: EventType;
  stage?: PipelineEvent["stage"];
  attempt?: number;
  phase?: PipelineEvent["phase"];
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

class EventSink {
  constructor(private readonly config: LogRuntimeConfig) {}

  emit(input: EmitInput): void {
    const ctx = getTelemetryContext();
    const { level, message, stage, attempt, eventType, ...rest } = input;
    const event = redactEvent({
      ...rest,
      ts: new Date().toISOString(),
      runId: this.config.runId,
      level,
      stage: stage ?? ctx.stage,
      attempt: attempt ?? ctx.attempt,
      eventType: eventType ?? "stage.lifecycle",
      message,
    });

    if (this.config.terminal) {
      this.writeTerminal(event);
    }

    if (this.config.eventFilePath) {
      mkdirSync(dirname(this.config.eventFilePath), { recursive: true });
      appendFileSync(this.config.eventFilePath, `${JSON.stringify(event)}\n`);
    }
  }

  private writeTerminal(event: PipelineEvent): void {
    if (!shouldPrintToTerminal(event, this.config.verbose)) {
      return;
    }

    const line =
      this.config.format === "json"
        ? JSON.stringify(event)
        : this.config.verbose
          ? renderPretty(event)
          : renderCondensed(event);

    // stderr keeps stdout free for the snapshot output.
    if (event.level === "warn") {
      console.warn(line);
      return;
    }
    console.error(line);
  }
}

let globalSink: EventSink | null = null;

export function initializeEventSink(config: LogRuntimeConfig): void {
  globalSink = new EventSink(config);
}

export function resetEventSink(): void {
  globalSink = null;
}

export function emitEvent(input: EmitInput): void {
  if (!globalSink) {
    return;
  }
  globalSink.emit(input);
}

const HIDDEN_KEYS = ["ts", "runId", "level", "stage", "attempt", "eventType", "message"];

export function renderPretty(event: PipelineEvent): string {
  const prefix = `${event.ts} [${event.stage}/${event.attempt}] [${event.eventType}]`;
  const extras = Object.entries(event)
    .filter(([key]) => !HIDDEN_KEYS.includes(key))
    .filter(([, value]) => value !== undefined && value !== null && value !== "")
    .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
    .join(" ");

  return `${prefix} ${event.message}${extras ? ` ${extras}` : ""}`;
}

export function renderCondensed(event: PipelineEvent): string {
  const time = formatShortTime(event.ts);
  const phase = event.phase ? ` ${event.phase}` : "";
  const prefix = `[${time}] ${event.stage}${phase}`;
  const extras = renderCondensedExtras(event);
  return `${prefix} ${event.message}${extras ? ` ${extras}` : ""}`;
}

const URL_ALLOW_QUERY_KEYS = new Set(["gid", "format", "output"]);

export function redactEvent(event: PipelineEvent): PipelineEvent {
  const redacted: PipelineEvent = { ...event };
  for (const [key, value] of Object.entries(event)) {
    redacted[key] = redactValue(key, value);
  }
  return redacted;
}

function redactValue(key: string, value: unknown): unknown {
  if (value == null) {
    return value;
  }

  if (isSensitiveKey(key.toLowerCase())) {
    return "[REDACTED]";
  }

  if (typeof value === "string") {
    if (looksLikeUrl(value)) {
      return normalizeUrl(value);
    }
    return truncate(value, 240);
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactValue(key, item));
  }

  if (typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = redactValue(k, v);
    }
    return out;
  }

  return value;
}

function isSensitiveKey(key: string): boolean {
  return (
    key.includes("token") ||
    key.includes("apikey") ||
    key.includes("api_key") ||
    key.includes("secret") ||
    key.includes("password") ||
    key.includes("authorization") ||
    key.includes("cookie")
  );
}

function looksLikeUrl(value: string): boolean {
  return value.startsWith("http://") || value.startsWith("https://");
}

function normalizeUrl(value: string): string {
  try {
    const url = new URL(value);
    const safe = new URL(`${url.protocol}//${url.host}${url.pathname}`);
    for (const [key, val] of url.searchParams.entries()) {
      if (URL_ALLOW_QUERY_KEYS.has(key.toLowerCase())) {
        safe.searchParams.set(key, truncate(val, 40));
      }
    }
    return safe.toString();
  } catch {
    return truncate(value, 240);
  }
}

function truncate(value: string, max: number): string {
  if (value.length <= max) {
    return value;
  }
  return `${value.slice(0, max)}...[truncated]`;
}

export function shouldPrintToTerminal(event: PipelineEvent, verbose: boolean): boolean {
  if (verbose) {
    return true;
  }

  if (event.level === "error" || event.level === "warn") {
    return true;
  }

  if (event.level === "debug") {
    return false;
  }

  switch (event.eventType) {
    case "http.request":
    case "cache.hit":
    case "cache.store":
    case "file.read":
    case "file.write":
      return false;
    case "http.response":
      return event.phase === "fail";
    case "stage.lifecycle":
      return event.phase === "fail";
    default:
      return true;
  }
}

function renderCondensedExtras(event: PipelineEvent): string {
  const keys: string[] = ["statusCode", "durationMs", "rows", "backoffMs", "errorCode"];
  const out: string[] = [];
  for (const key of keys) {
    const value = event[key];
    if (value === undefined || value === null || value === "") {
      continue;
    }
    out.push(`${key}=${JSON.stringify(value)}`);
  }
  return out.join(" ");
}

function formatShortTime(ts: string): string {
  const match = ts.match(/T(\d{2}:\d{2}:\d{2})/);
  if (match) {
    return match[1];
  }
  return ts;
}
