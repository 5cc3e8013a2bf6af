import { appendFileSync, writeFileSync } from "fs";
import { dirname } from "path";
import { ensureDir } from "../lib/json.js";
import { getTelemetryContext } from "./telemetry-context.js";
import type { EventType, LogLevel, LogRuntimeConfig, ProcessorEvent } from "./types.js";

export interface EmitInput {
  level: LogLevel;
  message: string;
  eventType?: EventType;
  stage?: ProcessorEvent["stage"];
  phase?: ProcessorEvent["phase"];
  durationMs?: number;
  path?: string;
  bytes?: number;
  errorCode?: string;
  [key: string]: unknown;
}

const MAX_STRING_LENGTH = 240;

class EventEmitter {
  constructor(private readonly config: LogRuntimeConfig) {}

  emit(input: EmitInput): void {
    const ctx = getTelemetryContext();
    const { level, message, ...rest } = input;
    const event = truncateEvent({
      ...rest,
      ts: new Date().toISOString(),
      runId: this.config.runId,
      level,
      stage: input.stage ?? ctx.stage,
      eventType: input.eventType ?? "stage.lifecycle",
      message,
    });

    if (this.config.consoleLogs) {
      this.writeTerminal(event);
    }

    if (this.config.logFilePath) {
      this.writeFileLine(this.config.logFilePath, this.renderPretty(event));
    }

    if (this.config.eventFilePath) {
      this.writeFileLine(this.config.eventFilePath, JSON.stringify(event));
    }
  }

  resetFiles(): void {
    for (const path of [this.config.logFilePath, this.config.eventFilePath]) {
      if (path) {
        ensureDir(dirname(path));
        writeFileSync(path, "");
      }
    }
  }

  private writeTerminal(event: ProcessorEvent): void {
    if (!shouldPrintToTerminal(event, this.config.verbose)) {
      return;
    }

    const line = this.renderTerminalLine(event);

    if (event.level === "error") {
      console.error(line);
      return;
    }
    if (event.level === "warn") {
      console.warn(line);
      return;
    }
    console.log(line);
  }

  private renderTerminalLine(event: ProcessorEvent): string {
    if (this.config.format === "json") {
      return JSON.stringify(event);
    }
    if (this.config.verbose) {
      return this.renderPretty(event);
    }
    return this.renderCondensed(event);
  }

  renderPretty(event: ProcessorEvent): string {
    const prefix = `${event.ts} ${event.level.toUpperCase()} [${event.stage}] [${event.eventType}]`;
    const extras = Object.entries(event)
      .filter(([key]) =>
        !["ts", "runId", "level", "stage", "eventType", "message"].includes(key)
      )
      .filter(([, value]) => value !== undefined && value !== null && value !== "")
      .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
      .join(" ");

    return `${prefix} ${event.message}${extras ? ` ${extras}` : ""}`;
  }

  renderCondensed(event: ProcessorEvent): string {
    const time = formatShortTime(event.ts);
    const phase = event.phase ? ` ${event.phase}` : "";
    const prefix = `[${time}] ${event.stage}${phase}`;
    const extras = renderCondensedExtras(event);
    return `${prefix} ${event.message}${extras ? ` ${extras}` : ""}`;
  }

  private writeFileLine(path: string, line: string): void {
    ensureDir(dirname(path));
    appendFileSync(path, `${line}\n`);
  }
}

let globalEmitter: EventEmitter | null = null;

export function initializeEventEmitter(config: LogRuntimeConfig): void {
  globalEmitter = new EventEmitter(config);
  globalEmitter.resetFiles();
}

export function resetEventEmitter(): void {
  globalEmitter = null;
}

export function emitProcessorEvent(input: EmitInput): void {
  if (!globalEmitter) {
    return;
  }
  globalEmitter.emit(input);
}

export function formatPrettyForTest(event: ProcessorEvent): string {
  const emitter = new EventEmitter({
    runId: event.runId,
    format: "pretty",
    verbose: true,
    consoleLogs: false,
  });
  return emitter.renderPretty(event);
}

export function formatCondensedForTest(event: ProcessorEvent): string {
  const emitter = new EventEmitter({
    runId: event.runId,
    format: "pretty",
    verbose: false,
    consoleLogs: false,
  });
  return emitter.renderCondensed(event);
}

export function shouldPrintToTerminalForTest(event: ProcessorEvent, verbose: boolean): boolean {
  return shouldPrintToTerminal(event, verbose);
}

export function truncateEventForTest(event: ProcessorEvent): ProcessorEvent {
  return truncateEvent(event);
}

function truncateEvent(event: ProcessorEvent): ProcessorEvent {
  const out: ProcessorEvent = { ...event };
  for (const [key, value] of Object.entries(event)) {
    out[key] = truncateValue(value);
  }
  return out;
}

function truncateValue(value: unknown): unknown {
  if (typeof value === "string") {
    return truncate(value, MAX_STRING_LENGTH);
  }
  if (Array.isArray(value)) {
    return value.map((item) => truncateValue(item));
  }
  if (value !== null && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = truncateValue(v);
    }
    return out;
  }
  return value;
}

function truncate(value: string, max: number): string {
  if (value.length <= max) {
    return value;
  }
  return `${value.slice(0, max)}...[truncated]`;
}

function shouldPrintToTerminal(event: ProcessorEvent, verbose: boolean): boolean {
  if (verbose) {
    return true;
  }

  if (event.level === "error") {
    return true;
  }

  if (event.level === "debug") {
    return false;
  }

  if (
    event.eventType === "file.read" ||
    event.eventType === "file.write" ||
    event.eventType === "row.enriched"
  ) {
    return false;
  }

  if (event.eventType === "stage.lifecycle") {
    if (!event.phase) {
      return true;
    }
    return event.phase === "end" || event.phase === "fail";
  }

  return true;
}

function renderCondensedExtras(event: ProcessorEvent): string {
  const keys: string[] = ["durationMs", "path", "errorCode"];
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
