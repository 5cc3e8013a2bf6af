import type { Diagnostic } from "../core/types.js";

export const STAGE_ORDER = ["load", "process", "write"] as const;

export type StageName = (typeof STAGE_ORDER)[number];

export type OutputFormat = "csv" | "html" | "json";

export type LogFormat = "pretty" | "json";
export type LogLevel = "debug" | "info" | "warn" | "error";

export type EventType =
  | "run.lifecycle"
  | "stage.lifecycle"
  | "config"
  | "file.read"
  | "file.write"
  | "input.decode"
  | "schema.resolved"
  | "engines.resolved"
  | "diagnostic"
  | "row.enriched"
  | "validation"
  | "summary";

export interface ProcessorEvent {
  ts: string;
  runId: string;
  level: LogLevel;
  stage: StageName | "system";
  eventType: EventType;
  message: string;
  phase?: "start" | "end" | "fail";
  durationMs?: number;
  path?: string;
  bytes?: number;
  errorCode?: string;
  [key: string]: unknown;
}

export interface LogRuntimeConfig {
  runId: string;
  format: LogFormat;
  verbose: boolean;
  consoleLogs: boolean;
  /** Receives every event in pretty form; truncated when the emitter starts. */
  logFilePath?: string;
  eventFilePath?: string;
}

export interface ProcessOptions {
  runId: string;
  inputPath: string;
  outputBase: string;
  configPath: string;
  formats: OutputFormat[];
  artistColumn?: string;
  titleColumn?: string;
  silent: boolean;
  verbose: boolean;
  logFile?: string;
  logFormat: LogFormat;
  eventFile?: string;
}

export interface RunSummary {
  runId: string;
  recordCount: number;
  pageCount: number;
  outputPaths: string[];
  diagnostics: Diagnostic[];
}
