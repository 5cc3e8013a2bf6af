import type { EnginePlan } from "../core/links.js";
import type { Diagnostic, EnrichedRecord, Page, SchemaMapping } from "../core/types.js";

export interface ReportInput {
  headers: readonly string[];
  mapping: SchemaMapping;
  plan: EnginePlan;
  records: readonly EnrichedRecord[];
  pages: readonly Page[];
  pageSize: number;
  diagnostics: readonly Diagnostic[];
  generatedAt: Date;
}

export interface WriterOutput {
  format: "csv" | "html" | "json";
  paths: string[];
}
