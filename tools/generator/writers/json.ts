import type { Diagnostic, SchemaMapping } from "../core/types.js";
import { writeJsonAtomic } from "../lib/json.js";
import { validateReport } from "../lib/validation.js";
import { OutputError, ReportValidationError } from "../pipeline/errors.js";
import type { ReportInput, WriterOutput } from "./types.js";

export interface JsonReportRecord {
  index: number;
  page: number;
  artist: string;
  title: string;
  keywords: string;
  links: Record<string, string>;
  primaryLink: string;
}

export interface JsonReport {
  generatedAt: string;
  mapping: SchemaMapping;
  pageSize: number;
  totalPages: number;
  engines: {
    requested: string[];
    primary: string | null;
  };
  records: JsonReportRecord[];
  diagnostics: Diagnostic[];
}

export function buildJsonReport(input: ReportInput): JsonReport {
  const records: JsonReportRecord[] = input.pages.flatMap((page) =>
    page.records.map((record) => ({
      index: record.index,
      page: page.index,
      artist: record.artist,
      title: record.title,
      keywords: record.keywords,
      links: { ...record.links },
      primaryLink: record.primaryLink,
    }))
  );

  return {
    generatedAt: input.generatedAt.toISOString(),
    mapping: input.mapping,
    pageSize: input.pageSize,
    totalPages: input.pages.length,
    engines: {
      requested: input.plan.engines.map((engine) => engine.name),
      primary: input.plan.primary?.name ?? null,
    },
    records,
    diagnostics: [...input.diagnostics],
  };
}

export function writeJsonReport(input: ReportInput, outputBase: string): WriterOutput {
  const path = `${outputBase}.json`;
  const report = buildJsonReport(input);
  const messages = validateReport(report);
  if (messages.length > 0) {
    throw new ReportValidationError(`JSON report failed schema validation: ${path}`, messages);
  }
  try {
    writeJsonAtomic(path, report);
  } catch (error) {
    throw new OutputError(`Could not write JSON report: ${path}`, error);
  }
  return { format: "json", paths: [path] };
}
