import type { RawRecord } from "../core/types.js";
import { titleCase } from "../lib/config.js";
import { stringifyCsv } from "../lib/csv.js";
import { writeTextAtomic } from "../lib/json.js";
import { OutputError } from "../pipeline/errors.js";
import type { ReportInput, WriterOutput } from "./types.js";

export const KEYWORDS_COLUMN = "Keywords";
export const SEARCH_LINK_COLUMN = "Search_Link";

export function linkColumnName(engineName: string): string {
  return `${titleCase(engineName)}_Link`;
}

export function renderCsvReport(input: ReportInput): string {
  const linkColumns = input.plan.engines.map((engine) => ({
    engine: engine.name,
    column: linkColumnName(engine.name),
  }));
  const added = new Set([
    KEYWORDS_COLUMN,
    ...linkColumns.map((entry) => entry.column),
    SEARCH_LINK_COLUMN,
  ]);
  // Re-processing an already processed export replaces the derived columns.
  const sourceHeaders = input.headers.filter((header) => !added.has(header));

  const headers = [
    ...sourceHeaders,
    KEYWORDS_COLUMN,
    ...linkColumns.map((entry) => entry.column),
    SEARCH_LINK_COLUMN,
  ];

  const rows = input.records.map((record) => [
    ...sourceHeaders.map((header) => ownField(record.fields, header)),
    record.keywords,
    ...linkColumns.map((entry) => record.links[entry.engine] ?? ""),
    record.primaryLink,
  ]);

  return stringifyCsv(headers, rows);
}

function ownField(fields: RawRecord, header: string): string {
  return Object.prototype.hasOwnProperty.call(fields, header) ? fields[header] : "";
}

export function writeCsvReport(input: ReportInput, outputBase: string): WriterOutput {
  const path = `${outputBase}.csv`;
  try {
    writeTextAtomic(path, renderCsvReport(input));
  } catch (error) {
    throw new OutputError(`Could not write CSV report: ${path}`, error);
  }
  return { format: "csv", paths: [path] };
}
