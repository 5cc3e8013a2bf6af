import { buildKeywords } from "./keywords.js";
import { buildLinks, type EnginePlan } from "./links.js";
import type {
  DiagnosticSink,
  EnrichedRecord,
  KeywordOptions,
  RawRecord,
  SchemaMapping,
} from "./types.js";

export function enrichRecord(
  record: RawRecord,
  index: number,
  mapping: SchemaMapping,
  keywordOptions: KeywordOptions,
  plan: EnginePlan,
  report?: DiagnosticSink
): EnrichedRecord {
  const missingColumns: string[] = [];
  const artist = readField(record, mapping.artistColumn, missingColumns);
  const title = readField(record, mapping.titleColumn, missingColumns);

  if (missingColumns.length > 0) {
    report?.({
      code: "MALFORMED_ROW",
      row: index,
      missingColumns,
      message: `Row ${index + 1} is missing ${missingColumns.join(", ")}; using empty values`,
    });
  }

  const keywords = buildKeywords(artist, title, keywordOptions);
  const { links, primaryLink } = buildLinks(keywords, plan);

  return Object.freeze({
    index,
    artist,
    title,
    keywords,
    links,
    primaryLink,
    fields: record,
  });
}

export function enrichRecords(
  records: readonly RawRecord[],
  mapping: SchemaMapping,
  keywordOptions: KeywordOptions,
  plan: EnginePlan,
  report?: DiagnosticSink
): EnrichedRecord[] {
  return records.map((record, index) =>
    enrichRecord(record, index, mapping, keywordOptions, plan, report)
  );
}

function readField(record: RawRecord, column: string | null, missing: string[]): string {
  // Unresolved columns are reported once at resolution, not per row.
  if (column === null) {
    return "";
  }
  const value = Object.prototype.hasOwnProperty.call(record, column) ? record[column] : undefined;
  if (value === undefined) {
    missing.push(column);
    return "";
  }
  return value.trim();
}
