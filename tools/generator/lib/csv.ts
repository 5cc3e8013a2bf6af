import type { Dataset, RawRecord } from "../core/types.js";

export interface ParsedCsv {
  headers: string[];
  rows: string[][];
}

export function parseCsv(content: string): ParsedCsv {
  // Only physical blank lines are skipped; a row of empty cells is still a row.
  const rows = parseCsvRows(content.replace(/^\uFEFF/, ""))
    .map((row) => row.map((cell) => normalizeCell(cell)))
    .filter((row) => !(row.length === 1 && row[0] === ""));

  if (rows.length === 0) {
    return { headers: [], rows: [] };
  }

  const headers = uniqueHeaders(rows[0]);
  return {
    headers,
    rows: rows.slice(1),
  };
}

/**
 * Cells past the header width are dropped. Missing trailing cells stay absent
 * from the record rather than becoming empty strings.
 */
export function toRawRecords(parsed: ParsedCsv): RawRecord[] {
  return parsed.rows.map((row) => {
    const fields: Record<string, string> = Object.create(null);
    const width = Math.min(row.length, parsed.headers.length);
    for (let i = 0; i < width; i++) {
      fields[parsed.headers[i]] = row[i];
    }
    return Object.freeze(fields);
  });
}

export function parseDataset(content: string): Dataset {
  const parsed = parseCsv(content);
  return {
    headers: parsed.headers,
    records: toRawRecords(parsed),
  };
}

export function stringifyCsv(headers: readonly string[], rows: readonly (readonly string[])[]): string {
  const lines = [headers, ...rows].map((row) => row.map((cell) => escapeCsvCell(cell)).join(","));
  return lines.length > 0 ? `${lines.join("\r\n")}\r\n` : "";
}

export function escapeCsvCell(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function uniqueHeaders(row: string[]): string[] {
  const seen = new Set<string>();
  return row.map((cell, index) => {
    const base = cell || `col_${index + 1}`;
    let header = base;
    for (let suffix = index + 1; seen.has(header); suffix++) {
      header = `${base}_${suffix}`;
    }
    seen.add(header);
    return header;
  });
}

function normalizeCell(value: string): string {
  return value
    .replace(/\uFEFF/g, "")
    .replace(/\r/g, "")
    .trim();
}

function parseCsvRows(content: string): string[][] {
  const rows: string[][] = [];
  let currentRow: string[] = [];
  let currentCell = "";
  let inQuotes = false;
  let cellQuoted = false;

  for (let i = 0; i < content.length; i++) {
    const char = content[i];
    const next = content[i + 1];

    if (char === '"') {
      if (inQuotes) {
        if (next === '"') {
          currentCell += '"';
          i++;
        } else {
          inQuotes = false;
        }
        continue;
      }
      // A quote opens a quoted section only at the start of a field.
      if (currentCell.length === 0 && !cellQuoted) {
        inQuotes = true;
        cellQuoted = true;
        continue;
      }
      currentCell += char;
      continue;
    }

    if (!inQuotes && char === ",") {
      currentRow.push(currentCell);
      currentCell = "";
      cellQuoted = false;
      continue;
    }

    if (!inQuotes && (char === "\n" || char === "\r")) {
      if (char === "\r" && next === "\n") {
        i++;
      }
      currentRow.push(currentCell);
      rows.push(currentRow);
      currentRow = [];
      currentCell = "";
      cellQuoted = false;
      continue;
    }

    currentCell += char;
  }

  if (currentCell.length > 0 || currentRow.length > 0) {
    currentRow.push(currentCell);
    rows.push(currentRow);
  }

  return rows;
}
