import type { DiagnosticSink, EnrichedRecord, Page } from "./types.js";

export const DEFAULT_PAGE_SIZE = 100;

export interface PaginateOptions {
  defaultPageSize?: number;
  report?: DiagnosticSink;
}

export function paginate(
  records: readonly EnrichedRecord[],
  pageSize: number,
  options: PaginateOptions = {}
): Page[] {
  const size = resolvePageSize(pageSize, options);
  const totalPages = Math.ceil(records.length / size);
  const pages: Page[] = [];

  for (let i = 0; i < totalPages; i++) {
    pages.push(
      Object.freeze({
        index: i + 1,
        totalPages,
        records: Object.freeze(records.slice(i * size, (i + 1) * size)),
      })
    );
  }

  return pages;
}

export function resolvePageSize(pageSize: number, options: PaginateOptions = {}): number {
  if (Number.isInteger(pageSize) && pageSize > 0) {
    return pageSize;
  }

  const fallback = options.defaultPageSize;
  const applied =
    fallback !== undefined && Number.isInteger(fallback) && fallback > 0
      ? fallback
      : DEFAULT_PAGE_SIZE;
  options.report?.({
    code: "INVALID_PAGE_SIZE",
    requested: pageSize,
    applied,
    message: `Invalid page size ${pageSize}; using ${applied}`,
  });
  return applied;
}
