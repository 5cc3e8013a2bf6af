import { enrichRecords } from "./enrich.js";
import { resolveEngines, type EnginePlan } from "./links.js";
import { DEFAULT_PAGE_SIZE, paginate } from "./paginate.js";
import { resolveSchema } from "./schema.js";
import type {
  CoreConfig,
  Dataset,
  Diagnostic,
  EnrichedRecord,
  Page,
  SchemaMapping,
} from "./types.js";

export interface ProcessResult {
  mapping: SchemaMapping;
  plan: EnginePlan;
  records: EnrichedRecord[];
  pages: Page[];
  diagnostics: Diagnostic[];
}

/**
 * Runs schema resolution, per-row enrichment and pagination over a decoded
 * dataset. Every degradation is returned as a diagnostic; nothing throws.
 */
export function processDataset(dataset: Dataset, config: CoreConfig): ProcessResult {
  const diagnostics: Diagnostic[] = [];
  const report = (diagnostic: Diagnostic): void => {
    diagnostics.push(diagnostic);
  };

  const mapping = resolveSchema(
    {
      availableColumns: dataset.headers,
      artistCandidates: config.artistColumns,
      titleCandidates: config.titleColumns,
      explicitArtist: config.explicitArtist,
      explicitTitle: config.explicitTitle,
    },
    report
  );
  const plan = resolveEngines(config.requestedEngines, config.engines, config.defaultEngine, report);
  const records = enrichRecords(dataset.records, mapping, config.keywords, plan, report);
  const pages = paginate(records, config.pageSize, {
    defaultPageSize: DEFAULT_PAGE_SIZE,
    report,
  });

  return { mapping, plan, records, pages, diagnostics };
}
