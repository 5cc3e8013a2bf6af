import { processDataset, type ProcessResult } from "../core/process.js";
import { resolvePageSize } from "../core/paginate.js";
import type { CoreConfig, Dataset, Diagnostic } from "../core/types.js";
import { toCoreConfig, type ConfigFile } from "../lib/config.js";
import { parseDataset } from "../lib/csv.js";
import { readTextWithFallback } from "../lib/input.js";
import { writeCsvReport } from "../writers/csv.js";
import { writeHtmlReport } from "../writers/html.js";
import { writeJsonReport } from "../writers/json.js";
import type { ReportInput, WriterOutput } from "../writers/types.js";
import { InputError } from "./errors.js";
import { initializeEventEmitter } from "./events.js";
import { Logger } from "./logger.js";
import { runStage } from "./stage-runner.js";
import type { OutputFormat, ProcessOptions, RunSummary } from "./types.js";

export interface PipelineContext {
  options: ProcessOptions;
  config: CoreConfig;
  logger: Logger;
}

const WRITERS: Record<OutputFormat, (input: ReportInput, outputBase: string) => WriterOutput> = {
  csv: writeCsvReport,
  html: writeHtmlReport,
  json: writeJsonReport,
};

export async function runCollectionPipeline(
  options: ProcessOptions,
  configFile: ConfigFile
): Promise<RunSummary> {
  initializeEventEmitter({
    runId: options.runId,
    format: options.logFormat,
    verbose: options.verbose,
    consoleLogs: !options.silent,
    logFilePath: options.logFile,
    eventFilePath: options.eventFile,
  });

  const logger = new Logger();
  const context: PipelineContext = {
    options,
    config: toCoreConfig(configFile, {
      artistColumn: options.artistColumn,
      titleColumn: options.titleColumn,
    }),
    logger,
  };

  logger.info("Run started", {
    eventType: "run.lifecycle",
    input: options.inputPath,
    config: options.configPath,
    outputBase: options.outputBase,
    formats: options.formats,
    engines: context.config.requestedEngines,
    maxKeywords: context.config.keywords.maxKeywords,
    pageSize: context.config.pageSize,
  });

  const dataset = await runStage({ name: "load", run: loadDataset }, context, logger);
  const result = await runStage(
    { name: "process", run: async (ctx: PipelineContext) => processLoadedDataset(ctx, dataset) },
    context,
    logger
  );
  const outputs = await runStage(
    { name: "write", run: async (ctx: PipelineContext) => writeReports(ctx, dataset, result) },
    context,
    logger
  );

  const summary: RunSummary = {
    runId: options.runId,
    recordCount: result.records.length,
    pageCount: result.pages.length,
    outputPaths: outputs.flatMap((output) => output.paths),
    diagnostics: result.diagnostics,
  };

  logger.info("Processing complete", {
    eventType: "summary",
    records: summary.recordCount,
    pages: summary.pageCount,
    outputs: summary.outputPaths,
    diagnostics: summary.diagnostics.length,
  });

  return summary;
}

async function loadDataset(context: PipelineContext): Promise<Dataset> {
  const { logger, options } = context;
  logger.info(`Loading data from: ${options.inputPath}`, { eventType: "input.decode" });

  const decoded = readTextWithFallback(options.inputPath);
  const dataset = parseDataset(decoded.text);
  if (dataset.headers.length === 0) {
    throw new InputError(`Input file has no header row: ${options.inputPath}`);
  }

  logger.info(`Loaded ${dataset.records.length} records`, {
    eventType: "input.decode",
    encoding: decoded.encoding,
    bytes: decoded.bytes,
    columns: [...dataset.headers],
  });
  return dataset;
}

function processLoadedDataset(context: PipelineContext, dataset: Dataset): ProcessResult {
  const { logger, config } = context;
  const result = processDataset(dataset, config);

  logger.info("Resolved columns", {
    eventType: "schema.resolved",
    artistColumn: result.mapping.artistColumn,
    titleColumn: result.mapping.titleColumn,
    matchedBy: result.mapping.matchedBy,
  });
  logger.info("Resolved search engines", {
    eventType: "engines.resolved",
    engines: result.plan.engines.map((engine) => engine.name),
    primary: result.plan.primary?.name ?? null,
  });

  for (const diagnostic of result.diagnostics) {
    logDiagnostic(logger, diagnostic);
  }

  for (const record of result.records) {
    logger.debug("Row enriched", {
      eventType: "row.enriched",
      row: record.index,
      keywords: record.keywords,
    });
  }

  return result;
}

function writeReports(context: PipelineContext, dataset: Dataset, result: ProcessResult): WriterOutput[] {
  const { logger, options, config } = context;
  const input: ReportInput = {
    headers: dataset.headers,
    mapping: result.mapping,
    plan: result.plan,
    records: result.records,
    pages: result.pages,
    pageSize: resolvePageSize(config.pageSize),
    diagnostics: result.diagnostics,
    generatedAt: new Date(),
  };

  const outputs: WriterOutput[] = [];
  for (const format of options.formats) {
    const output = WRITERS[format](input, options.outputBase);
    for (const path of output.paths) {
      logger.info(`${format.toUpperCase()} saved to: ${path}`, { eventType: "summary", path });
    }
    outputs.push(output);
  }
  return outputs;
}

export function logDiagnostic(logger: Logger, diagnostic: Diagnostic): void {
  const { code, message, ...details } = diagnostic;
  logger.warn(message, {
    eventType: "diagnostic",
    errorCode: code,
    ...details,
  });
}
