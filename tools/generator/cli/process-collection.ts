#!/usr/bin/env node
import { readFileSync } from "fs";
import { join } from "path";
import { applyOverrides, buildEngineRegistry, loadConfig, saveConfig } from "../lib/config.js";
import { defaultOutputBase, REPO_ROOT } from "../lib/paths.js";
import { ProcessorError } from "../pipeline/errors.js";
import { runCollectionPipeline } from "../pipeline/process-collection.js";
import type { ProcessOptions } from "../pipeline/types.js";
import { parseCliArgs, USAGE } from "./args.js";

function createRunId(input: string): string {
  const now = new Date().toISOString().replace(/[.:]/g, "-");
  return `${toSlug(input)}-${now}`;
}

function toSlug(input: string): string {
  return input
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, 40);
}

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(join(REPO_ROOT, "package.json"), "utf-8"));
  if (pkg !== null && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "unknown";
}

async function main(): Promise<void> {
  const action = parseCliArgs(process.argv.slice(2));

  if (action.kind === "help") {
    console.log(USAGE);
    return;
  }
  if (action.kind === "version") {
    console.log(`process-collection ${readVersion()}`);
    return;
  }

  if (action.kind === "list-engines") {
    const registry = buildEngineRegistry(loadConfig(action.configPath).search_engines);
    console.log("Available search engines:");
    for (const engine of Object.values(registry)) {
      console.log(`  ${engine.name}: ${engine.urlTemplate} (${engine.displayLabel}, spaces as ${engine.spaceEncoding})`);
    }
    return;
  }

  const { args } = action;
  const config = applyOverrides(loadConfig(args.configPath), {
    searchEngines: args.search,
    maxKeywords: args.maxKeywords,
    maxArtistKeywords: args.maxArtistKeywords,
    itemsPerPage: args.itemsPerPage,
  });

  if (action.kind === "save-config") {
    saveConfig(action.configPath, config);
    console.log(`Configuration saved to ${action.configPath}`);
    return;
  }

  const inputPath = args.input ?? config.input_file;
  const options: ProcessOptions = {
    runId: createRunId(inputPath),
    inputPath,
    outputBase: args.output ?? defaultOutputBase(inputPath),
    configPath: args.configPath,
    formats: args.formats.length > 0 ? args.formats : config.output_formats,
    artistColumn: args.artist,
    titleColumn: args.title,
    silent: args.silent,
    verbose: args.verbose,
    logFile: args.logFile,
    logFormat: args.logFormat,
    eventFile: args.eventFile,
  };

  const summary = await runCollectionPipeline(options, config);
  if (!args.silent && summary.diagnostics.length > 0) {
    console.warn(`Completed with ${summary.diagnostics.length} warning(s); see ${args.logFile}`);
  }
}

main().catch((error: unknown) => {
  if (error instanceof ProcessorError) {
    console.error(`Error [${error.code}]: ${error.message}`);
  } else {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (!process.argv.includes("--silent") && !process.argv.includes("-s") && error instanceof Error) {
    console.error(error.stack);
  }
  process.exit(1);
});
