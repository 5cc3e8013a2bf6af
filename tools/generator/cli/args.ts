import { parseArgs } from "util";
import { DEFAULT_CONFIG_FILE, DEFAULT_LOG_FILE } from "../lib/paths.js";
import { ConfigError } from "../pipeline/errors.js";
import type { LogFormat, OutputFormat } from "../pipeline/types.js";

export const USAGE = `Usage: process-collection [-i <file.csv>] [-o <output-prefix>] [--artist <column>] [--title <column>]
  [--search <engine> ...] [--max-keywords <n>] [--max-artist-keywords <n>] [--items-per-page <n>]
  [--csv] [--html] [--json] [--config <path>] [--save-config] [--list-engines]
  [-s|--silent] [--log-file <path>] [--log-format pretty|json] [--event-file <path>] [--verbose] [--version]

Examples:
  process-collection -i my_collection.csv
  process-collection -i discogs_export.csv -o processed --html --search wikipedia --search spotify
  process-collection -i collection.csv --artist "Artist Name" --title "Album Title"
  process-collection --list-engines`;

export type CliAction =
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "list-engines"; configPath: string }
  | { kind: "save-config"; configPath: string; args: ParsedCli }
  | { kind: "process"; args: ParsedCli };

export interface ParsedCli {
  input?: string;
  output?: string;
  artist?: string;
  title?: string;
  search?: string[];
  maxKeywords?: number;
  maxArtistKeywords?: number;
  itemsPerPage?: number;
  formats: OutputFormat[];
  configPath: string;
  silent: boolean;
  verbose: boolean;
  logFile: string;
  logFormat: LogFormat;
  eventFile?: string;
}

export function parseCliArgs(argv: string[]): CliAction {
  const { values } = parseArgs({
    args: argv,
    options: {
      input: { type: "string", short: "i" },
      output: { type: "string", short: "o" },
      artist: { type: "string" },
      title: { type: "string" },
      search: { type: "string", multiple: true },
      "max-keywords": { type: "string" },
      "max-artist-keywords": { type: "string" },
      "items-per-page": { type: "string" },
      csv: { type: "boolean" },
      html: { type: "boolean" },
      json: { type: "boolean" },
      config: { type: "string" },
      "save-config": { type: "boolean" },
      "list-engines": { type: "boolean" },
      silent: { type: "boolean", short: "s" },
      "log-file": { type: "string" },
      "log-format": { type: "string" },
      "event-file": { type: "string" },
      verbose: { type: "boolean" },
      version: { type: "boolean" },
      help: { type: "boolean", short: "h" },
    },
  });

  if (values.help) {
    return { kind: "help" };
  }
  if (values.version) {
    return { kind: "version" };
  }

  const configPath = values.config ?? DEFAULT_CONFIG_FILE;
  if (values["list-engines"]) {
    return { kind: "list-engines", configPath };
  }

  const logFormatRaw = values["log-format"] ?? "pretty";
  if (logFormatRaw !== "pretty" && logFormatRaw !== "json") {
    throw new ConfigError(`Invalid --log-format value: ${logFormatRaw}. Use pretty or json.`);
  }

  const formats: OutputFormat[] = [];
  if (values.csv) formats.push("csv");
  if (values.html) formats.push("html");
  if (values.json) formats.push("json");

  const args: ParsedCli = {
    input: values.input,
    output: values.output,
    artist: values.artist,
    title: values.title,
    search: values.search
      ?.flatMap((entry) => entry.split(","))
      .map((entry) => entry.trim())
      .filter(Boolean),
    maxKeywords: parseIntegerOption("--max-keywords", values["max-keywords"]),
    maxArtistKeywords: parseIntegerOption("--max-artist-keywords", values["max-artist-keywords"]),
    itemsPerPage: parseIntegerOption("--items-per-page", values["items-per-page"]),
    formats,
    configPath,
    silent: values.silent ?? false,
    verbose: values.verbose ?? false,
    logFile: values["log-file"] ?? DEFAULT_LOG_FILE,
    logFormat: logFormatRaw,
    eventFile: values["event-file"],
  };

  if (values["save-config"]) {
    return { kind: "save-config", configPath, args };
  }
  return { kind: "process", args };
}

function parseIntegerOption(flag: string, raw: string | undefined): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigError(`${flag} must be an integer, got: ${raw}`);
  }
  return value;
}
