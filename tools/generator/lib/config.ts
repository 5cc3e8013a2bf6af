import { existsSync, readFileSync } from "fs";
import { z } from "zod";
import { isSingleToken, normalizeStopwords } from "../core/keywords.js";
import { QUERY_PLACEHOLDER } from "../core/links.js";
import type { CoreConfig, EngineDefinition, EngineRegistry } from "../core/types.js";
import { ConfigError } from "../pipeline/errors.js";
import { emitProcessorEvent } from "../pipeline/events.js";
import { readJsonFile, writeJsonAtomic } from "./json.js";
import { DEFAULTS_PATH } from "./paths.js";

const engineEntrySchema = z.union([
  z.string().includes(QUERY_PLACEHOLDER, {
    message: `engine URL template must contain ${QUERY_PLACEHOLDER}`,
  }),
  z
    .object({
      urlTemplate: z.string().includes(QUERY_PLACEHOLDER, {
        message: `engine URL template must contain ${QUERY_PLACEHOLDER}`,
      }),
      label: z.string().min(1).optional(),
      spaceEncoding: z.enum(["plus", "percent"]).optional(),
    })
    .strict(),
]);

export const configFileSchema = z
  .object({
    input_file: z.string().min(1),
    output_formats: z.array(z.enum(["csv", "html", "json"])),
    artist_columns: z.array(z.string().min(1)),
    title_columns: z.array(z.string().min(1)),
    max_keywords: z.number().int().positive(),
    max_artist_keywords: z.number().int().nonnegative().nullable(),
    compilation_artists: z.array(z.string()),
    search_engines: z.record(z.string().min(1), engineEntrySchema),
    requested_engines: z.array(z.string().min(1)),
    default_search_engine: z.string().min(1),
    // Non-positive sizes are corrected during pagination, not rejected here.
    html_items_per_page: z.number().int(),
    stopwords: z.array(
      z.string().refine((word) => isSingleToken(word), {
        message: "stopword must be a single word",
      })
    ),
  })
  .superRefine((value, ctx) => {
    if (!Object.prototype.hasOwnProperty.call(value.search_engines, value.default_search_engine)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["default_search_engine"],
        message: `default engine '${value.default_search_engine}' is not in search_engines`,
      });
    }
  });

export type ConfigFile = z.infer<typeof configFileSchema>;
export type EngineEntry = z.infer<typeof engineEntrySchema>;

export interface ConfigOverrides {
  artistColumn?: string;
  titleColumn?: string;
  searchEngines?: string[];
  maxKeywords?: number;
  maxArtistKeywords?: number;
  itemsPerPage?: number;
}

export function loadDefaultConfig(): ConfigFile {
  return parseConfig(readJsonFile<unknown>(DEFAULTS_PATH), DEFAULTS_PATH);
}

/** Shallow-merges the file at `path` over the defaults. Missing file means defaults. */
export function loadConfig(path: string): ConfigFile {
  const defaults = loadDefaultConfig();
  if (!existsSync(path)) {
    emitProcessorEvent({
      level: "debug",
      eventType: "config",
      message: "Config file not found; using defaults",
      path,
    });
    return defaults;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Could not parse config file ${path}`, error);
  }

  if (raw === null || typeof raw !== "object" || Array.isArray(raw)) {
    throw new ConfigError(`Config file ${path} must contain a JSON object`);
  }

  emitProcessorEvent({
    level: "info",
    eventType: "config",
    message: "Loaded config file",
    path,
    keys: Object.keys(raw),
  });
  return parseConfig({ ...defaults, ...raw }, path);
}

export function saveConfig(path: string, config: ConfigFile): void {
  writeJsonAtomic(path, parseConfig(config, path));
}

export function parseConfig(value: unknown, source: string): ConfigFile {
  const result = configFileSchema.safeParse(value);
  if (!result.success) {
    const messages = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    throw new ConfigError(`Invalid configuration in ${source}: ${messages.join("; ")}`, result.error);
  }
  return result.data;
}

export function applyOverrides(config: ConfigFile, overrides: ConfigOverrides): ConfigFile {
  const next: ConfigFile = { ...config };
  if (overrides.searchEngines !== undefined) {
    next.requested_engines = overrides.searchEngines;
  }
  if (overrides.maxKeywords !== undefined) {
    next.max_keywords = overrides.maxKeywords;
  }
  if (overrides.maxArtistKeywords !== undefined) {
    next.max_artist_keywords = overrides.maxArtistKeywords;
  }
  if (overrides.itemsPerPage !== undefined) {
    next.html_items_per_page = overrides.itemsPerPage;
  }
  return parseConfig(next, "command line");
}

export function buildEngineRegistry(entries: Record<string, EngineEntry>): EngineRegistry {
  const registry: Record<string, EngineDefinition> = {};
  for (const [name, entry] of Object.entries(entries)) {
    registry[name] = Object.freeze(
      typeof entry === "string"
        ? {
            name,
            urlTemplate: entry,
            displayLabel: titleCase(name),
            spaceEncoding: "plus",
          }
        : {
            name,
            urlTemplate: entry.urlTemplate,
            displayLabel: entry.label ?? titleCase(name),
            spaceEncoding: entry.spaceEncoding ?? "plus",
          }
    );
  }
  return Object.freeze(registry);
}

export function toCoreConfig(config: ConfigFile, overrides: ConfigOverrides = {}): CoreConfig {
  return {
    artistColumns: config.artist_columns,
    titleColumns: config.title_columns,
    explicitArtist: overrides.artistColumn,
    explicitTitle: overrides.titleColumn,
    keywords: {
      stopwords: normalizeStopwords(config.stopwords),
      maxKeywords: config.max_keywords,
      compilationArtists: new Set(config.compilation_artists),
      maxArtistKeywords: config.max_artist_keywords ?? undefined,
    },
    requestedEngines: config.requested_engines,
    engines: buildEngineRegistry(config.search_engines),
    defaultEngine: config.default_search_engine,
    pageSize: config.html_items_per_page,
  };
}

export function titleCase(name: string): string {
  return name.replace(/[A-Za-z0-9]+/g, (word) => word[0].toUpperCase() + word.slice(1).toLowerCase());
}
