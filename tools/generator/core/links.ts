import type {
  DiagnosticSink,
  EngineDefinition,
  EngineRegistry,
  SpaceEncoding,
} from "./types.js";

export const QUERY_PLACEHOLDER = "{query}";

export interface EnginePlan {
  /** Resolved requested engines, in request order. Each gets a per-row link. */
  engines: readonly EngineDefinition[];
  /** Engine whose URL becomes the primary link; null when nothing resolves. */
  primary: EngineDefinition | null;
  unknown: readonly string[];
}

export interface GeneratedLinks {
  links: Readonly<Record<string, string>>;
  primaryLink: string;
}

/**
 * Resolves requested engine names once per run. Unknown names are reported
 * once here and skipped for every row.
 */
export function resolveEngines(
  requested: readonly string[],
  registry: EngineRegistry,
  defaultEngine: string,
  report?: DiagnosticSink
): EnginePlan {
  const engines: EngineDefinition[] = [];
  const unknown: string[] = [];
  const seen = new Set<string>();

  for (const name of requested) {
    if (seen.has(name)) {
      continue;
    }
    seen.add(name);

    const engine = lookupEngine(registry, name);
    if (!engine) {
      unknown.push(name);
      report?.({
        code: "UNKNOWN_ENGINE",
        engine: name,
        message: `Unknown search engine: ${name}`,
      });
      continue;
    }
    engines.push(engine);
  }

  const primary = engines[0] ?? lookupEngine(registry, defaultEngine) ?? null;

  return { engines, primary, unknown };
}

export function buildLinks(keywords: string, plan: EnginePlan): GeneratedLinks {
  const links: Record<string, string> = {};
  for (const engine of plan.engines) {
    links[engine.name] = buildSearchUrl(engine, keywords);
  }

  let primaryLink = "";
  if (plan.primary) {
    primaryLink = links[plan.primary.name] ?? buildSearchUrl(plan.primary, keywords);
  }

  return { links: Object.freeze(links), primaryLink };
}

export function generateLinks(
  keywords: string,
  requested: readonly string[],
  registry: EngineRegistry,
  defaultEngine: string,
  report?: DiagnosticSink
): GeneratedLinks {
  return buildLinks(keywords, resolveEngines(requested, registry, defaultEngine, report));
}

export function buildSearchUrl(engine: EngineDefinition, keywords: string): string {
  const query = encodeQuery(keywords, engine.spaceEncoding);
  return engine.urlTemplate.split(QUERY_PLACEHOLDER).join(query);
}

export function encodeQuery(keywords: string, spaceEncoding: SpaceEncoding): string {
  const encoded = encodeURIComponent(keywords.trim());
  return spaceEncoding === "plus" ? encoded.replace(/%20/g, "+") : encoded;
}

function lookupEngine(registry: EngineRegistry, name: string): EngineDefinition | undefined {
  return Object.prototype.hasOwnProperty.call(registry, name) ? registry[name] : undefined;
}
