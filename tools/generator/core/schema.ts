import type {
  CanonicalField,
  ColumnMatch,
  DiagnosticSink,
  SchemaMapping,
} from "./types.js";

export interface ResolveSchemaInput {
  availableColumns: ReadonlySet<string> | readonly string[];
  artistCandidates: readonly string[];
  titleCandidates: readonly string[];
  explicitArtist?: string;
  explicitTitle?: string;
}

interface ColumnResolution {
  column: string | null;
  matchedBy: ColumnMatch;
}

export function resolveSchema(input: ResolveSchemaInput, report?: DiagnosticSink): SchemaMapping {
  const available = [...input.availableColumns];

  const artist = resolveField("artist", available, input.artistCandidates, input.explicitArtist, report);
  const title = resolveField("title", available, input.titleCandidates, input.explicitTitle, report);

  return Object.freeze({
    artistColumn: artist.column,
    titleColumn: title.column,
    matchedBy: Object.freeze({ artist: artist.matchedBy, title: title.matchedBy }),
  });
}

function resolveField(
  field: CanonicalField,
  available: string[],
  candidates: readonly string[],
  explicit: string | undefined,
  report: DiagnosticSink | undefined
): ColumnResolution {
  if (explicit) {
    if (available.includes(explicit)) {
      return { column: explicit, matchedBy: "explicit" };
    }
    report?.({
      code: "EXPLICIT_COLUMN_MISSING",
      field,
      column: explicit,
      message: `${field} column '${explicit}' not found; falling back to detection`,
    });
  }

  const match = matchCandidate(available, candidates);
  if (match) {
    return match;
  }

  report?.({
    code: "SCHEMA_UNRESOLVED",
    field,
    message: `No ${field} column found among: ${available.join(", ") || "(none)"}`,
    availableColumns: [...available],
  });
  return { column: null, matchedBy: "unresolved" };
}

/**
 * Candidate order decides ties; header order only matters within the
 * case-insensitive pass when several headers fold to the same name.
 */
export function matchCandidate(
  available: readonly string[],
  candidates: readonly string[]
): ColumnResolution | null {
  for (const candidate of candidates) {
    if (available.includes(candidate)) {
      return { column: candidate, matchedBy: "exact" };
    }
  }

  for (const candidate of candidates) {
    const folded = candidate.toLowerCase();
    const hit = available.find((column) => column.toLowerCase() === folded);
    if (hit !== undefined) {
      return { column: hit, matchedBy: "case-insensitive" };
    }
  }

  return null;
}
