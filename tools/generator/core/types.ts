export type RawRecord = Readonly<Record<string, string>>;

export type ColumnMatch = "explicit" | "exact" | "case-insensitive" | "unresolved";

export interface SchemaMapping {
  readonly artistColumn: string | null;
  readonly titleColumn: string | null;
  readonly matchedBy: {
    readonly artist: ColumnMatch;
    readonly title: ColumnMatch;
  };
}

export type SpaceEncoding = "plus" | "percent";

export interface EngineDefinition {
  readonly name: string;
  /** Must contain a `{query}` placeholder. */
  readonly urlTemplate: string;
  readonly displayLabel: string;
  readonly spaceEncoding: SpaceEncoding;
}

export type EngineRegistry = Readonly<Record<string, EngineDefinition>>;

export interface EnrichedRecord {
  /** 0-based position of the row in the input dataset. */
  readonly index: number;
  readonly artist: string;
  readonly title: string;
  readonly keywords: string;
  readonly links: Readonly<Record<string, string>>;
  readonly primaryLink: string;
  readonly fields: RawRecord;
}

export interface Page {
  readonly index: number;
  readonly totalPages: number;
  readonly records: readonly EnrichedRecord[];
}

export interface Dataset {
  readonly headers: readonly string[];
  readonly records: readonly RawRecord[];
}

export type CanonicalField = "artist" | "title";

export type Diagnostic =
  | {
      code: "SCHEMA_UNRESOLVED";
      field: CanonicalField;
      message: string;
      availableColumns: string[];
    }
  | {
      code: "EXPLICIT_COLUMN_MISSING";
      field: CanonicalField;
      column: string;
      message: string;
    }
  | {
      code: "UNKNOWN_ENGINE";
      engine: string;
      message: string;
    }
  | {
      code: "INVALID_PAGE_SIZE";
      requested: number;
      applied: number;
      message: string;
    }
  | {
      code: "MALFORMED_ROW";
      row: number;
      missingColumns: string[];
      message: string;
    };

export type DiagnosticCode = Diagnostic["code"];

export type DiagnosticSink = (diagnostic: Diagnostic) => void;

export interface KeywordOptions {
  /** Normalized with `normalizeStopwords`. */
  readonly stopwords: ReadonlySet<string>;
  readonly maxKeywords: number;
  /** Normalized artist values treated as compilations; their tokens are dropped. */
  readonly compilationArtists?: ReadonlySet<string>;
  readonly maxArtistKeywords?: number;
}

export interface CoreConfig {
  readonly artistColumns: readonly string[];
  readonly titleColumns: readonly string[];
  readonly explicitArtist?: string;
  readonly explicitTitle?: string;
  readonly keywords: KeywordOptions;
  readonly requestedEngines: readonly string[];
  readonly engines: EngineRegistry;
  readonly defaultEngine: string;
  readonly pageSize: number;
}
