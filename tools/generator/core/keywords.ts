import type { KeywordOptions } from "./types.js";

export type TokenSource = "artist" | "title";

export interface Token {
  text: string;
  source: TokenSource;
}

export const DEFAULT_COMPILATION_ARTISTS: ReadonlySet<string> = new Set([
  "various artists",
  "various",
  "va",
]);

const BRACKETED_GROUP = /\([^()[\]{}]*\)|\[[^()[\]{}]*\]|\{[^()[\]{}]*\}/g;
const APOSTROPHES = /['‘’`´]/g;
const NON_WORD_RUN = /[^\p{L}\p{N}]+/u;

/**
 * Builds the search keyword string for one row. Artist tokens come first, so
 * truncation keeps artist words before title words.
 */
export function buildKeywords(artist: string, title: string, options: KeywordOptions): string {
  const artistTokens = tokenize(stripBracketed(artist));
  const titleTokens = tokenize(stripBracketed(title));
  const compilations = options.compilationArtists ?? DEFAULT_COMPILATION_ARTISTS;

  let tokens: Token[] = [
    ...artistTokens.map((text): Token => ({ text, source: "artist" })),
    ...titleTokens.map((text): Token => ({ text, source: "title" })),
  ];

  tokens = dropStopwords(tokens, options.stopwords);
  if (isCompilationArtist(artistTokens, compilations)) {
    tokens = tokens.filter((token) => token.source === "title");
  }
  tokens = dedupeTokens(tokens);
  if (options.maxArtistKeywords !== undefined) {
    tokens = capArtistTokens(tokens, options.maxArtistKeywords);
  }

  return truncateTokens(tokens, options.maxKeywords)
    .map((token) => token.text)
    .join(" ");
}

/** Removes balanced (), [] and {} groups, innermost first. */
export function stripBracketed(text: string): string {
  let current = text;
  for (;;) {
    const next = current.replace(BRACKETED_GROUP, " ");
    if (next === current) {
      return current;
    }
    current = next;
  }
}

export function tokenize(text: string): string[] {
  return text
    .normalize("NFC")
    .toLowerCase()
    .replace(APOSTROPHES, "")
    .split(NON_WORD_RUN)
    .filter((token) => token.length > 0);
}

/** Entries that do not reduce to exactly one token can never match and are skipped. */
export function normalizeStopwords(words: Iterable<string>): Set<string> {
  const out = new Set<string>();
  for (const word of words) {
    const tokens = tokenize(word);
    if (tokens.length === 1) {
      out.add(tokens[0]);
    }
  }
  return out;
}

export function isSingleToken(word: string): boolean {
  return tokenize(word).length === 1;
}

/** Expects stopwords already passed through `normalizeStopwords`. */
export function dropStopwords(tokens: Token[], stopwords: ReadonlySet<string>): Token[] {
  return tokens.filter((token) => !stopwords.has(token.text));
}

export function isCompilationArtist(
  artistTokens: readonly string[],
  compilationArtists: ReadonlySet<string>
): boolean {
  if (artistTokens.length === 0) {
    return false;
  }
  const value = artistTokens.join(" ");
  for (const name of compilationArtists) {
    if (tokenize(name).join(" ") === value) {
      return true;
    }
  }
  return false;
}

export function dedupeTokens(tokens: Token[]): Token[] {
  const seen = new Set<string>();
  const out: Token[] = [];
  for (const token of tokens) {
    if (seen.has(token.text)) {
      continue;
    }
    seen.add(token.text);
    out.push(token);
  }
  return out;
}

export function capArtistTokens(tokens: Token[], limit: number): Token[] {
  let kept = 0;
  return tokens.filter((token) => {
    if (token.source !== "artist") {
      return true;
    }
    kept++;
    return kept <= limit;
  });
}

export function truncateTokens(tokens: Token[], maxKeywords: number): Token[] {
  const limit = Number.isFinite(maxKeywords) ? Math.max(0, Math.floor(maxKeywords)) : 0;
  return tokens.slice(0, limit);
}
