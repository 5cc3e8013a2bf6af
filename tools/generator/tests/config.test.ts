import { describe, expect, test } from "vitest";
import { mkdtempSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import {
  applyOverrides,
  buildEngineRegistry,
  loadConfig,
  loadDefaultConfig,
  saveConfig,
  titleCase,
  toCoreConfig,
} from "../lib/config.js";
import { ConfigError } from "../pipeline/errors.js";

function tempConfig(content: string): string {
  const dir = mkdtempSync(join(tmpdir(), "collection-config-"));
  const path = join(dir, "config.json");
  writeFileSync(path, content);
  return path;
}

describe("loadConfig", () => {
  test("returns the defaults when the file does not exist", () => {
    const dir = mkdtempSync(join(tmpdir(), "collection-config-"));
    const config = loadConfig(join(dir, "missing.json"));

    expect(config).toEqual(loadDefaultConfig());
    expect(config.requested_engines).toEqual(["wikipedia"]);
    expect(config.max_keywords).toBe(5);
    expect(config.html_items_per_page).toBe(100);
  });

  test("shallow-merges file keys over the defaults", () => {
    const path = tempConfig(
      JSON.stringify({
        max_keywords: 3,
        search_engines: { wikipedia: "https://wiki.example/?q={query}" },
      })
    );
    const config = loadConfig(path);

    expect(config.max_keywords).toBe(3);
    expect(Object.keys(config.search_engines)).toEqual(["wikipedia"]);
    expect(config.stopwords).toEqual(loadDefaultConfig().stopwords);
  });

  test("rejects engine templates without a query placeholder", () => {
    const path = tempConfig(JSON.stringify({ search_engines: { wikipedia: "https://wiki.example/" } }));
    expect(() => loadConfig(path)).toThrow(ConfigError);
    expect(() => loadConfig(path)).toThrow(/search_engines\.wikipedia/);
  });

  test("rejects a default engine missing from the registry", () => {
    const path = tempConfig(JSON.stringify({ default_search_engine: "bandcamp" }));
    expect(() => loadConfig(path)).toThrow(
      "default_search_engine: default engine 'bandcamp' is not in search_engines"
    );
  });

  test("rejects stopwords that span several words", () => {
    const path = tempConfig(JSON.stringify({ stopwords: ["the", "now that"] }));
    expect(() => loadConfig(path)).toThrow("stopwords.1: stopword must be a single word");
  });

  test("rejects unparseable and non-object files", () => {
    expect(() => loadConfig(tempConfig("{ not json"))).toThrow(ConfigError);
    expect(() => loadConfig(tempConfig("[1, 2]"))).toThrow("must contain a JSON object");
  });

  test("saved configuration loads back unchanged", () => {
    const dir = mkdtempSync(join(tmpdir(), "collection-config-"));
    const path = join(dir, "nested", "config.json");
    const config = applyOverrides(loadDefaultConfig(), { searchEngines: ["spotify"], maxKeywords: 4 });

    saveConfig(path, config);

    expect(loadConfig(path)).toEqual(config);
  });
});

describe("applyOverrides", () => {
  test("replaces only the overridden keys", () => {
    const defaults = loadDefaultConfig();
    const config = applyOverrides(defaults, { itemsPerPage: 25, maxArtistKeywords: 2 });

    expect(config.html_items_per_page).toBe(25);
    expect(config.max_artist_keywords).toBe(2);
    expect(config.max_keywords).toBe(defaults.max_keywords);
    expect(defaults.html_items_per_page).toBe(100);
  });

  test("validates overridden values", () => {
    expect(() => applyOverrides(loadDefaultConfig(), { maxKeywords: 0 })).toThrow(ConfigError);
  });

  test("leaves invalid page sizes for pagination to correct", () => {
    expect(applyOverrides(loadDefaultConfig(), { itemsPerPage: 0 }).html_items_per_page).toBe(0);
  });
});

describe("engine registry", () => {
  test("expands bare URL templates with a derived label and plus encoding", () => {
    const registry = buildEngineRegistry({ bandcamp: "https://bandcamp.example/search?q={query}" });

    expect(registry.bandcamp).toEqual({
      name: "bandcamp",
      urlTemplate: "https://bandcamp.example/search?q={query}",
      displayLabel: "Bandcamp",
      spaceEncoding: "plus",
    });
  });

  test("keeps labels and encodings from object entries", () => {
    const registry = buildEngineRegistry(loadDefaultConfig().search_engines);
    expect(registry.spotify.displayLabel).toBe("Spotify");
    expect(registry.spotify.spaceEncoding).toBe("percent");
    expect(registry.youtube.displayLabel).toBe("YouTube");
  });

  test("title-cases each word of an engine name", () => {
    expect(titleCase("apple_music")).toBe("Apple_Music");
    expect(titleCase("musicbrainz")).toBe("Musicbrainz");
  });
});

describe("toCoreConfig", () => {
  test("normalizes stopwords and carries explicit columns", () => {
    const core = toCoreConfig(loadDefaultConfig(), { artistColumn: "Band", titleColumn: "Record" });

    expect(core.explicitArtist).toBe("Band");
    expect(core.explicitTitle).toBe("Record");
    expect(core.keywords.stopwords.has("its")).toBe(true);
    expect(core.keywords.stopwords.has("it's")).toBe(false);
    expect(core.keywords.maxArtistKeywords).toBeUndefined();
    expect(core.defaultEngine).toBe("wikipedia");
  });
});
