import { describe, expect, test } from "vitest";
import { mkdtempSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { InputError } from "../pipeline/errors.js";
import { decodeText, readTextWithFallback } from "../lib/input.js";

describe("decodeText", () => {
  test("decodes UTF-8 and strips the byte order mark", () => {
    const decoded = decodeText(Buffer.from("\uFEFFBjörk,Homogenic", "utf-8"));
    expect(decoded).toEqual({ text: "Björk,Homogenic", encoding: "utf-8", bytes: 19 });
  });

  test("falls back to latin-1 when the bytes are not UTF-8", () => {
    const decoded = decodeText(Buffer.from([0x42, 0x6a, 0xf6, 0x72, 0x6b]));
    expect(decoded).toEqual({ text: "Björk", encoding: "latin1", bytes: 5 });
  });
});

describe("readTextWithFallback", () => {
  test("reads a file from disk", () => {
    const dir = mkdtempSync(join(tmpdir(), "collection-input-"));
    const path = join(dir, "input.csv");
    writeFileSync(path, "Artist,Title\nCan,Tago Mago\n");

    expect(readTextWithFallback(path).text).toBe("Artist,Title\nCan,Tago Mago\n");
  });

  test("throws an input error for a missing file", () => {
    const path = join(tmpdir(), "does-not-exist-collection.csv");
    expect(() => readTextWithFallback(path)).toThrow(InputError);
    expect(() => readTextWithFallback(path)).toThrow(`Input file not found: ${path}`);
  });
});
