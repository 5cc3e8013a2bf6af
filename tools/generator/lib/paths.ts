import { existsSync } from "fs";
import { basename, dirname, extname, join, resolve } from "path";
import { fileURLToPath } from "url";

const THIS_DIR = dirname(fileURLToPath(import.meta.url));

export const REPO_ROOT = findPackageRoot(THIS_DIR);
export const GENERATOR_ROOT = join(REPO_ROOT, "tools", "generator");

export const DATA_DIR = join(GENERATOR_ROOT, "data");
export const DATA_SCHEMA_DIR = join(DATA_DIR, "_schema");
export const DEFAULTS_PATH = join(DATA_DIR, "defaults.json");
export const REPORT_SCHEMA_PATH = join(DATA_SCHEMA_DIR, "report.schema.json");

export const DEFAULT_CONFIG_FILE = "config.json";
export const DEFAULT_LOG_FILE = "collection_processor.log";

/** Works from both the sources and the compiled dist/ tree. */
function findPackageRoot(start: string): string {
  let current = start;
  for (;;) {
    if (existsSync(join(current, "package.json"))) {
      return current;
    }
    const parent = dirname(current);
    if (parent === current) {
      return resolve(start, "../../..");
    }
    current = parent;
  }
}

export function defaultOutputBase(inputPath: string): string {
  return `${basename(inputPath, extname(inputPath))}_processed`;
}

export function htmlPagePath(outputBase: string, pageIndex: number, totalPages: number): string {
  if (totalPages <= 1) {
    return `${outputBase}.html`;
  }
  return `${outputBase}_page_${pageIndex}.html`;
}
