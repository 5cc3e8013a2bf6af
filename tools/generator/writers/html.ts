import { readFileSync } from "fs";
import { basename, join } from "path";
import type { EngineDefinition, EnrichedRecord, Page } from "../core/types.js";
import { writeTextAtomic } from "../lib/json.js";
import { DATA_DIR, htmlPagePath } from "../lib/paths.js";
import { OutputError } from "../pipeline/errors.js";
import type { ReportInput, WriterOutput } from "./types.js";

const STYLESHEET_PATH = join(DATA_DIR, "report.css");

export interface RenderPageOptions {
  outputBase: string;
  engines: readonly EngineDefinition[];
  primary: EngineDefinition | null;
  generatedAt: Date;
  stylesheet: string;
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

export function formatTimestamp(date: Date): string {
  return date.toISOString().replace("T", " ").slice(0, 19);
}

export function renderPageHtml(page: Page, options: RenderPageOptions): string {
  const cards = page.records.map((record) => renderCard(record, options)).join("\n");
  const body =
    page.records.length > 0
      ? `<div class="album-grid">\n${cards}\n</div>`
      : `<p class="empty">The collection is empty.</p>`;

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>Music Collection - Page ${page.index}</title>
<style>
${options.stylesheet}</style>
</head>
<body>
<div class="container">
<h1>Music Collection</h1>
<div class="stats"><strong>Page ${page.index} of ${page.totalPages}</strong> &bull; Showing ${page.records.length} items &bull; Generated on ${formatTimestamp(options.generatedAt)}</div>
${renderNavigation(page, options.outputBase)}${body}
</div>
</body>
</html>
`;
}

function renderNavigation(page: Page, outputBase: string): string {
  if (page.totalPages <= 1) {
    return "";
  }
  const items: string[] = [];
  for (let p = 1; p <= page.totalPages; p++) {
    if (p === page.index) {
      items.push(`<strong>${p}</strong>`);
      continue;
    }
    const href = basename(htmlPagePath(outputBase, p, page.totalPages));
    items.push(`<a href="${escapeHtml(href)}">${p}</a>`);
  }
  return `<div class="pagination">Navigation: ${items.join(" ")}</div>\n`;
}

function renderCard(record: EnrichedRecord, options: RenderPageOptions): string {
  const buttons = options.engines
    .filter((engine) => record.links[engine.name])
    .map((engine) => renderButton(record.links[engine.name], engine.displayLabel));

  if (buttons.length === 0 && record.primaryLink && options.primary) {
    buttons.push(renderButton(record.primaryLink, options.primary.displayLabel));
  }

  return `<div class="album-card">
<div class="artist">${escapeHtml(record.artist || "Unknown Artist")}</div>
<div class="title">${escapeHtml(record.title || "Unknown Title")}</div>
<div class="keywords">Keywords: ${escapeHtml(record.keywords)}</div>
<div class="links">${buttons.join("")}</div>
</div>`;
}

function renderButton(url: string, label: string): string {
  return `<a href="${escapeHtml(url)}" target="_blank" rel="noopener" class="link-btn">${escapeHtml(label)}</a>`;
}

export function loadStylesheet(): string {
  return readFileSync(STYLESHEET_PATH, "utf-8");
}

export function writeHtmlReport(input: ReportInput, outputBase: string): WriterOutput {
  // An empty collection still gets one page saying so.
  const pages: readonly Page[] =
    input.pages.length > 0 ? input.pages : [{ index: 1, totalPages: 1, records: [] }];
  const options: RenderPageOptions = {
    outputBase,
    engines: input.plan.engines,
    primary: input.plan.primary,
    generatedAt: input.generatedAt,
    stylesheet: loadStylesheet(),
  };

  const paths: string[] = [];
  for (const page of pages) {
    const path = htmlPagePath(outputBase, page.index, page.totalPages);
    try {
      writeTextAtomic(path, renderPageHtml(page, options));
    } catch (error) {
      throw new OutputError(`Could not write HTML page: ${path}`, error);
    }
    paths.push(path);
  }
  return { format: "html", paths };
}
