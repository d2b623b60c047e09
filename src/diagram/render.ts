// src/diagram/render.ts — Render a unified analysis into output files
// The root becomes `overview.<ext>`; every expanded component gets its own
// file named after it, linked from its parent's diagram.

import type {
  AnalysisInsights,
  ComponentJson,
  DiagramFormat,
  OutputFormat,
  UnifiedAnalysisJson,
  Warning,
} from "../types.js";
import { sanitize } from "../organizer.js";
import { generateMermaid } from "./mermaid.js";
import { generateMarkdown, linksFor } from "./markdown.js";
import { generateHtml } from "./html.js";

export interface RenderedFile {
  filename: string;
  content: string;
}

export interface RenderOptions {
  repoUrl?: string;
  branch?: string;
}

export const OVERVIEW_NAME = "overview";
const RESERVED_NAMES = [OVERVIEW_NAME, "analysis", "file_coverage"];

const EXTENSIONS: Record<DiagramFormat, string> = {
  markdown: ".md",
  html: ".html",
  mermaid: ".mmd",
};

interface Page {
  base: string;
  title: string;
  analysis: AnalysisInsights;
}

/**
 * Output file base name for every expanded component: its sanitized name,
 * suffixed with an id prefix when that name is already taken.
 */
export function assignOutputNames(unified: UnifiedAnalysisJson): Map<string, string> {
  const names = new Map<string, string>();
  const taken = new Set(RESERVED_NAMES);
  const visit = (components: ComponentJson[]): void => {
    for (const component of components) {
      if (!component.components || names.has(component.componentId)) continue;
      let base = sanitize(component.name);
      if (taken.has(base)) base = `${base}_${component.componentId.slice(0, 6)}`;
      taken.add(base);
      names.set(component.componentId, base);
      visit(component.components);
    }
  };
  visit(unified.components);
  return names;
}

function collectPages(unified: UnifiedAnalysisJson, names: Map<string, string>): Page[] {
  const pages: Page[] = [{
    base: OVERVIEW_NAME,
    title: unified.metadata.repoName,
    analysis: {
      description: unified.description,
      components: unified.components,
      componentsRelations: unified.componentsRelations,
    },
  }];
  const visit = (components: ComponentJson[]): void => {
    for (const component of components) {
      const base = names.get(component.componentId);
      if (!component.components || base === undefined) continue;
      if (pages.some((p) => p.base === base)) continue;
      pages.push({
        base,
        title: `${unified.metadata.repoName} — ${component.name}`,
        analysis: {
          description: component.description,
          components: component.components,
          componentsRelations: component.componentsRelations ?? [],
        },
      });
      visit(component.components);
    }
  };
  visit(unified.components);
  return pages;
}

/**
 * Render every page of the analysis in `format`. `json` renders nothing:
 * the unified document itself is the JSON output.
 */
export function renderOutputs(
  unified: UnifiedAnalysisJson,
  format: OutputFormat,
  options: RenderOptions = {},
  warnings: Warning[] = [],
): RenderedFile[] {
  if (format === "json") return [];
  const names = assignOutputNames(unified);
  return collectPages(unified, names).map((page) => ({
    filename: page.base + EXTENSIONS[format],
    content: renderPage(page, format, names, options, warnings),
  }));
}

function renderPage(
  page: Page,
  format: DiagramFormat,
  names: Map<string, string>,
  options: RenderOptions,
  warnings: Warning[],
): string {
  switch (format) {
    case "markdown":
      return generateMarkdown(page.analysis, { ...options, links: names }, warnings);
    case "html":
      return generateHtml(page.analysis, { ...options, title: page.title, links: names }, warnings);
    case "mermaid": {
      const links = linksFor(page.analysis, names);
      return generateMermaid(
        page.analysis,
        { linkFiles: links.size > 0, links, linkExtension: EXTENSIONS.mermaid },
        warnings,
      ) + "\n";
    }
  }
}
