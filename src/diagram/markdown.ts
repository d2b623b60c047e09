// src/diagram/markdown.ts — Markdown component document

import type { AnalysisInsights, SourceCodeReference, Warning } from "../types.js";
import { generateMermaid } from "./mermaid.js";

export interface SourceLinkOptions {
  repoUrl?: string;
  branch?: string;
}

export interface MarkdownOptions extends SourceLinkOptions {
  /** componentId → output file base name of the linked component. */
  links?: Map<string, string>;
}

export function generateMarkdown(
  analysis: AnalysisInsights,
  options: MarkdownOptions = {},
  warnings: Warning[] = [],
): string {
  const links = linksFor(analysis, options.links);
  const mermaid = generateMermaid(
    analysis,
    { linkFiles: links.size > 0, links, linkExtension: ".md" },
    warnings,
  );

  const lines = ["```mermaid", mermaid, "```", "", "## Details", "", analysis.description, ""];
  for (const component of analysis.components) {
    const target = links.get(component.componentId);
    lines.push(target === undefined ? `### ${component.name}` : `### ${component.name} [Expand](./${target}.md)`);
    lines.push("", component.description, "");
    if (component.keyEntities.length === 0) {
      lines.push("**Related Classes/Methods**: _None_", "");
      continue;
    }
    lines.push("**Related Classes/Methods**:", "");
    for (const ref of component.keyEntities) {
      const label = referenceLabel(ref);
      const url = sourceUrl(ref, options);
      lines.push(url ? `- [${label}](${url})` : `- ${label}`);
    }
    lines.push("");
  }
  return lines.join("\n");
}

/** The subset of `links` pointing at components of this analysis. */
export function linksFor(
  analysis: AnalysisInsights,
  links: Map<string, string> = new Map(),
): Map<string, string> {
  const ids = new Set(analysis.components.map((c) => c.componentId));
  return new Map([...links].filter(([id]) => ids.has(id)));
}

function hasLineRange(ref: SourceCodeReference): boolean {
  return ref.referenceStartLine !== undefined &&
    ref.referenceEndLine !== undefined &&
    ref.referenceStartLine >= 1 &&
    ref.referenceEndLine >= ref.referenceStartLine;
}

/** `` `qualified.name`:12-30 `` */
export function referenceLabel(ref: SourceCodeReference): string {
  return hasLineRange(ref)
    ? `\`${ref.qualifiedName}\`:${ref.referenceStartLine}-${ref.referenceEndLine}`
    : `\`${ref.qualifiedName}\``;
}

/**
 * `<repoUrl>/blob/<branch>/<file>#L<start>-L<end>`, or undefined when the
 * reference lacks a file or line range, or no repo URL is configured.
 */
export function sourceUrl(ref: SourceCodeReference, options: SourceLinkOptions): string | undefined {
  if (!options.repoUrl || !ref.referenceFile || !hasLineRange(ref)) return undefined;
  const base = options.repoUrl.replace(/\/+$/, "");
  const file = ref.referenceFile.replace(/^\.?\//, "");
  return `${base}/blob/${options.branch ?? "main"}/${file}#L${ref.referenceStartLine}-L${ref.referenceEndLine}`;
}
