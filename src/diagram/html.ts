// src/diagram/html.ts — HTML page with an interactive Cytoscape graph

import type { AnalysisInsights, Warning } from "../types.js";
import { sanitize } from "../organizer.js";
import { renderHtmlPage } from "../templates/html-page.js";
import { linksFor, referenceLabel, sourceUrl } from "./markdown.js";
import type { SourceLinkOptions } from "./markdown.js";

export interface CytoscapeNode {
  data: {
    id: string;
    label: string;
    description: string;
    hasLink: boolean;
    linkUrl?: string;
  };
}

export interface CytoscapeEdge {
  data: {
    id: string;
    source: string;
    target: string;
    label: string;
  };
}

export interface CytoscapeData {
  elements: Array<CytoscapeNode | CytoscapeEdge>;
}

export interface HtmlOptions extends SourceLinkOptions {
  title?: string;
  /** componentId → output file base name of the linked component. */
  links?: Map<string, string>;
}

export function generateCytoscapeData(
  analysis: AnalysisInsights,
  links: Map<string, string> = new Map(),
  warnings: Warning[] = [],
): CytoscapeData {
  const elements: Array<CytoscapeNode | CytoscapeEdge> = [];
  const nodeIds = new Set<string>();

  for (const component of analysis.components) {
    const id = sanitize(component.name);
    nodeIds.add(id);
    const target = links.get(component.componentId);
    const node: CytoscapeNode = {
      data: { id, label: component.name, description: component.description, hasLink: target !== undefined },
    };
    if (target !== undefined) node.data.linkUrl = `./${target}.html`;
    elements.push(node);
  }

  let edgeCount = 0;
  for (const relation of analysis.componentsRelations) {
    const source = sanitize(relation.srcName);
    const target = sanitize(relation.dstName);
    if (!nodeIds.has(source) || !nodeIds.has(target)) {
      warnings.push({
        level: "warn",
        module: "diagram",
        message: `Skipping relation "${relation.srcName}" → "${relation.dstName}": unknown component`,
      });
      continue;
    }
    elements.push({ data: { id: `edge_${edgeCount}`, source, target, label: relation.relation } });
    edgeCount++;
  }

  return { elements };
}

export function generateHtml(
  analysis: AnalysisInsights,
  options: HtmlOptions = {},
  warnings: Warning[] = [],
): string {
  const links = linksFor(analysis, options.links);
  const data = generateCytoscapeData(analysis, links, warnings);

  const componentsHtml = analysis.components.map((component) => {
    const id = sanitize(component.name);
    const target = links.get(component.componentId);
    const expand = target === undefined ? "" : ` <a href="./${escapeHtml(target)}.html">[Expand]</a>`;

    let references: string;
    if (component.keyEntities.length === 0) {
      references = "<h4>Related Classes/Methods:</h4><p><em>None</em></p>";
    } else {
      const items = component.keyEntities.map((ref) => {
        const code = `<code>${escapeHtml(referenceLabel(ref).replace(/`/g, ""))}</code>`;
        const url = sourceUrl(ref, options);
        return url
          ? `<li><a href="${escapeHtml(url)}" target="_blank" rel="noopener noreferrer">${code}</a></li>`
          : `<li>${code}</li>`;
      });
      references = `<h4>Related Classes/Methods:</h4><ul class="references">${items.join("")}</ul>`;
    }

    return [
      `    <div class="component">`,
      `      <h3 id="${id}">${escapeHtml(component.name)}${expand}</h3>`,
      `      <p>${escapeHtml(component.description)}</p>`,
      `      ${references}`,
      `    </div>`,
    ].join("\n");
  });

  return renderHtmlPage({
    title: escapeHtml(options.title ?? "Component diagram"),
    descriptionHtml: escapeHtml(analysis.description),
    componentsHtml: componentsHtml.join("\n"),
    cytoscapeJson: embedJson(data),
  });
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/** JSON safe to place inside a <script> element. */
export function embedJson(value: unknown): string {
  return JSON.stringify(value, null, 2).replace(/<\//g, "<\\/");
}
