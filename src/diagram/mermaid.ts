// src/diagram/mermaid.ts — Mermaid component diagram
// One node per component, one labeled edge per relation, optional click
// links to the files of expanded components.

import type { AnalysisInsights, Warning } from "../types.js";
import { RenderError } from "../types.js";
import { sanitize } from "../organizer.js";

export interface MermaidOptions {
  /** Emit click links for linked components. */
  linkFiles?: boolean;
  /** componentId → output file base name of the linked component. */
  links?: Map<string, string>;
  /** Extension of linked files, with the dot. */
  linkExtension?: string;
}

export function generateMermaid(
  analysis: AnalysisInsights,
  options: MermaidOptions = {},
  warnings: Warning[] = [],
): string {
  const { linkFiles = false, links, linkExtension = ".md" } = options;
  if (linkFiles && (!links || links.size === 0)) {
    throw new RenderError("linkFiles requires at least one linked component");
  }

  const lines = ["graph LR"];
  const nodeIds = new Set<string>();
  for (const component of analysis.components) {
    const id = sanitize(component.name);
    nodeIds.add(id);
    lines.push(`    ${id}["${mermaidLabel(component.name)}"]`);
  }

  for (const relation of analysis.componentsRelations) {
    const src = sanitize(relation.srcName);
    const dst = sanitize(relation.dstName);
    if (!nodeIds.has(src) || !nodeIds.has(dst)) {
      warnings.push({
        level: "warn",
        module: "diagram",
        message: `Skipping relation "${relation.srcName}" → "${relation.dstName}": unknown component`,
      });
      continue;
    }
    lines.push(`    ${src} -- "${mermaidLabel(relation.relation)}" --> ${dst}`);
  }

  if (linkFiles && links) {
    for (const component of analysis.components) {
      const target = links.get(component.componentId);
      if (target === undefined) continue;
      lines.push(`    click ${sanitize(component.name)} href "./${target}${linkExtension}" "Details"`);
    }
  }

  return lines.join("\n");
}

function mermaidLabel(text: string): string {
  return text.replace(/"/g, "#quot;");
}
