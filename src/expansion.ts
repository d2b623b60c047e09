// src/expansion.ts — Recursive component expansion
// A component large enough to hold several sub-components is re-clustered on
// its own subgraph and organized again, one level deeper.

import type { CallGraph } from "./call-graph.js";
import { clusterGraph } from "./clustering.js";
import type { ClusterResult } from "./clustering.js";
import { componentNodes, organize, DEFAULT_ORGANIZER_OPTIONS } from "./organizer.js";
import type {
  AnalysisInsights,
  ClusterOptions,
  Component,
  OrganizerOptions,
  SubAnalysis,
  Warning,
} from "./types.js";
import { UNCLASSIFIED_COMPONENT } from "./types.js";

export interface ExpansionOptions {
  clustering?: Partial<ClusterOptions>;
  organizer?: Partial<OrganizerOptions>;
}

export interface ExpansionResult {
  /** Root-level components that were expanded. */
  expandable: Component[];
  subAnalyses: Map<string, SubAnalysis>;
}

/**
 * Organize a component's subgraph. Returns null when the component is too
 * small or does not split into at least two sub-components.
 */
export function expandComponent(
  component: Component,
  graph: CallGraph,
  clusterResults: ClusterResult[],
  options: ExpansionOptions = {},
  warnings: Warning[] = [],
): { analysis: AnalysisInsights; graph: CallGraph; clusters: ClusterResult } | null {
  const { minExpandNodes } = { ...DEFAULT_ORGANIZER_OPTIONS, ...options.organizer };
  if (component.name === UNCLASSIFIED_COMPONENT) return null;

  const nodes = componentNodes(component, clusterResults);
  if (nodes.size < minExpandNodes) return null;

  const sub = graph.subgraph(nodes);
  const clusters = clusterGraph(sub, options.clustering);
  if (clusters.strategy !== "greedy_modularity") return null;

  const analysis = organize(
    sub,
    [clusters],
    component.assignedFiles,
    { ...options.organizer, parentId: component.componentId, scope: component.name },
    warnings,
  );
  const real = analysis.components.filter((c) => c.name !== UNCLASSIFIED_COMPONENT);
  if (real.length < 2) return null;
  return { analysis, graph: sub, clusters };
}

/**
 * Expand every eligible component of `root` down to `maxDepth` (root is
 * depth 1). Sub-analyses are keyed by component id.
 */
export function expandAnalysis(
  root: AnalysisInsights,
  graph: CallGraph,
  clusterResults: ClusterResult[],
  options: ExpansionOptions = {},
  warnings: Warning[] = [],
): ExpansionResult {
  const { maxDepth } = { ...DEFAULT_ORGANIZER_OPTIONS, ...options.organizer };
  const subAnalyses = new Map<string, SubAnalysis>();
  const visited = new Set<string>();

  const expandLevel = (
    analysis: AnalysisInsights,
    levelGraph: CallGraph,
    levelClusters: ClusterResult[],
    depth: number,
  ): Component[] => {
    if (depth >= maxDepth) return [];
    const expanded: Component[] = [];
    for (const component of analysis.components) {
      if (visited.has(component.componentId)) {
        warnings.push({
          level: "warn",
          module: "expansion",
          message: `Component ${component.name} (${component.componentId}) already expanded — skipped`,
        });
        continue;
      }
      const result = expandComponent(component, levelGraph, levelClusters, options, warnings);
      if (!result) continue;
      visited.add(component.componentId);
      const children = expandLevel(result.analysis, result.graph, [result.clusters], depth + 1);
      subAnalyses.set(component.componentId, { analysis: result.analysis, expandable: children });
      expanded.push(component);
    }
    return expanded;
  };

  const expandable = expandLevel(root, graph, clusterResults, 1);
  return { expandable, subAnalyses };
}
