// src/index.ts — Library API
// Two entry points: analyze() and render()

import { resolve } from "node:path";
import type { OutputFormat, ResolvedConfig, UnifiedAnalysisJson, Warning } from "./types.js";
import { runPipeline } from "./pipeline.js";
import type { PipelineResult } from "./pipeline.js";
import { DEFAULT_CLUSTER_OPTIONS } from "./clustering.js";
import { DEFAULT_ORGANIZER_OPTIONS } from "./organizer.js";
import { renderOutputs } from "./diagram/render.js";
import type { RenderedFile, RenderOptions } from "./diagram/render.js";

export type { PipelineResult } from "./pipeline.js";
export type { RenderedFile, RenderOptions } from "./diagram/render.js";

// Re-export all public types
export type {
  Warning,
  ResolvedConfig,
  OutputFormat,
  DiagramFormat,
  ClusterOptions,
  OrganizerOptions,
  Language,
  SymbolKind,
  SymbolNode,
  CallEdge,
  SourceCodeReference,
  Relation,
  MethodEntry,
  FileMethodGroup,
  Component,
  AnalysisInsights,
  SubAnalysis,
  ComponentJson,
  AnalysisMetadata,
  UnifiedAnalysisJson,
  ExclusionReason,
  NotAnalyzedFile,
  FileCoverageSummary,
  FileCoverageReport,
} from "./types.js";

export {
  ENGINE_VERSION,
  UNCLASSIFIED_COMPONENT,
  FileNotFoundError,
  GraphError,
  AnalysisParseError,
  RenderError,
} from "./types.js";
export { CallGraph, buildCallGraph, buildLanguageGraphs } from "./call-graph.js";
export { ClusterResult, clusterGraph, clusterLanguages, toClusterString, buildClusterString } from "./clustering.js";
export { organize, sanitize, hashComponentId } from "./organizer.js";
export { buildUnifiedAnalysis, parseUnifiedAnalysis, buildIdToNameMap } from "./analysis-json.js";
export { FileCoverage } from "./file-coverage.js";
export { ChangeSet, detectChanges } from "./change-detector.js";
export { generateMermaid } from "./diagram/mermaid.js";
export { generateMarkdown } from "./diagram/markdown.js";
export { generateHtml, generateCytoscapeData } from "./diagram/html.js";

export type AnalyzeOptions = Partial<Omit<ResolvedConfig, "clustering" | "organizer">> & {
  repoDir: string;
  clustering?: Partial<ResolvedConfig["clustering"]>;
  organizer?: Partial<ResolvedConfig["organizer"]>;
};

const DEFAULTS: Omit<ResolvedConfig, "repoDir"> = {
  exclude: [],
  includeTests: false,
  output: { format: "json", dir: ".clustermap" },
  clustering: DEFAULT_CLUSTER_OPTIONS,
  organizer: DEFAULT_ORGANIZER_OPTIONS,
  links: { branch: "main" },
  verbose: false,
};

/**
 * Analyze a repository and produce its unified analysis and coverage report.
 * Pure computation plus file reads; nothing is written.
 */
export async function analyze(options: AnalyzeOptions): Promise<PipelineResult> {
  const config: ResolvedConfig = {
    ...DEFAULTS,
    ...options,
    repoDir: resolve(options.repoDir),
    output: { ...DEFAULTS.output, ...options.output },
    clustering: { ...DEFAULTS.clustering, ...options.clustering },
    organizer: { ...DEFAULTS.organizer, ...options.organizer },
    links: { ...DEFAULTS.links, ...options.links },
  };
  return runPipeline(config);
}

/**
 * Render a unified analysis into the files of `format`.
 */
export function render(
  analysis: UnifiedAnalysisJson,
  format: OutputFormat,
  options: RenderOptions = {},
  warnings: Warning[] = [],
): RenderedFile[] {
  return renderOutputs(analysis, format, options, warnings);
}
