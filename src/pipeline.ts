// src/pipeline.ts — Pipeline Orchestrator
// discover → parse → call graph → clustering → organizer → expansion →
// coverage → unified analysis document

import { basename, relative } from "node:path";
import type {
  AnalysisInsights,
  FileCoverageReport,
  Language,
  ParsedFile,
  ResolvedConfig,
  SubAnalysis,
  UnifiedAnalysisJson,
  Warning,
} from "./types.js";
import { discoverFiles, isTestPath, listRepositoryFiles, toPosix } from "./file-discovery.js";
import { parseFile } from "./ast-parser.js";
import { buildCallGraph, splitByLanguage } from "./call-graph.js";
import type { CallGraph } from "./call-graph.js";
import { clusterLanguages } from "./clustering.js";
import type { ClusterResult } from "./clustering.js";
import { organize } from "./organizer.js";
import { expandAnalysis } from "./expansion.js";
import { FileCoverage } from "./file-coverage.js";
import { detectChanges } from "./change-detector.js";
import { buildUnifiedAnalysis } from "./analysis-json.js";

/** Verbose logger — writes to stderr only when verbose is enabled. */
export function vlog(verbose: boolean, msg: string): void {
  if (verbose) process.stderr.write(`[INFO] ${msg}\n`);
}

export interface PipelineResult {
  analysis: UnifiedAnalysisJson;
  insights: AnalysisInsights;
  subAnalyses: Map<string, SubAnalysis>;
  coverage: FileCoverageReport;
  warnings: Warning[];
  graph: CallGraph;
  graphs: Map<Language, CallGraph>;
  clusterResults: Map<Language, ClusterResult>;
  /** Repo-relative source files that were parsed. */
  analyzedFiles: string[];
}

/**
 * Run the full analysis for one repository.
 */
export async function runPipeline(config: ResolvedConfig): Promise<PipelineResult> {
  const warnings: Warning[] = [];
  const startTime = performance.now();
  const verbose = config.verbose;
  const repoDir = config.repoDir;
  const repoName = basename(repoDir);

  vlog(verbose, `Analyzing ${repoName}...`);
  const discovered = discoverFiles(repoDir, config.exclude, warnings).filter(
    (f) => config.includeTests || !isTestPath(toPosix(relative(repoDir, f))),
  );
  vlog(verbose, `  Files discovered: ${discovered.length}`);

  const parsed: ParsedFile[] = [];
  for (const file of discovered) {
    try {
      parsed.push(parseFile(file, repoDir, warnings));
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      warnings.push({
        level: "error",
        module: "pipeline",
        message: `Failed to parse: ${msg}`,
        file: toPosix(relative(repoDir, file)),
      });
    }
  }
  const analyzedFiles = parsed.map((p) => p.relativePath).sort();

  const graph = buildCallGraph(parsed, warnings);
  const graphs = splitByLanguage(graph);
  vlog(verbose, `  Call graph: ${graph.nodes.size} symbols, ${graph.edges.length} calls`);

  const clusterResults = clusterLanguages(graphs, config.clustering);
  for (const [language, result] of clusterResults) {
    vlog(verbose, `  Clusters (${language}): ${result.clusters.size} via ${result.strategy}`);
  }

  const results = [...clusterResults.values()];
  const insights = organize(
    graph,
    results,
    analyzedFiles,
    { ...config.organizer, scope: repoName },
    warnings,
  );
  vlog(verbose, `  Components: ${insights.components.length}, relations: ${insights.componentsRelations.length}`);

  const expansion = expandAnalysis(
    insights,
    graph,
    results,
    { clustering: config.clustering, organizer: config.organizer },
    warnings,
  );
  vlog(verbose, `  Expanded components: ${expansion.subAnalyses.size}`);

  const coverage = buildCoverage(config, analyzedFiles, warnings);
  vlog(verbose, `  Coverage: ${coverage.summary.analyzed}/${coverage.summary.totalFiles} files analyzed`);

  const analysis = buildUnifiedAnalysis(
    insights,
    expansion.expandable,
    repoName,
    expansion.subAnalyses,
    coverage.summary,
    warnings,
  );

  const totalMs = Math.round(performance.now() - startTime);
  vlog(verbose, `Total analysis time: ${totalMs}ms`);

  return {
    analysis,
    insights,
    subAnalyses: expansion.subAnalyses,
    coverage,
    warnings,
    graph,
    graphs,
    clusterResults,
    analyzedFiles,
  };
}

function buildCoverage(
  config: ResolvedConfig,
  analyzedFiles: string[],
  warnings: Warning[],
): FileCoverageReport {
  const allFiles = listRepositoryFiles(config.repoDir, warnings);
  const coverage = new FileCoverage(config.repoDir, config.exclude, config.includeTests);
  if (!config.since) return coverage.build(allFiles, analyzedFiles);

  const existing = FileCoverage.load(config.output.dir, warnings);
  if (!existing) return coverage.build(allFiles, analyzedFiles);

  const changes = detectChanges(config.repoDir, config.since, "HEAD", warnings);
  vlog(
    config.verbose,
    `  Changes since ${config.since}: ${changes.changes.length} (${changes.renames.size} renames, ${changes.deletedFiles.length} deletions)`,
  );
  return coverage.update(existing, allFiles, analyzedFiles, changes);
}
