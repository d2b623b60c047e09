// src/analysis-json.ts — Unified analysis document
// Nests sub-analyses under the components they expand, adds run metadata,
// and reads such documents back (including ones written without ids).

import type {
  AnalysisInsights,
  Component,
  ComponentJson,
  FileCoverageSummary,
  FileMethodGroup,
  MethodEntry,
  Relation,
  SourceCodeReference,
  SubAnalysis,
  SymbolKind,
  UnifiedAnalysisJson,
  Warning,
} from "./types.js";
import { AnalysisParseError, ENGINE_VERSION, ROOT_PARENT_ID } from "./types.js";
import { assignComponentIds } from "./organizer.js";

const EMPTY_SUMMARY: FileCoverageSummary = {
  totalFiles: 0,
  analyzed: 0,
  notAnalyzed: 0,
  notAnalyzedByReason: {},
};

// ─── Building ────────────────────────────────────────────────────────────────

export function buildUnifiedAnalysis(
  analysis: AnalysisInsights,
  expandable: Component[],
  repoName: string,
  subAnalyses: Map<string, SubAnalysis> = new Map(),
  coverageSummary: FileCoverageSummary = EMPTY_SUMMARY,
  warnings: Warning[] = [],
): UnifiedAnalysisJson {
  const processed = new Set<string>();
  return {
    metadata: {
      engineVersion: ENGINE_VERSION,
      generatedAt: new Date().toISOString(),
      repoName,
      depthLevel: computeDepthLevel(subAnalyses),
      fileCoverageSummary: coverageSummary,
    },
    description: analysis.description,
    components: analysis.components.map((c) =>
      toComponentJson(c, expandable, subAnalyses, processed, warnings),
    ),
    componentsRelations: analysis.componentsRelations.map(copyRelation),
  };
}

function toComponentJson(
  component: Component,
  expandable: Component[],
  subAnalyses: Map<string, SubAnalysis>,
  processed: Set<string>,
  warnings: Warning[],
): ComponentJson {
  let canExpand = false;
  if (processed.has(component.componentId)) {
    warnings.push({
      level: "warn",
      module: "analysis-json",
      message: `Component ${component.name} (${component.componentId}) already processed — not expanded again`,
    });
  } else {
    processed.add(component.componentId);
    canExpand = expandable.some((c) => c.componentId === component.componentId);
  }

  const json: ComponentJson = {
    componentId: component.componentId,
    name: component.name,
    description: component.description,
    keyEntities: component.keyEntities,
    sourceClusterIds: component.sourceClusterIds,
    canExpand,
    fileMethods: component.fileMethods,
    assignedFiles: component.assignedFiles,
  };

  const sub = canExpand ? subAnalyses.get(component.componentId) : undefined;
  if (sub) {
    json.components = sub.analysis.components.map((c) =>
      toComponentJson(c, sub.expandable, subAnalyses, processed, warnings),
    );
    json.componentsRelations = sub.analysis.componentsRelations.map(copyRelation);
  }
  return json;
}

function copyRelation(r: Relation): Relation {
  return { relation: r.relation, srcName: r.srcName, dstName: r.dstName, srcId: r.srcId, dstId: r.dstId };
}

/**
 * 1 for a root-only analysis, otherwise 1 + the longest chain of nested
 * sub-analyses reachable from the root-level ones.
 */
export function computeDepthLevel(subAnalyses: Map<string, SubAnalysis>): number {
  if (subAnalyses.size === 0) return 1;

  const nested = new Set<string>();
  for (const [id, sub] of subAnalyses) {
    for (const c of sub.analysis.components) {
      if (c.componentId !== id) nested.add(c.componentId);
    }
  }

  const depthOf = (analysis: AnalysisInsights, visited: Set<string>): number => {
    let max = 1;
    for (const c of analysis.components) {
      const sub = subAnalyses.get(c.componentId);
      if (!sub || visited.has(c.componentId)) continue;
      visited.add(c.componentId);
      max = Math.max(max, 1 + depthOf(sub.analysis, visited));
      visited.delete(c.componentId);
    }
    return max;
  };

  let depth = 1;
  for (const [id, sub] of subAnalyses) {
    if (nested.has(id)) continue;
    depth = Math.max(depth, 1 + depthOf(sub.analysis, new Set([id])));
  }
  return depth;
}

export function buildIdToNameMap(
  root: AnalysisInsights,
  subAnalyses: Map<string, SubAnalysis>,
): Map<string, string> {
  const idToName = new Map<string, string>();
  for (const c of root.components) idToName.set(c.componentId, c.name);
  for (const sub of subAnalyses.values()) {
    for (const c of sub.analysis.components) idToName.set(c.componentId, c.name);
  }
  return idToName;
}

// ─── Parsing ─────────────────────────────────────────────────────────────────

export interface ParsedAnalysis {
  root: AnalysisInsights;
  subAnalyses: Map<string, SubAnalysis>;
}

/**
 * Read a unified analysis document. Throws AnalysisParseError naming the
 * offending field. Documents without component ids get them assigned.
 */
export function parseUnifiedAnalysis(data: unknown): ParsedAnalysis {
  const obj = expectRecord(data, "$");
  // Components keyed by id, or by name when the document carries no ids.
  const byKey = new Map<string, SubAnalysis>();
  const root = extractLevel(obj, "$", byKey);

  if (root.components.some((c) => c.componentId === "")) {
    const subAnalyses = new Map<string, SubAnalysis>();
    assignIdsRecursive(root, ROOT_PARENT_ID, byKey, subAnalyses);
    return { root, subAnalyses };
  }
  return { root, subAnalyses: byKey };
}

function assignIdsRecursive(
  analysis: AnalysisInsights,
  parentId: string,
  byName: Map<string, SubAnalysis>,
  subAnalyses: Map<string, SubAnalysis>,
): void {
  assignComponentIds(analysis, parentId);
  for (const c of analysis.components) {
    const sub = byName.get(c.name);
    if (!sub || subAnalyses.has(c.componentId)) continue;
    subAnalyses.set(c.componentId, sub);
    assignIdsRecursive(sub.analysis, c.componentId, byName, subAnalyses);
  }
}

function extractLevel(
  obj: Record<string, unknown>,
  path: string,
  byKey: Map<string, SubAnalysis>,
): AnalysisInsights {
  const description = expectString(obj.description, `${path}.description`);
  const rawComponents = expectArray(obj.components, `${path}.components`);
  const rawRelations = obj.componentsRelations === undefined
    ? []
    : expectArray(obj.componentsRelations, `${path}.componentsRelations`);

  const components: Component[] = [];
  rawComponents.forEach((raw, i) => {
    const cPath = `${path}.components[${i}]`;
    const c = expectRecord(raw, cPath);
    const component: Component = {
      componentId: optionalString(c.componentId, `${cPath}.componentId`) ?? "",
      name: expectString(c.name, `${cPath}.name`),
      description: expectString(c.description, `${cPath}.description`),
      keyEntities: optionalArray(c.keyEntities, `${cPath}.keyEntities`)
        .map((e, j) => parseReference(e, `${cPath}.keyEntities[${j}]`)),
      assignedFiles: optionalArray(c.assignedFiles, `${cPath}.assignedFiles`)
        .map((f, j) => expectString(f, `${cPath}.assignedFiles[${j}]`)),
      sourceClusterIds: optionalArray(c.sourceClusterIds, `${cPath}.sourceClusterIds`)
        .map((n, j) => expectNumber(n, `${cPath}.sourceClusterIds[${j}]`)),
      fileMethods: optionalArray(c.fileMethods, `${cPath}.fileMethods`)
        .map((g, j) => parseFileMethods(g, `${cPath}.fileMethods[${j}]`)),
    };
    components.push(component);

    if (c.components !== undefined) {
      const nested = extractLevel(c, cPath, byKey);
      const key = component.componentId || component.name;
      byKey.set(key, { analysis: nested, expandable: [] });
    }
  });

  // Children with nested components are this level's expandable set; record
  // them on the sub-analysis entries created while recursing.
  for (const component of components) {
    const sub = byKey.get(component.componentId || component.name);
    if (sub) {
      sub.expandable = sub.analysis.components.filter((child) =>
        byKey.has(child.componentId || child.name),
      );
    }
  }

  return {
    description,
    components,
    componentsRelations: rawRelations.map((r, i) => parseRelation(r, `${path}.componentsRelations[${i}]`)),
  };
}

function parseReference(raw: unknown, path: string): SourceCodeReference {
  const e = expectRecord(raw, path);
  const ref: SourceCodeReference = { qualifiedName: expectString(e.qualifiedName, `${path}.qualifiedName`) };
  const file = optionalString(e.referenceFile, `${path}.referenceFile`);
  const start = optionalNumber(e.referenceStartLine, `${path}.referenceStartLine`);
  const end = optionalNumber(e.referenceEndLine, `${path}.referenceEndLine`);
  if (file !== undefined) ref.referenceFile = file;
  if (start !== undefined) ref.referenceStartLine = start;
  if (end !== undefined) ref.referenceEndLine = end;
  return ref;
}

const SYMBOL_KINDS: readonly SymbolKind[] = ["function", "arrow", "class", "method", "constructor"];

function parseFileMethods(raw: unknown, path: string): FileMethodGroup {
  const g = expectRecord(raw, path);
  return {
    filePath: expectString(g.filePath, `${path}.filePath`),
    methods: optionalArray(g.methods, `${path}.methods`).map((m, i): MethodEntry => {
      const mPath = `${path}.methods[${i}]`;
      const method = expectRecord(m, mPath);
      const kind = SYMBOL_KINDS.find((k) => k === method.kind);
      if (!kind) throw new AnalysisParseError(`${mPath}.kind`, "unknown symbol kind");
      return {
        qualifiedName: expectString(method.qualifiedName, `${mPath}.qualifiedName`),
        kind,
        startLine: expectNumber(method.startLine, `${mPath}.startLine`),
        endLine: expectNumber(method.endLine, `${mPath}.endLine`),
      };
    }),
  };
}

function parseRelation(raw: unknown, path: string): Relation {
  const r = expectRecord(raw, path);
  return {
    relation: expectString(r.relation, `${path}.relation`),
    srcName: expectString(r.srcName, `${path}.srcName`),
    dstName: expectString(r.dstName, `${path}.dstName`),
    srcId: optionalString(r.srcId, `${path}.srcId`) ?? "",
    dstId: optionalString(r.dstId, `${path}.dstId`) ?? "",
  };
}

// ─── Field validation ────────────────────────────────────────────────────────

function expectRecord(value: unknown, path: string): Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new AnalysisParseError(path, "expected an object");
  }
  return Object.fromEntries(Object.entries(value));
}

function expectArray(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) throw new AnalysisParseError(path, "expected an array");
  return value;
}

function optionalArray(value: unknown, path: string): unknown[] {
  return value === undefined ? [] : expectArray(value, path);
}

function expectString(value: unknown, path: string): string {
  if (typeof value !== "string") throw new AnalysisParseError(path, "expected a string");
  return value;
}

function optionalString(value: unknown, path: string): string | undefined {
  return value === undefined || value === null ? undefined : expectString(value, path);
}

function expectNumber(value: unknown, path: string): number {
  if (typeof value !== "number" || Number.isNaN(value)) {
    throw new AnalysisParseError(path, "expected a number");
  }
  return value;
}

function optionalNumber(value: unknown, path: string): number | undefined {
  return value === undefined || value === null ? undefined : expectNumber(value, path);
}
