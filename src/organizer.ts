// src/organizer.ts — File/Component Organizer
// Turns clusters into named components, assigns every analyzed file to the
// components it belongs to and keeps assignments and ids consistent.

import { createHash } from "node:crypto";
import type { CallGraph } from "./call-graph.js";
import { moduleName } from "./call-graph.js";
import type { ClusterResult } from "./clustering.js";
import type {
  AnalysisInsights,
  Component,
  FileMethodGroup,
  OrganizerOptions,
  Relation,
  SourceCodeReference,
  Warning,
} from "./types.js";
import { ROOT_PARENT_ID, UNCLASSIFIED_COMPONENT } from "./types.js";

export const DEFAULT_ORGANIZER_OPTIONS: OrganizerOptions = {
  maxKeyEntities: 5,
  minExpandNodes: 6,
  maxDepth: 2,
};

export interface OrganizeOptions extends Partial<OrganizerOptions> {
  /** Id of the component being expanded, or `root`. */
  parentId?: string;
  /** Label used in the analysis description. */
  scope?: string;
}

// ─── Identifiers ─────────────────────────────────────────────────────────────

/** Replace every run of non-word characters with `_`. */
export function sanitize(name: string): string {
  return name.replace(/\W+/g, "_");
}

export function hashComponentId(parentId: string, name: string, siblingIndex = 0): string {
  return createHash("sha256")
    .update(`${parentId}:${name}:${siblingIndex}`)
    .digest("hex")
    .slice(0, 16);
}

/**
 * Give every component a deterministic id and resolve relation endpoints
 * by component name.
 */
export function assignComponentIds(
  analysis: AnalysisInsights,
  parentId: string = ROOT_PARENT_ID,
  warnings: Warning[] = [],
): void {
  const seen = new Map<string, number>();
  const nameToId = new Map<string, string>();
  for (const component of analysis.components) {
    const siblingIndex = seen.get(component.name) ?? 0;
    seen.set(component.name, siblingIndex + 1);
    component.componentId = hashComponentId(parentId, component.name, siblingIndex);
    if (!nameToId.has(component.name)) nameToId.set(component.name, component.componentId);
  }

  for (const relation of analysis.componentsRelations) {
    const srcId = nameToId.get(relation.srcName);
    const dstId = nameToId.get(relation.dstName);
    if (srcId === undefined || dstId === undefined) {
      warnings.push({
        level: "warn",
        module: "organizer",
        message: `Relation "${relation.srcName}" → "${relation.dstName}" references an unknown component`,
      });
    }
    relation.srcId = srcId ?? "";
    relation.dstId = dstId ?? "";
  }
}

// ─── Component Derivation ────────────────────────────────────────────────────

interface ClusterGroup {
  key: string;
  location: string;
  clusterIds: number[];
  nodes: string[];
}

/**
 * Derive components from clusters. Clusters are grouped by the top-level
 * directory (below the common prefix) most of their nodes live in; when that
 * yields a single group they are grouped by their dominant file instead.
 */
export function deriveComponents(
  graph: CallGraph,
  clusterResults: Iterable<ClusterResult>,
  options: Partial<OrganizerOptions> = {},
): Component[] {
  const { maxKeyEntities } = { ...DEFAULT_ORGANIZER_OPTIONS, ...options };

  const clusters: Array<{ id: number; nodes: string[] }> = [];
  for (const result of clusterResults) {
    for (const id of result.getClusterIds()) {
      const nodes = [...result.getNodesForCluster(id)].filter((n) => graph.hasNode(n)).sort();
      if (nodes.length > 0) clusters.push({ id, nodes });
    }
  }
  if (clusters.length === 0) return [];
  clusters.sort((a, b) => a.id - b.id);

  const fileOf = (node: string): string => graph.nodes.get(node)?.filePath ?? "";
  const prefix = commonDirectory(clusters.flatMap((c) => c.nodes.map(fileOf)));
  const strip = (file: string): string => (prefix ? file.slice(prefix.length + 1) : file);

  const byDirectory = groupClusters(clusters, (node) => {
    const parts = strip(fileOf(node)).split("/");
    return parts.length > 1 ? parts[0] : ".";
  });
  let groups = byDirectory;
  let fileMode = false;
  if (byDirectory.size === 1) {
    const byFile = groupClusters(clusters, (node) => strip(fileOf(node)));
    if (byFile.size > 1) {
      groups = byFile;
      fileMode = true;
    }
  }

  const entries: ClusterGroup[] = [...groups].map(([key, value]) => ({
    key,
    location: joinPath(prefix, fileMode || key !== "." ? key : ""),
    clusterIds: value.clusterIds,
    nodes: value.nodes,
  }));
  const names = componentNames(entries.map((e) => (fileMode ? e.key.replace(/\.[^./]+$/, "") : e.key)));

  const components = entries.map((group, i): Component => {
    const keyEntities = pickKeyEntities(graph, group.nodes, maxKeyEntities);
    const files = [...new Set(group.nodes.map(fileOf))].sort();
    return {
      componentId: "",
      name: names[i],
      description: describe(group.location, files.length, group.nodes.length, keyEntities),
      keyEntities,
      assignedFiles: [],
      sourceClusterIds: group.clusterIds,
      fileMethods: [],
    };
  });

  const sizes = new Map(entries.map((e, i) => [names[i], e.nodes.length]));
  return components.sort(
    (a, b) => (sizes.get(b.name) ?? 0) - (sizes.get(a.name) ?? 0) || compare(a.name, b.name),
  );
}

function groupClusters(
  clusters: Array<{ id: number; nodes: string[] }>,
  keyOf: (node: string) => string,
): Map<string, { clusterIds: number[]; nodes: string[] }> {
  const groups = new Map<string, { clusterIds: number[]; nodes: string[] }>();
  for (const cluster of clusters) {
    const counts = new Map<string, number>();
    for (const node of cluster.nodes) {
      const key = keyOf(node);
      counts.set(key, (counts.get(key) ?? 0) + 1);
    }
    let dominant = "";
    let best = -1;
    for (const [key, count] of [...counts].sort((a, b) => compare(a[0], b[0]))) {
      if (count > best) {
        dominant = key;
        best = count;
      }
    }
    const group = groups.get(dominant) ?? { clusterIds: [], nodes: [] };
    group.clusterIds.push(cluster.id);
    group.nodes.push(...cluster.nodes);
    groups.set(dominant, group);
  }
  for (const group of groups.values()) group.nodes.sort();
  return groups;
}

/** Longest directory shared by every file, "" when none. */
export function commonDirectory(files: string[]): string {
  if (files.length === 0) return "";
  let common = files[0].split("/").slice(0, -1);
  for (const file of files.slice(1)) {
    const dirs = file.split("/").slice(0, -1);
    let i = 0;
    while (i < common.length && i < dirs.length && common[i] === dirs[i]) i++;
    common = common.slice(0, i);
  }
  return common.join("/");
}

function joinPath(prefix: string, rest: string): string {
  if (!prefix) return rest || ".";
  return rest ? `${prefix}/${rest}` : prefix;
}

/** `user-service` / `userService` / `user_service` → `User Service` */
export function titleCase(segment: string): string {
  if (segment === ".") return "Root";
  return segment
    .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
    .split(/[-_.\s]+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

function componentNames(keys: string[]): string[] {
  const lastSegment = (key: string): string => key.split("/").pop() ?? key;
  const names = keys.map((key) => titleCase(lastSegment(key)));

  const qualify = (current: string[], rename: (i: number) => string): string[] => {
    const counts = new Map<string, number>();
    for (const n of current) counts.set(n, (counts.get(n) ?? 0) + 1);
    return current.map((n, i) => ((counts.get(n) ?? 0) > 1 ? rename(i) : n));
  };

  // Colliding names take their parent segment, then a counter.
  const withParent = qualify(names, (i) => {
    const parts = keys[i].split("/");
    return parts.length > 1 ? titleCase(parts.slice(-2).join(" ")) : names[i];
  });
  const counts = new Map<string, number>();
  for (const n of withParent) counts.set(n, (counts.get(n) ?? 0) + 1);
  const isUnique = (n: string): boolean => counts.get(n) === 1 && n !== UNCLASSIFIED_COMPONENT;

  // Names that are already unique win over counter-suffixed ones.
  const used = new Set([UNCLASSIFIED_COMPONENT, ...withParent.filter(isUnique)]);
  return withParent.map((name) => {
    if (isUnique(name)) return name;
    let candidate = name;
    for (let n = 2; used.has(candidate); n++) candidate = `${name} ${n}`;
    used.add(candidate);
    return candidate;
  });
}

function pickKeyEntities(graph: CallGraph, nodes: string[], limit: number): SourceCodeReference[] {
  return [...nodes]
    .sort((a, b) => graph.degree(b) - graph.degree(a) || compare(a, b))
    .slice(0, limit)
    .flatMap((name) => {
      const node = graph.nodes.get(name);
      if (!node) return [];
      return [{
        qualifiedName: name,
        referenceFile: node.filePath,
        referenceStartLine: node.startLine,
        referenceEndLine: node.endLine,
      }];
    });
}

function describe(
  location: string,
  fileCount: number,
  nodeCount: number,
  keyEntities: SourceCodeReference[],
): string {
  const plural = (n: number, word: string): string => `${n} ${word}${n === 1 ? "" : "s"}`;
  const entry = keyEntities.map((e) => shortName(e)).join(", ");
  return `Code in ${location} (${plural(fileCount, "file")}, ${plural(nodeCount, "symbol")}).` +
    (entry ? ` Main entities: ${entry}.` : "");
}

function shortName(ref: SourceCodeReference): string {
  if (!ref.referenceFile) return ref.qualifiedName;
  const mod = moduleName(ref.referenceFile);
  return ref.qualifiedName.startsWith(`${mod}.`) ? ref.qualifiedName.slice(mod.length + 1) : ref.qualifiedName;
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

// ─── File Assignment ─────────────────────────────────────────────────────────

export function buildFileClusterMapping(
  clusterResults: Iterable<ClusterResult>,
): Map<string, Set<number>> {
  const mapping = new Map<string, Set<number>>();
  for (const result of clusterResults) {
    for (const [file, ids] of result.fileToClusters) {
      const merged = mapping.get(file) ?? new Set<number>();
      for (const id of ids) merged.add(id);
      mapping.set(file, merged);
    }
  }
  return mapping;
}

/**
 * Components a file belongs to: it holds one of their key entities, or
 * shares a cluster with them.
 */
export function matchFileToComponents(
  file: string,
  components: Component[],
  fileToClusters: Map<string, Set<number>>,
): Component[] {
  const normalized = file.split("\\").join("/").replace(/^\.\//, "");
  const clusters = fileToClusters.get(normalized) ?? new Set<number>();
  return components.filter((component) => {
    if (component.name === UNCLASSIFIED_COMPONENT) return false;
    const byEntity = component.keyEntities.some(
      (e) => e.referenceFile !== undefined &&
        (normalized.endsWith(e.referenceFile) || normalized.includes(e.referenceFile)),
    );
    return byEntity || component.sourceClusterIds.some((id) => clusters.has(id));
  });
}

export function assignFilesToComponents(
  files: string[],
  analysis: AnalysisInsights,
  fileToClusters: Map<string, Set<number>>,
): void {
  const unmatched: string[] = [];
  for (const file of files) {
    const matches = matchFileToComponents(file, analysis.components, fileToClusters);
    if (matches.length === 0) unmatched.push(file);
    for (const component of matches) component.assignedFiles.push(file);
  }
  if (unmatched.length === 0) return;

  let unclassified = analysis.components.find((c) => c.name === UNCLASSIFIED_COMPONENT);
  if (!unclassified) {
    unclassified = {
      componentId: "",
      name: UNCLASSIFIED_COMPONENT,
      description: "Files that no call-graph cluster reaches.",
      keyEntities: [],
      assignedFiles: [],
      sourceClusterIds: [],
      fileMethods: [],
    };
    analysis.components.push(unclassified);
  }
  unclassified.assignedFiles.push(...unmatched);
}

export function ensureUniqueFileAssignments(analysis: AnalysisInsights): void {
  for (const component of analysis.components) {
    component.assignedFiles = [...new Set(component.assignedFiles)];
  }
}

/**
 * A qualified name stays a key entity of one component only, preferring the
 * component that owns the entity's file.
 */
export function ensureUniqueKeyEntities(analysis: AnalysisInsights): void {
  const owner = new Map<string, Component>();
  for (const component of analysis.components) {
    for (const entity of component.keyEntities) {
      const current = owner.get(entity.qualifiedName);
      if (!current) {
        owner.set(entity.qualifiedName, component);
        continue;
      }
      const file = entity.referenceFile;
      if (
        file !== undefined &&
        current !== component &&
        component.assignedFiles.includes(file) &&
        !current.assignedFiles.includes(file)
      ) {
        owner.set(entity.qualifiedName, component);
      }
    }
  }

  for (const component of analysis.components) {
    const kept = new Set<string>();
    component.keyEntities = component.keyEntities.filter((entity) => {
      if (owner.get(entity.qualifiedName) !== component || kept.has(entity.qualifiedName)) return false;
      kept.add(entity.qualifiedName);
      return true;
    });
  }
}

// ─── Methods & Relations ─────────────────────────────────────────────────────

export function componentNodes(component: Component, clusterResults: Iterable<ClusterResult>): Set<string> {
  const nodes = new Set<string>();
  for (const result of clusterResults) {
    for (const id of component.sourceClusterIds) {
      for (const node of result.getNodesForCluster(id)) nodes.add(node);
    }
  }
  return nodes;
}

export function buildFileMethods(
  component: Component,
  graph: CallGraph,
  clusterResults: Iterable<ClusterResult>,
): FileMethodGroup[] {
  const byFile = new Map<string, FileMethodGroup>();
  for (const name of componentNodes(component, clusterResults)) {
    const node = graph.nodes.get(name);
    if (!node) continue;
    const group = byFile.get(node.filePath) ?? { filePath: node.filePath, methods: [] };
    group.methods.push({
      qualifiedName: name,
      kind: node.kind,
      startLine: node.startLine,
      endLine: node.endLine,
    });
    byFile.set(node.filePath, group);
  }
  const groups = [...byFile.values()].sort((a, b) => compare(a.filePath, b.filePath));
  for (const group of groups) {
    group.methods.sort((a, b) => a.startLine - b.startLine || compare(a.qualifiedName, b.qualifiedName));
  }
  return groups;
}

export function mapNodesToComponents(
  components: Component[],
  clusterResults: Iterable<ClusterResult>,
): Map<string, Component> {
  const results = [...clusterResults];
  const mapping = new Map<string, Component>();
  for (const component of components) {
    for (const node of componentNodes(component, results)) {
      if (!mapping.has(node)) mapping.set(node, component);
    }
  }
  return mapping;
}

export function deriveRelations(
  graph: CallGraph,
  components: Component[],
  nodeToComponent: Map<string, Component>,
): Relation[] {
  const known = new Set(components);
  const pairs = new Map<string, Relation>();
  for (const { source, destination } of graph.edges) {
    const src = nodeToComponent.get(source);
    const dst = nodeToComponent.get(destination);
    if (!src || !dst || src === dst || !known.has(src) || !known.has(dst)) continue;
    const key = `${src.name}\u0000${dst.name}`;
    if (pairs.has(key)) continue;
    pairs.set(key, {
      relation: "calls",
      srcName: src.name,
      dstName: dst.name,
      srcId: src.componentId,
      dstId: dst.componentId,
    });
  }
  return [...pairs.values()].sort(
    (a, b) => compare(a.srcName, b.srcName) || compare(a.dstName, b.dstName),
  );
}

// ─── Full Pass ───────────────────────────────────────────────────────────────

function describeAnalysis(
  scope: string,
  componentCount: number,
  clusterCount: number,
  fileCount: number,
  unclassifiedCount: number,
): string {
  const plural = (n: number, word: string): string => `${n} ${word}${n === 1 ? "" : "s"}`;
  if (componentCount === 0) {
    if (unclassifiedCount === 0) return `${scope} has no call-graph clusters.`;
    return `${scope} has no call-graph clusters; ` +
      `${unclassifiedCount === 1 ? "its file is" : `all ${unclassifiedCount} files are`} listed as ${UNCLASSIFIED_COMPONENT}.`;
  }
  const summary = `${scope} is organized into ${plural(componentCount, "component")} derived from ` +
    `${plural(clusterCount, "call-graph cluster")} across ${plural(fileCount, "file")}.`;
  if (unclassifiedCount === 0) return summary;
  return `${summary} ${plural(unclassifiedCount, "file")} ${unclassifiedCount === 1 ? "falls" : "fall"} outside every cluster.`;
}

/**
 * Derive, assign, deduplicate, describe, relate and id the components of a
 * (sub)graph. `files` are the repo-relative files to distribute.
 */
export function organize(
  graph: CallGraph,
  clusterResults: ClusterResult[],
  files: string[],
  options: OrganizeOptions = {},
  warnings: Warning[] = [],
): AnalysisInsights {
  const components = deriveComponents(graph, clusterResults, options);
  const derivedCount = components.length;
  const clusterCount = components.reduce((n, c) => n + c.sourceClusterIds.length, 0);
  const analysis: AnalysisInsights = { description: "", components, componentsRelations: [] };

  assignFilesToComponents(files, analysis, buildFileClusterMapping(clusterResults));
  const unclassified = analysis.components.find((c) => c.name === UNCLASSIFIED_COMPONENT);
  analysis.description = describeAnalysis(
    options.scope ?? "The repository",
    derivedCount,
    clusterCount,
    files.length,
    unclassified?.assignedFiles.length ?? 0,
  );
  ensureUniqueFileAssignments(analysis);
  ensureUniqueKeyEntities(analysis);
  for (const component of analysis.components) {
    component.fileMethods = buildFileMethods(component, graph, clusterResults);
  }
  analysis.componentsRelations = deriveRelations(
    graph,
    analysis.components,
    mapNodesToComponents(analysis.components, clusterResults),
  );
  assignComponentIds(analysis, options.parentId ?? ROOT_PARENT_ID, warnings);
  return analysis;
}
