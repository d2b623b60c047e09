// src/clustering.ts — Call-graph clustering
// Greedy modularity communities (Clauset–Newman–Moore) over the undirected
// projection of a call graph, then size-adaptive merging down to a target
// cluster count.

import type { CallGraph } from "./call-graph.js";
import type { ClusterOptions, Language } from "./types.js";

export type ClusterStrategy = "empty" | "none" | "greedy_modularity";

export const DEFAULT_CLUSTER_OPTIONS: ClusterOptions = {
  targetClusters: 20,
  minClusterSize: 2,
};

const EPSILON = 1e-12;

export class ClusterResult {
  readonly fileToClusters = new Map<string, Set<number>>();
  readonly clusterToFiles = new Map<number, Set<string>>();
  private readonly nodeToCluster = new Map<string, number>();

  constructor(
    readonly clusters: Map<number, Set<string>>,
    readonly strategy: ClusterStrategy,
    fileOf: (node: string) => string | undefined,
  ) {
    for (const [id, members] of clusters) {
      const files = new Set<string>();
      for (const node of members) {
        this.nodeToCluster.set(node, id);
        const file = fileOf(node);
        if (file === undefined) continue;
        files.add(file);
        const ids = this.fileToClusters.get(file) ?? new Set<number>();
        ids.add(id);
        this.fileToClusters.set(file, ids);
      }
      this.clusterToFiles.set(id, files);
    }
  }

  getClusterIds(): number[] {
    return [...this.clusters.keys()].sort((a, b) => a - b);
  }

  getFilesForCluster(id: number): Set<string> {
    return this.clusterToFiles.get(id) ?? new Set();
  }

  getClustersForFile(file: string): Set<number> {
    return this.fileToClusters.get(file) ?? new Set();
  }

  getNodesForCluster(id: number): Set<string> {
    return this.clusters.get(id) ?? new Set();
  }

  getClusterForNode(node: string): number | undefined {
    return this.nodeToCluster.get(node);
  }
}

// ─── Community Detection ─────────────────────────────────────────────────────

type WeightMap = Map<string, Map<string, number>>;

function undirectedWeights(graph: CallGraph): { weights: WeightMap; total: number } {
  const weights: WeightMap = new Map();
  for (const name of graph.nodes.keys()) weights.set(name, new Map());
  let total = 0;
  for (const { source, destination } of graph.edges) {
    if (source === destination) continue;
    const a = weights.get(source);
    const b = weights.get(destination);
    if (!a || !b) continue;
    a.set(destination, (a.get(destination) ?? 0) + 1);
    b.set(source, (b.get(source) ?? 0) + 1);
    total += 1;
  }
  return { weights, total };
}

/**
 * Greedy modularity maximization. Each community is keyed by its smallest
 * member; ties on modularity gain go to the smallest key pair.
 * Returns communities ordered by size desc, then first member.
 */
export function detectCommunities(graph: CallGraph): string[][] {
  const { weights, total } = undirectedWeights(graph);
  const members = new Map<string, string[]>();
  for (const name of [...graph.nodes.keys()].sort()) members.set(name, [name]);
  if (total === 0) return orderCommunities([...members.values()]);

  const twoM = 2 * total;
  const degree = new Map<string, number>();
  const version = new Map<string, number>();
  // Inter-community weights; starts as the node adjacency.
  const between: WeightMap = new Map();
  for (const [name, adjacent] of weights) {
    let sum = 0;
    for (const w of adjacent.values()) sum += w;
    degree.set(name, sum);
    between.set(name, new Map(adjacent));
  }
  for (const name of between.keys()) version.set(name, 0);

  // Lazy max-heap of merge gains. A merge only changes the gains of pairs
  // touching the merged community, so entries carry both communities'
  // versions and are dropped when either has moved on.
  const heap = new BinaryHeap<MergeCandidate>(isBetterMerge);
  const gainOf = (i: string, j: string, eij: number): number =>
    2 * (eij / twoM - ((degree.get(i) ?? 0) / twoM) * ((degree.get(j) ?? 0) / twoM));
  const pushPair = (x: string, y: string, eij: number): void => {
    const [i, j] = x < y ? [x, y] : [y, x];
    heap.push({ i, j, gain: gainOf(i, j, eij), vi: version.get(i) ?? 0, vj: version.get(j) ?? 0 });
  };

  for (const [i, adjacent] of between) {
    for (const [j, eij] of adjacent) {
      if (i < j) pushPair(i, j, eij);
    }
  }

  for (let top = heap.pop(); top !== undefined; top = heap.pop()) {
    if (top.vi !== version.get(top.i) || top.vj !== version.get(top.j)) continue;
    if (top.gain <= 0) break;
    mergeCommunities(top.i, top.j, between, degree, members);
    version.set(top.i, (version.get(top.i) ?? 0) + 1);
    version.delete(top.j);
    for (const [k, eik] of between.get(top.i) ?? []) pushPair(top.i, k, eik);
  }

  return orderCommunities([...members.values()]);
}

/** Merge community `j` into `i` (i < j, so `i` stays the smallest member). */
function mergeCommunities(
  i: string,
  j: string,
  between: WeightMap,
  degree: Map<string, number>,
  members: Map<string, string[]>,
): void {
  const ai = between.get(i) ?? new Map<string, number>();
  const aj = between.get(j) ?? new Map<string, number>();
  for (const [k, w] of aj) {
    if (k === i) continue;
    ai.set(k, (ai.get(k) ?? 0) + w);
    const ak = between.get(k);
    if (ak) {
      ak.delete(j);
      ak.set(i, (ak.get(i) ?? 0) + w);
    }
  }
  ai.delete(j);
  between.delete(j);

  degree.set(i, (degree.get(i) ?? 0) + (degree.get(j) ?? 0));
  degree.delete(j);

  members.set(i, [...(members.get(i) ?? []), ...(members.get(j) ?? [])].sort());
  members.delete(j);
}

interface MergeCandidate {
  i: string;
  j: string;
  gain: number;
  vi: number;
  vj: number;
}

/** Higher gain first; near-equal gains go to the smallest key pair. */
function isBetterMerge(a: MergeCandidate, b: MergeCandidate): boolean {
  if (Math.abs(a.gain - b.gain) > EPSILON) return a.gain > b.gain;
  return a.i !== b.i ? a.i < b.i : a.j < b.j;
}

/** Array-backed binary heap; `before(a, b)` puts `a` nearer the top. */
export class BinaryHeap<T> {
  private readonly items: T[] = [];

  constructor(private readonly before: (a: T, b: T) => boolean) {}

  get size(): number {
    return this.items.length;
  }

  push(item: T): void {
    const items = this.items;
    items.push(item);
    let index = items.length - 1;
    while (index > 0) {
      const parent = (index - 1) >> 1;
      if (!this.before(items[index], items[parent])) break;
      [items[index], items[parent]] = [items[parent], items[index]];
      index = parent;
    }
  }

  pop(): T | undefined {
    const items = this.items;
    const top = items[0];
    const last = items.pop();
    if (items.length === 0 || last === undefined) return top;
    items[0] = last;
    let index = 0;
    for (;;) {
      const left = 2 * index + 1;
      const right = left + 1;
      let next = index;
      if (left < items.length && this.before(items[left], items[next])) next = left;
      if (right < items.length && this.before(items[right], items[next])) next = right;
      if (next === index) break;
      [items[index], items[next]] = [items[next], items[index]];
      index = next;
    }
    return top;
  }
}

function orderCommunities(communities: string[][]): string[][] {
  return communities
    .map((c) => [...c].sort())
    .sort((a, b) => b.length - a.length || compare(a[0] ?? "", b[0] ?? ""));
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Communities of at least `minClusterSize` nodes, merged smallest-first into
 * their most connected neighbor until no more than `targetClusters` remain.
 */
export function adaptiveClustering(
  graph: CallGraph,
  options: Partial<ClusterOptions> = {},
): string[][] {
  const { targetClusters, minClusterSize } = { ...DEFAULT_CLUSTER_OPTIONS, ...options };
  const { weights } = undirectedWeights(graph);
  let communities = detectCommunities(graph).filter((c) => c.length >= minClusterSize);

  while (communities.length > Math.max(1, targetClusters)) {
    const bySize = communities
      .map((members, index) => ({ members, index }))
      .sort((a, b) => a.members.length - b.members.length || compare(a.members[0] ?? "", b.members[0] ?? ""));

    let merged = false;
    for (const { members, index } of bySize) {
      const target = strongestNeighbor(members, index, communities, weights);
      if (target === undefined) continue;
      const next = communities.filter((_, i) => i !== index && i !== target);
      next.push([...communities[target], ...members]);
      communities = orderCommunities(next);
      merged = true;
      break;
    }
    if (!merged) break;
  }

  return communities;
}

function strongestNeighbor(
  members: string[],
  index: number,
  communities: string[][],
  weights: WeightMap,
): number | undefined {
  const owner = new Map<string, number>();
  communities.forEach((c, i) => {
    for (const node of c) owner.set(node, i);
  });
  const shared = new Map<number, number>();
  for (const node of members) {
    for (const [neighbor, w] of weights.get(node) ?? []) {
      const other = owner.get(neighbor);
      if (other === undefined || other === index) continue;
      shared.set(other, (shared.get(other) ?? 0) + w);
    }
  }
  let best: number | undefined;
  let bestWeight = 0;
  // `communities` is ordered, so scanning by index breaks ties deterministically
  for (const [other, w] of [...shared].sort((a, b) => a[0] - b[0])) {
    if (w > bestWeight) {
      best = other;
      bestWeight = w;
    }
  }
  return best;
}

// ─── Cluster Results ─────────────────────────────────────────────────────────

const memo = new WeakMap<CallGraph, Map<string, ClusterResult>>();

/**
 * Cluster a call graph. Cluster ids are `idOffset + 1`, `idOffset + 2`, …
 */
export function clusterGraph(
  graph: CallGraph,
  options: Partial<ClusterOptions> = {},
  idOffset = 0,
): ClusterResult {
  const resolved = { ...DEFAULT_CLUSTER_OPTIONS, ...options };
  const key = `${resolved.targetClusters}:${resolved.minClusterSize}:${idOffset}`;
  const cached = memo.get(graph)?.get(key);
  if (cached) return cached;

  const fileOf = (node: string): string | undefined => graph.nodes.get(node)?.filePath;
  let result: ClusterResult;
  if (graph.nodes.size === 0) {
    result = new ClusterResult(new Map(), "empty", fileOf);
  } else {
    const communities = graph.edges.length === 0 ? [] : adaptiveClustering(graph, resolved);
    if (communities.length === 0) {
      result = new ClusterResult(new Map(), "none", fileOf);
    } else {
      const clusters = new Map<number, Set<string>>();
      communities.forEach((c, i) => clusters.set(idOffset + i + 1, new Set(c)));
      result = new ClusterResult(clusters, "greedy_modularity", fileOf);
    }
  }

  const perGraph = memo.get(graph) ?? new Map<string, ClusterResult>();
  perGraph.set(key, result);
  memo.set(graph, perGraph);
  return result;
}

/**
 * Cluster each language graph; ids stay unique across languages.
 */
export function clusterLanguages(
  graphs: Map<Language, CallGraph>,
  options: Partial<ClusterOptions> = {},
): Map<Language, ClusterResult> {
  const results = new Map<Language, ClusterResult>();
  let offset = 0;
  for (const [language, graph] of graphs) {
    const result = clusterGraph(graph, options, offset);
    results.set(language, result);
    offset = Math.max(offset, ...result.getClusterIds());
  }
  return results;
}

export function getAllClusterIds(results: Iterable<ClusterResult>): number[] {
  const ids = new Set<number>();
  for (const result of results) {
    for (const id of result.getClusterIds()) ids.add(id);
  }
  return [...ids].sort((a, b) => a - b);
}

export function getFilesForClusterIds(
  ids: Iterable<number>,
  results: Iterable<ClusterResult>,
): Set<string> {
  const wanted = [...ids];
  const files = new Set<string>();
  for (const result of results) {
    for (const id of wanted) {
      for (const file of result.getFilesForCluster(id)) files.add(file);
    }
  }
  return files;
}

// ─── Textual Form ────────────────────────────────────────────────────────────

export function toClusterString(graph: CallGraph, result: ClusterResult): string {
  if (result.clusters.size === 0) {
    return `No clusters (strategy: ${result.strategy})`;
  }

  const lines = ["Cluster Definitions:"];
  for (const id of result.getClusterIds()) {
    const members = [...result.getNodesForCluster(id)].sort();
    lines.push(`Cluster ${id} (${members.length} nodes): [${members.join(", ")}]`);
  }

  const inter: string[] = [];
  const unclustered: string[] = [];
  for (const { source, destination } of graph.edges) {
    const a = result.getClusterForNode(source);
    const b = result.getClusterForNode(destination);
    if (a !== undefined && b !== undefined) {
      if (a !== b) inter.push(`Cluster ${a} → Cluster ${b} via ${source} -> ${destination}`);
    } else if (a === undefined && b === undefined) {
      unclustered.push(`${source} -> ${destination}`);
    }
  }

  if (inter.length > 0) lines.push("", "Inter-Cluster Connections:", ...inter);
  if (unclustered.length > 0) lines.push("", "Unclustered Edges:", ...unclustered);
  return lines.join("\n");
}

/**
 * Keep only the definition and outgoing-connection lines of the given clusters.
 */
export function extractClustersFromString(text: string, ids: Iterable<number>): string {
  const wanted = new Set(ids);
  return text
    .split("\n")
    .filter((line) => {
      const match = /^Cluster (\d+)\b/.exec(line);
      return match !== null && wanted.has(Number(match[1]));
    })
    .join("\n");
}

export function buildClusterString(
  languages: Language[],
  graphs: Map<Language, CallGraph>,
  results: Map<Language, ClusterResult>,
): string {
  const sections: string[] = [];
  for (const language of languages) {
    const graph = graphs.get(language);
    const result = results.get(language);
    if (!graph || !result) continue;
    const title = language.charAt(0).toUpperCase() + language.slice(1);
    sections.push(`## ${title} Clusters\n\n${toClusterString(graph, result)}`);
  }
  return sections.join("\n\n");
}
