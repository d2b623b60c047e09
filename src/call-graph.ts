// src/call-graph.ts — Call Graph
// Symbol-level call graph built from parsed files. Calls are resolved through
// the same file, import bindings, `this`, class statics and `new`.
// External and unresolvable calls are dropped.

import { posix } from "node:path";
import type {
  ParsedFile,
  DeclaredSymbol,
  CallReference,
  SymbolNode,
  CallEdge,
  Language,
  Warning,
} from "./types.js";
import { GraphError } from "./types.js";
import { languageOf } from "./ast-parser.js";

export class CallGraph {
  readonly nodes = new Map<string, SymbolNode>();
  readonly edges: CallEdge[] = [];
  private readonly edgeKeys = new Set<string>();
  private readonly callerIndex = new Map<string, Set<string>>();
  private readonly calleeIndex = new Map<string, Set<string>>();

  addNode(node: SymbolNode): void {
    if (this.nodes.has(node.qualifiedName)) return;
    this.nodes.set(node.qualifiedName, node);
  }

  hasNode(name: string): boolean {
    return this.nodes.has(name);
  }

  addEdge(source: string, destination: string): void {
    if (!this.nodes.has(source)) {
      throw new GraphError(`Source node not found: ${source}`);
    }
    if (!this.nodes.has(destination)) {
      throw new GraphError(`Destination node not found: ${destination}`);
    }
    const key = `${source}\u0000${destination}`;
    if (this.edgeKeys.has(key)) return;
    this.edgeKeys.add(key);
    this.edges.push({ source, destination });
    addToIndex(this.callerIndex, destination, source);
    addToIndex(this.calleeIndex, source, destination);
  }

  /** Nodes calling `name`, sorted. */
  callers(name: string): string[] {
    return [...(this.callerIndex.get(name) ?? [])].sort();
  }

  /** Nodes called by `name`, sorted. */
  callees(name: string): string[] {
    return [...(this.calleeIndex.get(name) ?? [])].sort();
  }

  /** Distinct neighbors, self-calls excluded. */
  degree(name: string): number {
    const neighbors = new Set([
      ...(this.callerIndex.get(name) ?? []),
      ...(this.calleeIndex.get(name) ?? []),
    ]);
    neighbors.delete(name);
    return neighbors.size;
  }

  /** Repo-relative files that own at least one node, sorted. */
  files(): string[] {
    const files = new Set<string>();
    for (const node of this.nodes.values()) files.add(node.filePath);
    return [...files].sort();
  }

  subgraph(names: Iterable<string>): CallGraph {
    const keep = new Set(names);
    const sub = new CallGraph();
    for (const [name, node] of this.nodes) {
      if (keep.has(name)) sub.addNode(node);
    }
    for (const edge of this.edges) {
      if (sub.hasNode(edge.source) && sub.hasNode(edge.destination)) {
        sub.addEdge(edge.source, edge.destination);
      }
    }
    return sub;
  }

  toString(): string {
    const lines = [`CallGraph with ${this.nodes.size} nodes and ${this.edges.length} edges`];
    for (const edge of this.edges) {
      lines.push(`${edge.source} -> ${edge.destination}`);
    }
    return lines.join("\n");
  }

  /**
   * Adjacency listing meant for reading in full. Falls back to a view grouped
   * by class or module when the symbol-level listing exceeds `sizeLimit`.
   */
  llmString(sizeLimit = 2_500_000): string {
    const detailed = adjacencyLines(this.edges, (name) => name);
    const text = detailed.join("\n");
    if (text.length <= sizeLimit) return text;

    const groupOf = (name: string): string => {
      const node = this.nodes.get(name);
      if (!node) return name;
      if (node.kind === "method" || node.kind === "constructor") {
        return name.slice(0, name.lastIndexOf("."));
      }
      return moduleName(node.filePath);
    };
    const grouped = adjacencyLines(this.edges, groupOf);
    return ["(grouped view)", ...grouped].join("\n");
  }
}

function addToIndex(index: Map<string, Set<string>>, key: string, value: string): void {
  let set = index.get(key);
  if (!set) {
    set = new Set();
    index.set(key, set);
  }
  set.add(value);
}

function adjacencyLines(edges: CallEdge[], label: (name: string) => string): string[] {
  const adjacency = new Map<string, Set<string>>();
  for (const edge of edges) {
    const src = label(edge.source);
    const dst = label(edge.destination);
    if (src === dst && edge.source !== edge.destination) continue;
    addToIndex(adjacency, src, dst);
  }
  return [...adjacency.keys()]
    .sort()
    .map((src) => `${src} is calling ${[...(adjacency.get(src) ?? [])].sort().join(", ")}`);
}

// ─── Naming ──────────────────────────────────────────────────────────────────

/** `src/services/builder.ts` → `src.services.builder` */
export function moduleName(relPath: string): string {
  return relPath.replace(/\.[^./]+$/, "").split("/").join(".");
}

export function qualifiedName(relPath: string, symbolName: string): string {
  return `${moduleName(relPath)}.${symbolName}`;
}

// ─── Module Resolution ───────────────────────────────────────────────────────

/**
 * Resolve a relative import specifier against the set of known repo files.
 * Returns the repo-relative target path, or undefined for external modules,
 * unknown targets and paths that escape the repository.
 */
export function resolveModuleSpecifier(
  specifier: string,
  fromFile: string,
  knownFiles: ReadonlySet<string>,
  warnings: Warning[] = [],
): string | undefined {
  if (!specifier.startsWith(".")) return undefined; // External module

  const candidates: string[] = [];
  if (/\.js$/.test(specifier)) {
    candidates.push(specifier.replace(/\.js$/, ".ts"), specifier.replace(/\.js$/, ".tsx"), specifier);
  } else if (/\.jsx$/.test(specifier)) {
    candidates.push(specifier.replace(/\.jsx$/, ".tsx"), specifier);
  } else if (/\.mjs$/.test(specifier)) {
    candidates.push(specifier.replace(/\.mjs$/, ".mts"), specifier);
  } else if (/\.cjs$/.test(specifier)) {
    candidates.push(specifier.replace(/\.cjs$/, ".cts"), specifier);
  } else if (/\.(ts|tsx|mts|cts)$/.test(specifier)) {
    candidates.push(specifier);
  } else {
    // Extensionless — try adding extensions
    for (const ext of [".ts", ".tsx", ".js", ".jsx", ".mts", ".cts", ".mjs", ".cjs"]) {
      candidates.push(specifier + ext);
    }
    for (const ext of [".ts", ".tsx", ".js", ".jsx"]) {
      candidates.push(`${specifier}/index${ext}`);
    }
  }

  const fromDir = posix.dirname(fromFile);
  for (const candidate of candidates) {
    const target = posix.normalize(posix.join(fromDir, candidate));
    if (target === ".." || target.startsWith("../") || posix.isAbsolute(target)) {
      warnings.push({
        level: "warn",
        module: "call-graph",
        message: `Import "${specifier}" resolves outside the repository — skipped`,
        file: fromFile,
      });
      return undefined;
    }
    if (knownFiles.has(target)) return target;
  }
  return undefined;
}

// ─── Graph Construction ──────────────────────────────────────────────────────

interface FileSymbols {
  file: ParsedFile;
  byName: Map<string, DeclaredSymbol>;
  defaultExport?: DeclaredSymbol;
  /** local binding name → resolved target file + imported name */
  bindings: Map<string, { target: string; importedName: string }>;
}

/**
 * Build one call graph over all parsed files.
 */
export function buildCallGraph(
  parsedFiles: ParsedFile[],
  warnings: Warning[] = [],
): CallGraph {
  const graph = new CallGraph();
  const sorted = [...parsedFiles].sort((a, b) => a.relativePath.localeCompare(b.relativePath));
  const knownFiles = new Set(sorted.map((f) => f.relativePath));
  const index = new Map<string, FileSymbols>();

  for (const file of sorted) {
    const byName = new Map<string, DeclaredSymbol>();
    let defaultExport: DeclaredSymbol | undefined;
    for (const symbol of file.symbols) {
      if (!byName.has(symbol.name)) byName.set(symbol.name, symbol);
      if (symbol.isDefaultExport && symbol.kind !== "method" && symbol.kind !== "constructor") {
        defaultExport ??= symbol;
      }
      graph.addNode({
        qualifiedName: qualifiedName(file.relativePath, symbol.name),
        kind: symbol.kind,
        filePath: file.relativePath,
        startLine: symbol.startLine,
        endLine: symbol.endLine,
      });
    }
    index.set(file.relativePath, { file, byName, defaultExport, bindings: new Map() });
  }

  for (const entry of index.values()) {
    for (const imp of entry.file.imports) {
      if (imp.isTypeOnly || imp.bindings.length === 0) continue;
      const target = resolveModuleSpecifier(imp.moduleSpecifier, entry.file.relativePath, knownFiles, warnings);
      if (!target) continue;
      for (const binding of imp.bindings) {
        entry.bindings.set(binding.localName, { target, importedName: binding.importedName });
      }
    }
  }

  for (const entry of index.values()) {
    for (const symbol of entry.file.symbols) {
      const source = qualifiedName(entry.file.relativePath, symbol.name);
      for (const call of symbol.calls) {
        const destination = resolveCall(call, symbol, entry, index);
        if (destination && graph.hasNode(destination)) {
          graph.addEdge(source, destination);
        }
      }
    }
  }

  return graph;
}

function resolveCall(
  call: CallReference,
  caller: DeclaredSymbol,
  entry: FileSymbols,
  index: Map<string, FileSymbols>,
): string | undefined {
  const local = (target: FileSymbols, name: string): string | undefined => {
    const symbol = target.byName.get(name);
    return symbol ? qualifiedName(target.file.relativePath, symbol.name) : undefined;
  };

  if (call.receiver === undefined) {
    const sameFile = local(entry, call.callee);
    if (sameFile) return sameFile;
    const binding = entry.bindings.get(call.callee);
    if (!binding) return undefined;
    const target = index.get(binding.target);
    if (!target) return undefined;
    if (binding.importedName === "default") {
      return target.defaultExport
        ? qualifiedName(target.file.relativePath, target.defaultExport.name)
        : undefined;
    }
    if (binding.importedName === "*") return undefined;
    return local(target, binding.importedName);
  }

  if (call.receiver === "this") {
    return caller.className ? local(entry, `${caller.className}.${call.callee}`) : undefined;
  }

  // Class statics in the same file: `Registry.create()`
  const sameFileStatic = local(entry, `${call.receiver}.${call.callee}`);
  if (sameFileStatic) return sameFileStatic;

  const binding = entry.bindings.get(call.receiver);
  if (!binding) return undefined;
  const target = index.get(binding.target);
  if (!target) return undefined;
  if (binding.importedName === "*") {
    return local(target, call.callee);
  }
  const className = binding.importedName === "default"
    ? target.defaultExport?.name
    : binding.importedName;
  return className ? local(target, `${className}.${call.callee}`) : undefined;
}

/**
 * Build one graph per language family present in the parsed files.
 */
export function buildLanguageGraphs(
  parsedFiles: ParsedFile[],
  warnings: Warning[] = [],
): Map<Language, CallGraph> {
  return splitByLanguage(buildCallGraph(parsedFiles, warnings));
}

export function splitByLanguage(graph: CallGraph): Map<Language, CallGraph> {
  const byLanguage = new Map<Language, string[]>();
  for (const [name, node] of graph.nodes) {
    const language = languageOf(node.filePath);
    const names = byLanguage.get(language) ?? [];
    names.push(name);
    byLanguage.set(language, names);
  }
  const result = new Map<Language, CallGraph>();
  for (const language of [...byLanguage.keys()].sort()) {
    result.set(language, graph.subgraph(byLanguage.get(language) ?? []));
  }
  return result;
}
