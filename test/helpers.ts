// Shared graph builders for the organizer, expansion and document tests,
// plus a throwaway git repository for the change-tracking tests.

import { execFileSync } from "node:child_process";
import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { CallGraph } from "../src/call-graph.js";
import type { SymbolNode } from "../src/types.js";

export function fn(qualifiedName: string, filePath: string, startLine = 1, endLine = 2): SymbolNode {
  return { qualifiedName, kind: "function", filePath, startLine, endLine };
}

export function graphOf(nodes: SymbolNode[], edges: Array<[string, string]>): CallGraph {
  const graph = new CallGraph();
  for (const n of nodes) graph.addNode(n);
  for (const [a, b] of edges) graph.addEdge(a, b);
  return graph;
}

const CLI = "src/cli/main.ts";
const WRITER = "src/core/emit/writer.ts";
const READER = "src/core/parse/reader.ts";

export const LAYERED_FILES = [CLI, WRITER, READER];

/**
 * A CLI pair calling into a core made of two triangles (parse and emit)
 * joined by a single edge. The core clusters as one component of six
 * symbols that splits into Emit and Parse when expanded.
 */
export function layeredGraph(): CallGraph {
  return graphOf(
    [
      fn("src.cli.main.run", CLI, 1, 4),
      fn("src.cli.main.usage", CLI, 6, 8),
      fn("src.core.emit.writer.e1", WRITER, 1, 3),
      fn("src.core.emit.writer.e2", WRITER, 5, 7),
      fn("src.core.emit.writer.e3", WRITER, 9, 11),
      fn("src.core.parse.reader.p1", READER, 1, 3),
      fn("src.core.parse.reader.p2", READER, 5, 7),
      fn("src.core.parse.reader.p3", READER, 9, 11),
    ],
    [
      ["src.cli.main.run", "src.cli.main.usage"],
      ["src.cli.main.run", "src.core.parse.reader.p1"],
      ["src.core.parse.reader.p1", "src.core.parse.reader.p2"],
      ["src.core.parse.reader.p2", "src.core.parse.reader.p3"],
      ["src.core.parse.reader.p1", "src.core.parse.reader.p3"],
      ["src.core.parse.reader.p3", "src.core.emit.writer.e1"],
      ["src.core.emit.writer.e1", "src.core.emit.writer.e2"],
      ["src.core.emit.writer.e2", "src.core.emit.writer.e3"],
      ["src.core.emit.writer.e1", "src.core.emit.writer.e3"],
    ],
  );
}

// ─── Git ─────────────────────────────────────────────────────────────────────

export function git(repoDir: string, ...args: string[]): string {
  return execFileSync(
    "git",
    ["-c", "user.name=Test", "-c", "user.email=test@example.com", "-c", "commit.gpgsign=false", ...args],
    { cwd: repoDir, encoding: "utf-8", stdio: ["pipe", "pipe", "pipe"] },
  );
}

export const HAS_GIT = ((): boolean => {
  try {
    execFileSync("git", ["--version"], { stdio: "pipe" });
    return true;
  } catch {
    return false;
  }
})();

/** Write `files` (path → content) under `repoDir`. */
export function writeFiles(repoDir: string, files: Record<string, string>): void {
  for (const [path, content] of Object.entries(files)) {
    const full = join(repoDir, path);
    mkdirSync(dirname(full), { recursive: true });
    writeFileSync(full, content);
  }
}

/** Initialize a repository holding `files` as its first commit. */
export function initRepo(repoDir: string, files: Record<string, string>): void {
  writeFiles(repoDir, files);
  git(repoDir, "init", "-q");
  git(repoDir, "add", "-A");
  git(repoDir, "commit", "-q", "-m", "initial");
}
