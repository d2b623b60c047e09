// src/file-discovery.ts — File Discovery
// Source files come from git ls-files when available (honours .gitignore),
// otherwise from a filesystem walk with symlink boundary and cycle checks.

import { readdirSync, statSync, realpathSync } from "node:fs";
import { resolve, relative, join, sep } from "node:path";
import { execFileSync } from "node:child_process";
import picomatch from "picomatch";
import {
  DEFAULT_EXCLUDE_DIRS,
  SOURCE_EXTENSIONS,
  DTS_EXTENSION,
  TEST_FILE_PATTERN,
} from "./types.js";
import type { Warning, ExclusionReason } from "./types.js";

const ALWAYS_SKIPPED_DIRS = [".git", "node_modules"];

type FileFilter = (relPath: string) => boolean;

/**
 * Discover all analyzable source files in a repository directory.
 * Returns sorted absolute paths.
 */
export function discoverFiles(
  repoDir: string,
  excludePatterns: string[],
  warnings: Warning[] = [],
): string[] {
  const absRepoDir = resolve(repoDir);
  const files = collectFiles(
    absRepoDir,
    DEFAULT_EXCLUDE_DIRS,
    (rel) => isSourceFile(rel),
    warnings,
  );
  return filterAndSort(files, absRepoDir, excludePatterns);
}

/**
 * List every file of the repository, whatever its type. Feeds the coverage report.
 */
export function listRepositoryFiles(
  repoDir: string,
  warnings: Warning[] = [],
): string[] {
  const absRepoDir = resolve(repoDir);
  return collectFiles(absRepoDir, ALWAYS_SKIPPED_DIRS, () => true, warnings).sort();
}

/**
 * Explain why a repository-relative file is not part of the analysis.
 */
export function categorizeFile(
  relPath: string,
  excludePatterns: string[],
  includeTests = false,
): ExclusionReason {
  const parts = toPosix(relPath).split("/");
  if (parts.slice(0, -1).some((p) => (DEFAULT_EXCLUDE_DIRS as readonly string[]).includes(p))) {
    return "excluded-directory";
  }
  if (excludePatterns.length > 0 && picomatch(excludePatterns, { dot: true })(toPosix(relPath))) {
    return "excluded-pattern";
  }
  if (DTS_EXTENSION.test(relPath)) return "declaration-file";
  if (!SOURCE_EXTENSIONS.test(relPath)) return "unsupported-language";
  if (!includeTests && isTestPath(relPath)) return "test-file";
  return "not-parsed";
}

export function isSourceFile(relPath: string): boolean {
  return SOURCE_EXTENSIONS.test(relPath) && !DTS_EXTENSION.test(relPath);
}

export function isTestPath(relPath: string): boolean {
  const posix = toPosix(relPath);
  return TEST_FILE_PATTERN.test(posix) || posix.includes("__tests__/");
}

export function toPosix(path: string): string {
  return path.split(sep).join("/");
}

function collectFiles(
  absRepoDir: string,
  skippedDirs: readonly string[],
  accept: FileFilter,
  warnings: Warning[],
): string[] {
  const gitFiles = tryGitLsFiles(absRepoDir, skippedDirs, accept);
  if (gitFiles !== null) return gitFiles;

  let realRoot: string;
  try {
    realRoot = realpathSync(absRepoDir);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({
      level: "warn",
      module: "file-discovery",
      message: `Cannot read directory: ${msg}`,
      file: absRepoDir,
    });
    return [];
  }

  const ctx: WalkContext = {
    repoDir: absRepoDir,
    realRoot,
    skippedDirs,
    accept,
    results: [],
    visited: new Set<string>(),
    pendingLinks: [],
    warnings,
  };
  ctx.visited.add(directoryKey(statSync(ctx.realRoot)));
  walkDirectory(absRepoDir, ctx);
  // Real directories claim their files before any symlink pointing at them.
  for (let link = ctx.pendingLinks.shift(); link !== undefined; link = ctx.pendingLinks.shift()) {
    followSymlink(link, ctx);
  }
  return ctx.results;
}

/**
 * Use git ls-files to get non-ignored files.
 * Returns null if git is not available or the directory is not in a work tree.
 */
function tryGitLsFiles(
  repoDir: string,
  skippedDirs: readonly string[],
  accept: FileFilter,
): string[] | null {
  let output: string;
  try {
    output = execFileSync(
      "git",
      ["ls-files", "--cached", "--others", "--exclude-standard"],
      {
        cwd: repoDir,
        encoding: "utf-8",
        timeout: 5000,
        stdio: ["pipe", "pipe", "pipe"],
      },
    );
  } catch {
    // git not available or not a git repo — fall back to filesystem walk
    return null;
  }

  const files: string[] = [];
  for (const line of output.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed) continue;
    const parts = trimmed.split("/");
    if (parts.slice(0, -1).some((p) => skippedDirs.includes(p))) continue;
    if (!accept(trimmed)) continue;
    files.push(resolve(repoDir, trimmed));
  }
  return files;
}

interface WalkContext {
  repoDir: string;
  /** Resolved repository root; symlink targets must stay under it. */
  realRoot: string;
  skippedDirs: readonly string[];
  accept: FileFilter;
  results: string[];
  /** `dev:ino` of every directory entered, for cycle detection. */
  visited: Set<string>;
  pendingLinks: Array<{ path: string; name: string }>;
  warnings: Warning[];
}

function directoryKey(stat: { dev: number; ino: number }): string {
  return `${stat.dev}:${stat.ino}`;
}

/** True when `target` is `root` itself or lies below it. */
export function isInsideRoot(target: string, root: string): boolean {
  return target === root || target.startsWith(root.endsWith(sep) ? root : root + sep);
}

function walkDirectory(dir: string, ctx: WalkContext): void {
  const { repoDir, skippedDirs, accept, results, warnings } = ctx;
  let entries;
  try {
    entries = readdirSync(dir, { withFileTypes: true });
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({
      level: "warn",
      module: "file-discovery",
      message: `Cannot read directory: ${msg}`,
      file: dir,
    });
    return;
  }

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);

    if (entry.isDirectory()) {
      if (skippedDirs.includes(entry.name)) continue;
      enterDirectory(fullPath, fullPath, ctx);
    } else if (entry.isSymbolicLink()) {
      ctx.pendingLinks.push({ path: fullPath, name: entry.name });
    } else if (entry.isFile() && accept(toPosix(relative(repoDir, fullPath)))) {
      results.push(fullPath);
    }
  }
}

function followSymlink(link: { path: string; name: string }, ctx: WalkContext): void {
  const { repoDir, skippedDirs, accept, results, warnings } = ctx;
  const fullPath = link.path;
  let realPath: string;
  let isDirectory: boolean;
  let isFile: boolean;
  try {
    realPath = realpathSync(fullPath);
    const stat = statSync(realPath);
    isDirectory = stat.isDirectory();
    isFile = stat.isFile();
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({
      level: "warn",
      module: "file-discovery",
      message: `Cannot resolve symlink: ${msg}`,
      file: fullPath,
    });
    return;
  }

  if (!isInsideRoot(realPath, ctx.realRoot)) {
    warnings.push({
      level: "info",
      module: "file-discovery",
      message: `Symlink ${toPosix(relative(repoDir, fullPath))} points outside the repository — skipped`,
      file: fullPath,
    });
    return;
  }

  if (isDirectory) {
    if (!skippedDirs.includes(link.name)) enterDirectory(fullPath, realPath, ctx);
  } else if (isFile && accept(toPosix(relative(repoDir, fullPath)))) {
    results.push(fullPath);
  }
}

/** Walk `dir` unless the directory behind it was already entered. */
function enterDirectory(dir: string, target: string, ctx: WalkContext): void {
  let key: string;
  try {
    key = directoryKey(statSync(target));
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    ctx.warnings.push({
      level: "warn",
      module: "file-discovery",
      message: `Cannot read directory: ${msg}`,
      file: dir,
    });
    return;
  }
  if (ctx.visited.has(key)) {
    ctx.warnings.push({
      level: "info",
      module: "file-discovery",
      message: `Symlink ${toPosix(relative(ctx.repoDir, dir))} leads to a directory already walked — skipped`,
      file: dir,
    });
    return;
  }
  ctx.visited.add(key);
  walkDirectory(dir, ctx);
}

/**
 * Filter by user exclude patterns using picomatch, then sort.
 */
function filterAndSort(
  files: string[],
  repoDir: string,
  excludePatterns: string[],
): string[] {
  if (excludePatterns.length === 0) {
    return files.sort();
  }

  const isExcluded = picomatch(excludePatterns, { dot: true });
  return files
    .filter((f) => !isExcluded(toPosix(relative(repoDir, f))))
    .sort();
}
