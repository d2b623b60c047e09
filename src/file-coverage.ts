// src/file-coverage.ts — File coverage report
// Which repository files were analyzed, and why the others were not.

import { readFileSync, writeFileSync, mkdirSync, existsSync } from "node:fs";
import { isAbsolute, join, relative, resolve } from "node:path";
import type {
  ExclusionReason,
  FileCoverageReport,
  FileCoverageSummary,
  NotAnalyzedFile,
  Warning,
} from "./types.js";
import { categorizeFile, toPosix } from "./file-discovery.js";
import type { ChangeSet } from "./change-detector.js";

export const COVERAGE_FILENAME = "file_coverage.json";
const REPORT_VERSION = 1;

export class FileCoverage {
  private readonly repoDir: string;

  constructor(
    repoDir: string,
    private readonly excludePatterns: string[] = [],
    private readonly includeTests = false,
  ) {
    this.repoDir = resolve(repoDir);
  }

  build(allFiles: string[], analyzedFiles: string[]): FileCoverageReport {
    const all = new Set(allFiles.map((f) => this.normalize(f)));
    const analyzed = new Set(analyzedFiles.map((f) => this.normalize(f)));
    for (const f of analyzed) all.add(f);
    return this.report(all, analyzed);
  }

  /**
   * Carry an earlier report forward: drop deleted files, follow renames whose
   * target still exists, then merge the files analyzed this run.
   */
  update(
    existing: FileCoverageReport,
    allFiles: string[],
    analyzedFiles: string[],
    changes: ChangeSet,
  ): FileCoverageReport {
    const all = new Set(allFiles.map((f) => this.normalize(f)));
    const analyzed = new Set(existing.analyzedFiles.map((f) => this.normalize(f)));

    for (const deleted of changes.deletedFiles) analyzed.delete(this.normalize(deleted));
    for (const [oldPath, newPath] of changes.renames) {
      const from = this.normalize(oldPath);
      const to = this.normalize(newPath);
      if (!analyzed.delete(from)) continue;
      if (all.has(to)) analyzed.add(to);
    }
    for (const f of analyzedFiles) analyzed.add(this.normalize(f));
    for (const f of analyzed) {
      if (!all.has(f)) analyzed.delete(f);
    }
    return this.report(all, analyzed);
  }

  static load(outputDir: string, warnings: Warning[] = []): FileCoverageReport | null {
    const path = join(outputDir, COVERAGE_FILENAME);
    if (!existsSync(path)) {
      warnings.push({
        level: "info",
        module: "file-coverage",
        message: `No existing coverage report at ${path}`,
      });
      return null;
    }
    try {
      const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
      if (isCoverageReport(parsed)) return parsed;
      warnings.push({
        level: "warn",
        module: "file-coverage",
        message: `Ignoring malformed coverage report at ${path}`,
        file: path,
      });
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      warnings.push({
        level: "warn",
        module: "file-coverage",
        message: `Cannot read coverage report: ${msg}`,
        file: path,
      });
    }
    return null;
  }

  static save(outputDir: string, report: FileCoverageReport): string {
    mkdirSync(outputDir, { recursive: true });
    const path = join(outputDir, COVERAGE_FILENAME);
    writeFileSync(path, JSON.stringify(report, null, 2) + "\n");
    return path;
  }

  private normalize(file: string): string {
    return toPosix(isAbsolute(file) ? relative(this.repoDir, file) : file).replace(/^\.\//, "");
  }

  private report(all: Set<string>, analyzed: Set<string>): FileCoverageReport {
    const notAnalyzedFiles: NotAnalyzedFile[] = [...all]
      .filter((f) => !analyzed.has(f))
      .sort()
      .map((path) => ({
        path,
        reason: categorizeFile(path, this.excludePatterns, this.includeTests),
      }));

    return {
      version: REPORT_VERSION,
      generatedAt: new Date().toISOString(),
      analyzedFiles: [...analyzed].sort(),
      notAnalyzedFiles,
      summary: summarize(analyzed.size, notAnalyzedFiles),
    };
  }
}

function summarize(analyzed: number, notAnalyzed: NotAnalyzedFile[]): FileCoverageSummary {
  const byReason: Partial<Record<ExclusionReason, number>> = {};
  for (const { reason } of notAnalyzed) {
    byReason[reason] = (byReason[reason] ?? 0) + 1;
  }
  return {
    totalFiles: analyzed + notAnalyzed.length,
    analyzed,
    notAnalyzed: notAnalyzed.length,
    notAnalyzedByReason: byReason,
  };
}

const REASONS: readonly string[] = [
  "excluded-directory",
  "excluded-pattern",
  "declaration-file",
  "test-file",
  "not-parsed",
  "unsupported-language",
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function isCoverageReport(value: unknown): value is FileCoverageReport {
  if (!isRecord(value)) return false;
  if (typeof value.version !== "number" || typeof value.generatedAt !== "string") return false;
  if (!isStringArray(value.analyzedFiles)) return false;
  if (!Array.isArray(value.notAnalyzedFiles)) return false;
  const entriesValid = value.notAnalyzedFiles.every(
    (e) => isRecord(e) && typeof e.path === "string" && typeof e.reason === "string" && REASONS.includes(e.reason),
  );
  return entriesValid && isRecord(value.summary);
}
