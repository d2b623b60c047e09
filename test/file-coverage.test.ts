import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { FileCoverage, COVERAGE_FILENAME } from "../src/file-coverage.js";
import { ChangeSet } from "../src/change-detector.js";
import type { FileCoverageReport, Warning } from "../src/types.js";

const ALL_FILES = [
  "/repo/src/a.ts",
  "/repo/README.md",
  "/repo/src/a.test.ts",
  "/repo/vendor/x.js",
  "/repo/src/t.d.ts",
  "/repo/src/b.ts",
];

describe("FileCoverage.build", () => {
  it("splits files into analyzed and not analyzed, with reasons", () => {
    const report = new FileCoverage("/repo").build(ALL_FILES, ["src/a.ts"]);
    expect(report.version).toBe(1);
    expect(report.analyzedFiles).toEqual(["src/a.ts"]);
    expect(report.notAnalyzedFiles).toEqual([
      { path: "README.md", reason: "unsupported-language" },
      { path: "src/a.test.ts", reason: "test-file" },
      { path: "src/b.ts", reason: "not-parsed" },
      { path: "src/t.d.ts", reason: "declaration-file" },
      { path: "vendor/x.js", reason: "excluded-directory" },
    ]);
    expect(report.summary).toEqual({
      totalFiles: 6,
      analyzed: 1,
      notAnalyzed: 5,
      notAnalyzedByReason: {
        "unsupported-language": 1,
        "test-file": 1,
        "not-parsed": 1,
        "declaration-file": 1,
        "excluded-directory": 1,
      },
    });
  });

  it("reports user exclusions and analyzed tests", () => {
    const coverage = new FileCoverage("/repo", ["src/b.ts"], true);
    const report = coverage.build(ALL_FILES, ["src/a.ts", "src/a.test.ts"]);
    expect(report.analyzedFiles).toEqual(["src/a.test.ts", "src/a.ts"]);
    expect(report.notAnalyzedFiles.find((f) => f.path === "src/b.ts")?.reason).toBe("excluded-pattern");
  });

  it("counts analyzed files missing from the listing", () => {
    const report = new FileCoverage("/repo").build([], ["src/new.ts"]);
    expect(report.summary.totalFiles).toBe(1);
    expect(report.analyzedFiles).toEqual(["src/new.ts"]);
  });
});

describe("FileCoverage.update", () => {
  const existing = new FileCoverage("/repo").build(
    ["src/a.ts", "src/old.ts", "src/gone.ts"],
    ["src/a.ts", "src/old.ts", "src/gone.ts"],
  );

  it("follows renames, drops deletions and merges new results", () => {
    const changes = new ChangeSet([
      { changeType: "R", oldPath: "src/old.ts", filePath: "src/new.ts", similarity: 90 },
      { changeType: "D", filePath: "src/gone.ts" },
    ]);
    const report = new FileCoverage("/repo").update(
      existing,
      ["src/a.ts", "src/new.ts", "src/c.ts"],
      ["src/c.ts"],
      changes,
    );
    expect(report.analyzedFiles).toEqual(["src/a.ts", "src/c.ts", "src/new.ts"]);
    expect(report.notAnalyzedFiles).toEqual([]);
  });

  it("drops renamed files whose target no longer exists", () => {
    const changes = new ChangeSet([{ changeType: "R", oldPath: "src/a.ts", filePath: "src/z.ts" }]);
    const report = new FileCoverage("/repo").update(existing, ["src/old.ts", "src/gone.ts"], [], changes);
    expect(report.analyzedFiles).toEqual(["src/gone.ts", "src/old.ts"]);
  });
});

describe("FileCoverage persistence", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "clustermap-coverage-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("saves and loads a report", () => {
    const report = new FileCoverage("/repo").build(ALL_FILES, ["src/a.ts"]);
    const path = FileCoverage.save(dir, report);
    expect(path).toBe(join(dir, COVERAGE_FILENAME));
    expect(readFileSync(path, "utf-8").endsWith("}\n")).toBe(true);
    const warnings: Warning[] = [];
    const loaded: FileCoverageReport | null = FileCoverage.load(dir, warnings);
    expect(loaded).toEqual(report);
    expect(warnings).toEqual([]);
  });

  it("returns null with a notice when no report exists", () => {
    const warnings: Warning[] = [];
    expect(FileCoverage.load(dir, warnings)).toBeNull();
    expect(warnings).toHaveLength(1);
    expect(warnings[0].level).toBe("info");
  });

  it("rejects malformed reports", () => {
    writeFileSync(join(dir, COVERAGE_FILENAME), JSON.stringify({ version: 1, analyzedFiles: "nope" }));
    const warnings: Warning[] = [];
    expect(FileCoverage.load(dir, warnings)).toBeNull();
    expect(warnings[0].level).toBe("warn");
    expect(warnings[0].message.startsWith("Ignoring malformed coverage report")).toBe(true);
  });

  it("reports unreadable JSON", () => {
    writeFileSync(join(dir, COVERAGE_FILENAME), "{ not json");
    const warnings: Warning[] = [];
    expect(FileCoverage.load(dir, warnings)).toBeNull();
    expect(warnings[0].message.startsWith("Cannot read coverage report:")).toBe(true);
  });
});
