import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { tmpdir } from "node:os";
import {
  CONFIG_FILENAME,
  REPO_URL_ENV,
  parseCliArgs,
  resolveConfig,
  toFileConfig,
} from "../src/config.js";
import type { ParsedArgs } from "../src/config.js";
import type { Warning } from "../src/types.js";

// ─── Helpers ─────────────────────────────────────────────────────────────────

function args(overrides: Partial<ParsedArgs> = {}): ParsedArgs {
  return {
    command: "analyze",
    exclude: [],
    includeTests: false,
    quiet: false,
    verbose: false,
    dryRun: false,
    help: false,
    ...overrides,
  };
}

// ─── CLI arguments ───────────────────────────────────────────────────────────

describe("parseCliArgs", () => {
  it("parses the analyze command with options", async () => {
    const parsed = await parseCliArgs([
      "analyze", "./repo",
      "-f", "markdown",
      "--exclude", "a/**",
      "--exclude", "b/**",
      "--depth", "3",
      "--repo-url", "https://example.com/shop",
      "--dry-run",
    ]);
    expect(parsed).toMatchObject({
      command: "analyze",
      path: "./repo",
      format: "markdown",
      exclude: ["a/**", "b/**"],
      depth: 3,
      repoUrl: "https://example.com/shop",
      dryRun: true,
      quiet: false,
      help: false,
    });
  });

  it("treats the command word as optional", async () => {
    const parsed = await parseCliArgs(["src", "-o", "out", "-q", "--include-tests"]);
    expect(parsed.path).toBe("src");
    expect(parsed.output).toBe("out");
    expect(parsed.quiet).toBe(true);
    expect(parsed.includeTests).toBe(true);
    expect(parsed.exclude).toEqual([]);
  });

  it("warns about extra paths and invalid numbers", async () => {
    const warnings: Warning[] = [];
    const parsed = await parseCliArgs(
      ["analyze", "a", "b", "--depth", "deep", "--target-clusters", "0"],
      warnings,
    );
    expect(parsed.path).toBe("a");
    expect(parsed.depth).toBeUndefined();
    expect(parsed.targetClusters).toBeUndefined();
    expect(warnings.map((w) => w.message)).toEqual([
      "Only one repository path is analyzed; ignoring b",
      '--depth expects a positive integer, got "deep" — using the default',
      '--target-clusters expects a positive integer, got "0" — using the default',
    ]);
  });

  it("recognizes help", async () => {
    expect((await parseCliArgs(["-h"])).help).toBe(true);
  });
});

// ─── File config ─────────────────────────────────────────────────────────────

describe("toFileConfig", () => {
  it("keeps valid fields and reports the rest", () => {
    const warnings: Warning[] = [];
    const config = toFileConfig(
      {
        exclude: ["gen/**"],
        includeTests: "yes",
        clustering: { targetClusters: 8, minClusterSize: -1 },
        links: { branch: "dev" },
      },
      "cfg.json",
      warnings,
    );
    expect(config.exclude).toEqual(["gen/**"]);
    expect(config.includeTests).toBeUndefined();
    expect(config.clustering).toEqual({ targetClusters: 8 });
    expect(config.links?.branch).toBe("dev");
    expect(warnings.map((w) => w.message)).toEqual([
      'Ignoring invalid "includeTests" in cfg.json',
      'Ignoring invalid "clustering.minClusterSize" in cfg.json',
    ]);
  });

  it("rejects a non-object config", () => {
    const warnings: Warning[] = [];
    expect(toFileConfig([1, 2], "cfg.json", warnings)).toEqual({});
    expect(warnings[0].message).toBe('Ignoring invalid "<root>" in cfg.json');
  });
});

// ─── Resolution ──────────────────────────────────────────────────────────────

describe("resolveConfig", () => {
  let cwd: string;

  beforeEach(() => {
    cwd = mkdtempSync(join(tmpdir(), "clustermap-config-"));
    vi.stubEnv(REPO_URL_ENV, "");
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    rmSync(cwd, { recursive: true, force: true });
  });

  it("falls back to defaults", () => {
    const warnings: Warning[] = [];
    expect(resolveConfig(args(), warnings, cwd)).toEqual({
      repoDir: cwd,
      exclude: [],
      includeTests: false,
      output: { format: "json", dir: resolve(cwd, ".clustermap") },
      clustering: { targetClusters: 20, minClusterSize: 2 },
      organizer: { maxKeyEntities: 5, minExpandNodes: 6, maxDepth: 2 },
      links: { branch: "main" },
      verbose: false,
    });
    expect(warnings).toEqual([]);
  });

  it("layers the config file under CLI arguments", () => {
    writeFileSync(join(cwd, CONFIG_FILENAME), JSON.stringify({
      exclude: ["x/**"],
      output: { format: "html", dir: "docs" },
      clustering: { targetClusters: 5 },
      organizer: { maxDepth: "deep" },
      links: { branch: "dev" },
    }));
    const warnings: Warning[] = [];
    const config = resolveConfig(args({ exclude: ["y/**"], depth: 3, path: "repo", since: "v1" }), warnings, cwd);

    expect(config.repoDir).toBe(join(cwd, "repo"));
    expect(config.exclude).toEqual(["x/**", "y/**"]);
    expect(config.output).toEqual({ format: "html", dir: join(cwd, "docs") });
    expect(config.clustering).toEqual({ targetClusters: 5, minClusterSize: 2 });
    expect(config.organizer.maxDepth).toBe(3);
    expect(config.links).toEqual({ branch: "dev" });
    expect(config.since).toBe("v1");
    expect(warnings.map((w) => w.message)).toEqual([
      `Ignoring invalid "organizer.maxDepth" in ${join(cwd, CONFIG_FILENAME)}`,
    ]);
  });

  it("reads the clustermap key of package.json", () => {
    writeFileSync(join(cwd, "package.json"), JSON.stringify({
      name: "demo",
      clustermap: { includeTests: true, links: { repoUrl: "https://example.com/pkg" } },
    }));
    const config = resolveConfig(args(), [], cwd);
    expect(config.includeTests).toBe(true);
    expect(config.links.repoUrl).toBe("https://example.com/pkg");
  });

  it("takes the repository URL from the environment", () => {
    vi.stubEnv(REPO_URL_ENV, "https://example.com/env");
    expect(resolveConfig(args(), [], cwd).links.repoUrl).toBe("https://example.com/env");
    expect(resolveConfig(args({ repoUrl: "https://example.com/cli" }), [], cwd).links.repoUrl)
      .toBe("https://example.com/cli");
  });

  it("falls back to json for unknown formats", () => {
    const warnings: Warning[] = [];
    expect(resolveConfig(args({ format: "pdf" }), warnings, cwd).output.format).toBe("json");
    expect(warnings[0].message.startsWith('Unknown format "pdf"')).toBe(true);
  });

  it("warns about missing and unreadable config files", () => {
    const warnings: Warning[] = [];
    resolveConfig(args({ config: "nope.json" }), warnings, cwd);
    expect(warnings[0].message).toBe("Config file not found: nope.json");

    writeFileSync(join(cwd, "broken.json"), "{ nope");
    const more: Warning[] = [];
    resolveConfig(args({ config: "broken.json" }), more, cwd);
    expect(more[0].message.startsWith(`Failed to parse config file ${join(cwd, "broken.json")}:`)).toBe(true);
  });
});
