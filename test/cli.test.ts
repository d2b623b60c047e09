import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { existsSync, mkdirSync, mkdtempSync, readdirSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { ANALYSIS_FILENAME, runCli } from "../src/cli.js";
import type { CliIO } from "../src/cli.js";
import { REPO_URL_ENV } from "../src/config.js";
import { ENGINE_VERSION } from "../src/types.js";

const FIXTURES = fileURLToPath(new URL("fixtures", import.meta.url));
const SHOP = resolve(FIXTURES, "shop-app");

// ─── Helpers ─────────────────────────────────────────────────────────────────

interface CapturedIO extends CliIO {
  out: string[];
  err: string[];
}

function captureIO(cwd: string): CapturedIO {
  const out: string[] = [];
  const err: string[] = [];
  return {
    cwd,
    out,
    err,
    stdout: (text) => out.push(text),
    stderr: (text) => err.push(text),
  };
}

// ─── Commands ────────────────────────────────────────────────────────────────

describe("runCli", () => {
  let cwd: string;
  let outDir: string;

  beforeEach(() => {
    cwd = mkdtempSync(join(tmpdir(), "clustermap-cli-"));
    outDir = join(cwd, "out");
    vi.stubEnv(REPO_URL_ENV, "");
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    rmSync(cwd, { recursive: true, force: true });
  });

  it("writes the analysis and coverage report beside the format's pages", async () => {
    const io = captureIO(cwd);
    const code = await runCli([SHOP, "-o", outDir, "-f", "markdown", "-q"], io);

    expect(code).toBe(0);
    expect(readdirSync(outDir).sort()).toEqual([ANALYSIS_FILENAME, "file_coverage.json", "overview.md"]);
    const analysis: unknown = JSON.parse(readFileSync(join(outDir, ANALYSIS_FILENAME), "utf-8"));
    expect(analysis).toMatchObject({ metadata: { repoName: "shop-app", depthLevel: 1 } });
    expect(io.err).toEqual([]);
  });

  it("lists written files unless quiet", async () => {
    const io = captureIO(cwd);
    expect(await runCli([SHOP, "-o", outDir], io)).toBe(0);
    expect(io.err).toEqual([
      `Written to ${join(outDir, ANALYSIS_FILENAME)}\n`,
      `Written to ${join(outDir, "file_coverage.json")}\n`,
    ]);
  });

  it("prints the analysis and writes nothing on a dry run", async () => {
    const io = captureIO(cwd);
    const code = await runCli(["analyze", SHOP, "-o", outDir, "--dry-run", "-q"], io);

    expect(code).toBe(0);
    expect(existsSync(outDir)).toBe(false);
    expect(io.out).toHaveLength(1);
    const printed: unknown = JSON.parse(io.out[0]);
    expect(printed).toMatchObject({ metadata: { repoName: "shop-app" } });
  });

  it("fails when the repository has no source files", async () => {
    const empty = join(cwd, "empty");
    mkdirSync(empty);
    const io = captureIO(cwd);

    expect(await runCli([empty, "-o", outDir], io)).toBe(1);
    expect(io.err.at(-1)).toBe(`[error] No source files found in ${empty}\n`);
    expect(existsSync(outDir)).toBe(false);
  });

  it("prints help", async () => {
    const io = captureIO(cwd);
    expect(await runCli(["--help"], io)).toBe(0);
    expect(io.out[0].startsWith(`clustermap v${ENGINE_VERSION}\n`)).toBe(true);
  });
});
