// src/cli.ts — Command runner
// Everything the clustermap binary does, minus process exit.

import { writeFileSync, mkdirSync } from "node:fs";
import { dirname, join } from "node:path";
import { analyze, render, ENGINE_VERSION } from "./index.js";
import { parseCliArgs, resolveConfig } from "./config.js";
import { FileCoverage } from "./file-coverage.js";
import type { Warning } from "./types.js";

export const ANALYSIS_FILENAME = "analysis.json";

export const HELP_TEXT = `
clustermap v${ENGINE_VERSION}

Usage:
  clustermap [analyze] [path]       Cluster a repository's call graph into components

Arguments:
  path                 Repository directory to analyze (default: current directory)

Options:
  --format, -f         Output format: json, markdown, html, mermaid (default: json)
  --output, -o         Output directory (default: .clustermap)
  --config, -c         Path to config file (default: clustermap.config.json,
                       or the "clustermap" key in package.json)
  --exclude <glob>     Exclude files matching the glob (repeatable)
  --depth <n>          Maximum expansion depth; the root is depth 1 (default: 2)
  --target-clusters    Upper bound on clusters per language (default: 20)
  --include-tests      Analyze test files too
  --repo-url <url>     Repository URL for source links in markdown/html
  --branch <name>      Branch for source links (default: main)
  --since <ref>        Update the existing coverage report with git changes since <ref>
  --quiet, -q          Suppress warnings
  --verbose, -v        Print progress and timing
  --dry-run            Print the unified analysis to stdout, write nothing
  --help, -h           Show this help text

Environment Variables:
  CLUSTERMAP_REPO_URL  Default for --repo-url

Examples:
  npx clustermap
  npx clustermap analyze ./my-repo --format markdown
  npx clustermap . -f html --repo-url https://github.com/acme/shop --branch develop
  npx clustermap . --exclude "scripts/**" --depth 3
`.trim();

export interface CliIO {
  cwd: string;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const PROCESS_IO: CliIO = {
  cwd: process.cwd(),
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

/**
 * Run the CLI for `argv` (without the node and script entries).
 * Resolves to the process exit code.
 */
export async function runCli(argv: string[], io: CliIO = PROCESS_IO): Promise<number> {
  const warnings: Warning[] = [];
  const args = await parseCliArgs(argv, warnings);

  if (args.help) {
    io.stdout(HELP_TEXT + "\n");
    return 0;
  }

  const config = resolveConfig(args, warnings, io.cwd);
  const result = await analyze(config);

  // Merge config-time warnings with analysis warnings
  result.warnings.unshift(...warnings);

  if (!args.quiet) {
    for (const w of result.warnings) {
      io.stderr(`[${w.level}] ${w.module}: ${w.message}${w.file ? ` (${w.file})` : ""}\n`);
    }
  }

  if (result.analyzedFiles.length === 0) {
    io.stderr(`[error] No source files found in ${config.repoDir}\n`);
    return 1;
  }

  if (args.dryRun) {
    io.stdout(JSON.stringify(result.analysis, null, 2) + "\n");
    return 0;
  }

  const written: string[] = [];
  const analysisPath = join(config.output.dir, ANALYSIS_FILENAME);
  writeFileSafe(analysisPath, JSON.stringify(result.analysis, null, 2) + "\n");
  written.push(analysisPath);
  written.push(FileCoverage.save(config.output.dir, result.coverage));

  const renderWarnings: Warning[] = [];
  const files = render(
    result.analysis,
    config.output.format,
    { repoUrl: config.links.repoUrl, branch: config.links.branch },
    renderWarnings,
  );
  for (const file of files) {
    const path = join(config.output.dir, file.filename);
    writeFileSafe(path, file.content);
    written.push(path);
  }

  if (!args.quiet) {
    for (const w of renderWarnings) {
      io.stderr(`[${w.level}] ${w.module}: ${w.message}\n`);
    }
    for (const path of written) {
      io.stderr(`Written to ${path}\n`);
    }
  }

  return 0;
}

function writeFileSafe(filePath: string, content: string): void {
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, content);
}
