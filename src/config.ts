// src/config.ts — Config Resolver
// defaults ← config file ← CLI args (parsed with mri)

import { existsSync, readFileSync } from "node:fs";
import { resolve, join } from "node:path";
import type {
  ClusterOptions,
  OrganizerOptions,
  OutputFormat,
  ResolvedConfig,
  Warning,
} from "./types.js";
import { DEFAULT_CLUSTER_OPTIONS } from "./clustering.js";
import { DEFAULT_ORGANIZER_OPTIONS } from "./organizer.js";

export const CONFIG_FILENAME = "clustermap.config.json";
export const PACKAGE_JSON_KEY = "clustermap";
export const REPO_URL_ENV = "CLUSTERMAP_REPO_URL";

const OUTPUT_FORMATS: readonly OutputFormat[] = ["json", "markdown", "html", "mermaid"];

export interface ParsedArgs {
  command: "analyze";
  path?: string;
  format?: string;
  output?: string;
  config?: string;
  exclude: string[];
  depth?: number;
  targetClusters?: number;
  repoUrl?: string;
  branch?: string;
  since?: string;
  includeTests: boolean;
  quiet: boolean;
  verbose: boolean;
  dryRun: boolean;
  help: boolean;
}

/** Shape of `clustermap.config.json` / the `clustermap` key of package.json. */
export interface FileConfig {
  exclude?: string[];
  includeTests?: boolean;
  output?: { format?: string; dir?: string };
  clustering?: Partial<ClusterOptions>;
  organizer?: Partial<OrganizerOptions>;
  links?: { repoUrl?: string; branch?: string };
}

const DEFAULTS: ResolvedConfig = {
  repoDir: ".",
  exclude: [],
  includeTests: false,
  output: {
    format: "json",
    dir: ".clustermap",
  },
  clustering: DEFAULT_CLUSTER_OPTIONS,
  organizer: DEFAULT_ORGANIZER_OPTIONS,
  links: {
    branch: "main",
  },
  verbose: false,
};

/**
 * Resolve config from CLI args, config file, environment and defaults.
 */
export function resolveConfig(
  args: ParsedArgs,
  warnings: Warning[] = [],
  cwd: string = process.cwd(),
): ResolvedConfig {
  const fileConfig = loadConfigFile(args.config, warnings, cwd) ?? {};

  const requestedFormat = args.format ?? fileConfig.output?.format;
  let format = DEFAULTS.output.format;
  if (requestedFormat !== undefined) {
    const known = OUTPUT_FORMATS.find((f) => f === requestedFormat);
    if (known) {
      format = known;
    } else {
      warnings.push({
        level: "warn",
        module: "config",
        message: `Unknown format "${requestedFormat}" — falling back to json. Expected one of: ${OUTPUT_FORMATS.join(", ")}`,
      });
    }
  }

  const repoUrl = args.repoUrl ?? fileConfig.links?.repoUrl ?? process.env[REPO_URL_ENV];

  return {
    repoDir: resolve(cwd, args.path ?? DEFAULTS.repoDir),
    exclude: [...(fileConfig.exclude ?? DEFAULTS.exclude), ...args.exclude],
    includeTests: args.includeTests || (fileConfig.includeTests ?? DEFAULTS.includeTests),
    output: {
      format,
      dir: resolve(cwd, args.output ?? fileConfig.output?.dir ?? DEFAULTS.output.dir),
    },
    clustering: {
      ...DEFAULTS.clustering,
      ...fileConfig.clustering,
      ...(args.targetClusters !== undefined ? { targetClusters: args.targetClusters } : {}),
    },
    organizer: {
      ...DEFAULTS.organizer,
      ...fileConfig.organizer,
      ...(args.depth !== undefined ? { maxDepth: args.depth } : {}),
    },
    links: {
      ...(repoUrl ? { repoUrl } : {}),
      branch: args.branch ?? fileConfig.links?.branch ?? DEFAULTS.links.branch,
    },
    ...(args.since ? { since: args.since } : {}),
    verbose: args.verbose,
  };
}

function loadConfigFile(
  configPath: string | undefined,
  warnings: Warning[],
  cwd: string,
): FileConfig | null {
  // Explicit config path
  if (configPath) {
    const absPath = resolve(cwd, configPath);
    if (!existsSync(absPath)) {
      warnings.push({
        level: "warn",
        module: "config",
        message: `Config file not found: ${configPath}`,
      });
      return null;
    }
    return parseConfigFile(absPath, warnings);
  }

  const jsonConfig = join(cwd, CONFIG_FILENAME);
  if (existsSync(jsonConfig)) {
    return parseConfigFile(jsonConfig, warnings);
  }

  // clustermap key in package.json
  const pkgJson = join(cwd, "package.json");
  if (existsSync(pkgJson)) {
    try {
      const pkg: unknown = JSON.parse(readFileSync(pkgJson, "utf-8"));
      if (isRecord(pkg) && pkg[PACKAGE_JSON_KEY] !== undefined) {
        return toFileConfig(pkg[PACKAGE_JSON_KEY], pkgJson, warnings);
      }
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      warnings.push({
        level: "info",
        module: "config",
        message: `Ignoring unreadable package.json: ${msg}`,
        file: pkgJson,
      });
    }
  }

  return null;
}

function parseConfigFile(filePath: string, warnings: Warning[]): FileConfig | null {
  try {
    const parsed: unknown = JSON.parse(readFileSync(filePath, "utf-8"));
    return toFileConfig(parsed, filePath, warnings);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({
      level: "warn",
      module: "config",
      message: `Failed to parse config file ${filePath}: ${msg}`,
    });
    return null;
  }
}

/**
 * Keep the recognized, well-typed fields of a raw config object; anything
 * else is reported and dropped.
 */
export function toFileConfig(raw: unknown, source: string, warnings: Warning[] = []): FileConfig {
  const invalid = (field: string): void => {
    warnings.push({
      level: "warn",
      module: "config",
      message: `Ignoring invalid "${field}" in ${source}`,
      file: source,
    });
  };
  if (!isRecord(raw)) {
    invalid("<root>");
    return {};
  }

  const config: FileConfig = {};
  if (raw.exclude !== undefined) {
    if (Array.isArray(raw.exclude) && raw.exclude.every((p) => typeof p === "string")) {
      config.exclude = raw.exclude.filter((p): p is string => typeof p === "string");
    } else invalid("exclude");
  }
  if (raw.includeTests !== undefined) {
    if (typeof raw.includeTests === "boolean") config.includeTests = raw.includeTests;
    else invalid("includeTests");
  }
  if (isRecord(raw.output)) {
    config.output = {
      format: asString(raw.output.format),
      dir: asString(raw.output.dir),
    };
  } else if (raw.output !== undefined) invalid("output");
  if (isRecord(raw.clustering)) {
    config.clustering = pickPositiveIntegers(raw.clustering, ["targetClusters", "minClusterSize"], "clustering", invalid);
  } else if (raw.clustering !== undefined) invalid("clustering");
  if (isRecord(raw.organizer)) {
    config.organizer = pickPositiveIntegers(raw.organizer, ["maxKeyEntities", "minExpandNodes", "maxDepth"], "organizer", invalid);
  } else if (raw.organizer !== undefined) invalid("organizer");
  if (isRecord(raw.links)) {
    config.links = { repoUrl: asString(raw.links.repoUrl), branch: asString(raw.links.branch) };
  } else if (raw.links !== undefined) invalid("links");
  return config;
}

function pickPositiveIntegers<K extends string>(
  section: Record<string, unknown>,
  keys: readonly K[],
  sectionName: string,
  invalid: (field: string) => void,
): Partial<Record<K, number>> {
  const picked: Partial<Record<K, number>> = {};
  for (const key of keys) {
    const value = section[key];
    if (value === undefined) continue;
    if (typeof value === "number" && Number.isInteger(value) && value > 0) picked[key] = value;
    else invalid(`${sectionName}.${key}`);
  }
  return picked;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function asStringList(value: unknown): string[] {
  if (value === undefined) return [];
  const list = Array.isArray(value) ? value : [value];
  return list.filter((v): v is string => typeof v === "string" && v.length > 0);
}

function asPositiveInt(value: unknown, flag: string, warnings: Warning[]): number | undefined {
  if (value === undefined) return undefined;
  const n = typeof value === "number" ? value : Number.parseInt(String(value), 10);
  if (Number.isInteger(n) && n > 0) return n;
  warnings.push({
    level: "warn",
    module: "config",
    message: `--${flag} expects a positive integer, got "${String(value)}" — using the default`,
  });
  return undefined;
}

/**
 * Parse CLI args using mri.
 */
export async function parseCliArgs(
  argv: string[],
  warnings: Warning[] = [],
): Promise<ParsedArgs> {
  const mri = (await import("mri")).default;
  const args: Record<string, unknown> & { _: string[] } = mri(argv, {
    alias: { f: "format", o: "output", c: "config", q: "quiet", v: "verbose", h: "help" },
    boolean: ["dry-run", "quiet", "verbose", "help", "include-tests"],
    string: ["format", "output", "config", "exclude", "repo-url", "branch", "since"],
  });

  const positionals = args._.map(String);
  if (positionals[0] === "analyze") positionals.shift();
  if (positionals.length > 1) {
    warnings.push({
      level: "warn",
      module: "config",
      message: `Only one repository path is analyzed; ignoring ${positionals.slice(1).join(", ")}`,
    });
  }

  return {
    command: "analyze",
    path: positionals[0],
    format: asString(args.format),
    output: asString(args.output),
    config: asString(args.config),
    exclude: asStringList(args.exclude),
    depth: asPositiveInt(args.depth, "depth", warnings),
    targetClusters: asPositiveInt(args["target-clusters"], "target-clusters", warnings),
    repoUrl: asString(args["repo-url"]),
    branch: asString(args.branch),
    since: asString(args.since),
    includeTests: args["include-tests"] === true,
    quiet: args.quiet === true,
    verbose: args.verbose === true,
    dryRun: args["dry-run"] === true,
    help: args.help === true,
  };
}
