// src/types.ts — Shared types for the clustering and diagram engine

// ─── Warnings (passed to all modules) ───────────────────────────────────────

export interface Warning {
  level: "info" | "warn" | "error";
  module: string;
  message: string;
  file?: string;
}

// ─── Config ──────────────────────────────────────────────────────────────────

export type DiagramFormat = "markdown" | "html" | "mermaid";
export type OutputFormat = "json" | DiagramFormat;

export interface ClusterOptions {
  targetClusters: number;
  minClusterSize: number;
}

export interface OrganizerOptions {
  maxKeyEntities: number;
  minExpandNodes: number;
  maxDepth: number;
}

export interface ResolvedConfig {
  repoDir: string;
  exclude: string[];
  includeTests: boolean;
  output: {
    format: OutputFormat;
    dir: string;
  };
  clustering: ClusterOptions;
  organizer: OrganizerOptions;
  links: {
    repoUrl?: string;
    branch: string;
  };
  since?: string;
  verbose: boolean;
}

// ─── Parsed source ───────────────────────────────────────────────────────────

export type Language = "typescript" | "javascript";

export type SymbolKind = "function" | "arrow" | "class" | "method" | "constructor";

export interface ImportBinding {
  localName: string;
  importedName: string; // "default", "*" for namespace/require bindings, or the exported name
}

export interface ImportEntry {
  moduleSpecifier: string;
  bindings: ImportBinding[];
  isTypeOnly: boolean;
  isDynamic: boolean;
}

export interface CallReference {
  callee: string;
  receiver?: string; // "this", a namespace/class binding, or undefined for bare calls
  isConstructor: boolean;
}

export interface DeclaredSymbol {
  name: string; // "build", "Builder", "Builder.build"
  kind: SymbolKind;
  startLine: number;
  endLine: number;
  className?: string;
  isDefaultExport: boolean;
  calls: CallReference[];
}

export interface ParsedFile {
  relativePath: string; // posix separators
  language: Language;
  imports: ImportEntry[];
  symbols: DeclaredSymbol[];
  lineCount: number;
  isTestFile: boolean;
  hasSyntaxErrors: boolean;
}

// ─── Call graph ──────────────────────────────────────────────────────────────

export interface SymbolNode {
  qualifiedName: string;
  kind: SymbolKind;
  filePath: string;
  startLine: number;
  endLine: number;
}

export interface CallEdge {
  source: string;
  destination: string;
}

// ─── Components ──────────────────────────────────────────────────────────────

export interface SourceCodeReference {
  qualifiedName: string;
  referenceFile?: string;
  referenceStartLine?: number;
  referenceEndLine?: number;
}

export interface Relation {
  relation: string;
  srcName: string;
  dstName: string;
  srcId: string;
  dstId: string;
}

export interface MethodEntry {
  qualifiedName: string;
  kind: SymbolKind;
  startLine: number;
  endLine: number;
}

export interface FileMethodGroup {
  filePath: string;
  methods: MethodEntry[];
}

export interface Component {
  componentId: string;
  name: string;
  description: string;
  keyEntities: SourceCodeReference[];
  assignedFiles: string[];
  sourceClusterIds: number[];
  fileMethods: FileMethodGroup[];
}

export interface AnalysisInsights {
  description: string;
  components: Component[];
  componentsRelations: Relation[];
}

export interface SubAnalysis {
  analysis: AnalysisInsights;
  expandable: Component[];
}

// ─── Unified analysis document ───────────────────────────────────────────────

export interface ComponentJson extends Component {
  canExpand: boolean;
  components?: ComponentJson[];
  componentsRelations?: Relation[];
}

export interface AnalysisMetadata {
  engineVersion: string;
  generatedAt: string;
  repoName: string;
  depthLevel: number;
  fileCoverageSummary: FileCoverageSummary;
}

export interface UnifiedAnalysisJson {
  metadata: AnalysisMetadata;
  description: string;
  components: ComponentJson[];
  componentsRelations: Relation[];
}

// ─── File coverage ───────────────────────────────────────────────────────────

export type ExclusionReason =
  | "excluded-directory"
  | "excluded-pattern"
  | "declaration-file"
  | "test-file"
  | "not-parsed"
  | "unsupported-language";

export interface NotAnalyzedFile {
  path: string;
  reason: ExclusionReason;
}

export interface FileCoverageSummary {
  totalFiles: number;
  analyzed: number;
  notAnalyzed: number;
  notAnalyzedByReason: Partial<Record<ExclusionReason, number>>;
}

export interface FileCoverageReport {
  version: number;
  generatedAt: string;
  analyzedFiles: string[];
  notAnalyzedFiles: NotAnalyzedFile[];
  summary: FileCoverageSummary;
}

// ─── Errors ──────────────────────────────────────────────────────────────────

export class FileNotFoundError extends Error {
  constructor(
    public readonly filePath: string,
    cause?: Error,
  ) {
    super(`File not found: ${filePath}`);
    this.name = "FileNotFoundError";
    if (cause) this.cause = cause;
  }
}

export class GraphError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GraphError";
  }
}

export class AnalysisParseError extends Error {
  constructor(
    public readonly path: string,
    message: string,
  ) {
    super(`${path}: ${message}`);
    this.name = "AnalysisParseError";
  }
}

export class RenderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RenderError";
  }
}

// ─── Constants ───────────────────────────────────────────────────────────────

export const ENGINE_VERSION = "0.3.0";

export const UNCLASSIFIED_COMPONENT = "Unclassified";
export const ROOT_PARENT_ID = "root";

export const DEFAULT_EXCLUDE_DIRS = [
  "node_modules",
  "dist",
  "build",
  "out",
  "coverage",
  "__mocks__",
  ".git",
  ".clustermap",
  "vendor",
] as const;

export const SOURCE_EXTENSIONS = /\.(ts|tsx|mts|cts|js|jsx|mjs|cjs)$/;
export const DTS_EXTENSION = /\.d\.(ts|tsx|mts|cts)$/;
export const TEST_FILE_PATTERN = /\.(test|spec)\.(ts|tsx|mts|cts|js|jsx|mjs|cjs)$/;
