// src/change-detector.ts — Rename-aware change detection
// Reads `git diff --name-status -M -C` between two refs.

import { execFileSync } from "node:child_process";
import { resolve } from "node:path";
import type { Warning } from "./types.js";

export type ChangeType = "A" | "C" | "D" | "M" | "R" | "T" | "U" | "X";

const CHANGE_TYPES: readonly ChangeType[] = ["A", "C", "D", "M", "R", "T", "U", "X"];

export interface DetectedChange {
  changeType: ChangeType;
  filePath: string; // current/new path
  oldPath?: string; // renames and copies
  similarity?: number; // 0-100
}

function isChangeType(value: string): value is ChangeType {
  return CHANGE_TYPES.some((t) => t === value);
}

/**
 * Parse one `--name-status` line. Returns null for malformed lines and
 * unknown status letters.
 */
export function parseStatusLine(line: string): DetectedChange | null {
  const parts = line.split("\t");
  if (parts.length < 2 || parts[0].length === 0) return null;

  const status = parts[0];
  const letter = status[0].toUpperCase();
  if (!isChangeType(letter)) return null;

  if (letter === "R" || letter === "C") {
    if (parts.length < 3) return null;
    const similarity = Number.parseInt(status.slice(1), 10);
    return {
      changeType: letter,
      filePath: parts[2],
      oldPath: parts[1],
      ...(Number.isNaN(similarity) ? {} : { similarity }),
    };
  }

  return { changeType: letter, filePath: parts[1] };
}

export class ChangeSet {
  constructor(
    readonly changes: DetectedChange[] = [],
    readonly baseRef = "",
    readonly targetRef = "HEAD",
  ) {}

  /** old path → new path */
  get renames(): Map<string, string> {
    const renames = new Map<string, string>();
    for (const c of this.changes) {
      if (c.changeType === "R" && c.oldPath) renames.set(c.oldPath, c.filePath);
    }
    return renames;
  }

  get modifiedFiles(): string[] {
    return this.pathsOf("M");
  }

  get addedFiles(): string[] {
    return this.pathsOf("A");
  }

  get deletedFiles(): string[] {
    return this.pathsOf("D");
  }

  get allAffectedFiles(): Set<string> {
    return new Set(this.changes.map((c) => c.filePath));
  }

  isEmpty(): boolean {
    return this.changes.length === 0;
  }

  hasStructuralChanges(): boolean {
    return this.changes.some((c) => c.changeType === "A" || c.changeType === "D");
  }

  hasOnlyRenames(): boolean {
    return this.changes.length > 0 && this.changes.every((c) => c.changeType === "R");
  }

  private pathsOf(type: ChangeType): string[] {
    return this.changes.filter((c) => c.changeType === type).map((c) => c.filePath);
  }
}

/**
 * Detect file changes between two refs. Git failures yield an empty set and
 * a warning.
 */
export function detectChanges(
  repoDir: string,
  baseRef: string,
  targetRef = "HEAD",
  warnings: Warning[] = [],
): ChangeSet {
  const badRef = [baseRef, targetRef].find((ref) => ref.startsWith("-"));
  if (badRef !== undefined) {
    warnings.push({
      level: "warn",
      module: "change-detector",
      message: `Refusing git ref "${badRef}": refs may not start with "-"`,
    });
    return new ChangeSet([], baseRef, targetRef);
  }

  const args = ["diff", "--name-status", "-M", "-C", "--find-renames=50%", baseRef];
  if (targetRef) args.push(targetRef);
  args.push("--");

  let output: string;
  try {
    output = execFileSync("git", args, {
      cwd: resolve(repoDir),
      encoding: "utf-8",
      timeout: 10000,
      stdio: ["pipe", "pipe", "pipe"],
    });
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({
      level: "warn",
      module: "change-detector",
      message: `git diff ${baseRef}..${targetRef} failed: ${msg.split("\n")[0]}`,
    });
    return new ChangeSet([], baseRef, targetRef);
  }

  const changes: DetectedChange[] = [];
  for (const line of output.split("\n")) {
    if (!line.trim()) continue;
    const change = parseStatusLine(line);
    if (change) {
      changes.push(change);
    } else {
      warnings.push({
        level: "info",
        module: "change-detector",
        message: `Unrecognized git status line: ${line}`,
      });
    }
  }
  return new ChangeSet(changes, baseRef, targetRef);
}
