// src/ast-parser.ts — AST Parser
// Extracts imports, declared symbols (with line ranges) and the calls made
// inside each symbol body. Parsing is syntactic only; no type checker.

import { readFileSync } from "node:fs";
import { relative, extname } from "node:path";
import ts from "typescript";
import type {
  ParsedFile,
  ImportEntry,
  ImportBinding,
  DeclaredSymbol,
  CallReference,
  Language,
  Warning,
} from "./types.js";
import { FileNotFoundError } from "./types.js";
import { isTestPath, toPosix } from "./file-discovery.js";

/**
 * Parse a single file into its imports and declared symbols.
 */
export function parseFile(
  filePath: string,
  repoDir: string,
  warnings: Warning[] = [],
): ParsedFile {
  const relPath = toPosix(relative(repoDir, filePath));
  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (err: unknown) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      throw new FileNotFoundError(filePath, err);
    }
    throw err;
  }
  return parseSource(relPath, content, warnings);
}

/**
 * Parse in-memory source text. `relPath` decides script kind and language.
 */
export function parseSource(
  relPath: string,
  content: string,
  warnings: Warning[] = [],
): ParsedFile {
  const sourceFile = ts.createSourceFile(
    relPath,
    content,
    ts.ScriptTarget.Latest,
    true,
    scriptKindFor(relPath),
  );

  const syntaxErrors = countSyntaxErrors(sourceFile);
  if (syntaxErrors > 0) {
    warnings.push({
      level: "warn",
      module: "ast-parser",
      message: `File ${relPath} has ${syntaxErrors} syntax error(s) — analysis may be incomplete.`,
      file: relPath,
    });
  }

  return {
    relativePath: relPath,
    language: languageOf(relPath),
    imports: extractImports(sourceFile),
    symbols: extractSymbols(sourceFile),
    lineCount: content.split("\n").length,
    isTestFile: isTestPath(relPath),
    hasSyntaxErrors: syntaxErrors > 0,
  };
}

export function languageOf(relPath: string): Language {
  return /\.(ts|tsx|mts|cts)$/.test(relPath) ? "typescript" : "javascript";
}

function scriptKindFor(relPath: string): ts.ScriptKind {
  const ext = extname(relPath).toLowerCase();
  switch (ext) {
    case ".tsx": return ts.ScriptKind.TSX;
    case ".jsx": return ts.ScriptKind.JSX;
    case ".js":
    case ".mjs":
    case ".cjs": return ts.ScriptKind.JS;
    default: return ts.ScriptKind.TS;
  }
}

function countSyntaxErrors(sourceFile: ts.SourceFile): number {
  // parseDiagnostics is populated by createSourceFile but not part of the public typings
  const diagnostics: unknown = Reflect.get(sourceFile, "parseDiagnostics");
  if (!Array.isArray(diagnostics)) return 0;
  let count = 0;
  for (const d of diagnostics) {
    if (isDiagnostic(d) && d.category === ts.DiagnosticCategory.Error) count++;
  }
  return count;
}

function isDiagnostic(value: unknown): value is ts.Diagnostic {
  return typeof value === "object" && value !== null && "category" in value;
}

// ─── Import Extraction ───────────────────────────────────────────────────────

function extractImports(sourceFile: ts.SourceFile): ImportEntry[] {
  const imports: ImportEntry[] = [];

  for (const stmt of sourceFile.statements) {
    if (ts.isImportDeclaration(stmt) && ts.isStringLiteral(stmt.moduleSpecifier)) {
      const bindings: ImportBinding[] = [];
      const clause = stmt.importClause;
      if (clause?.name) {
        bindings.push({ localName: clause.name.text, importedName: "default" });
      }
      if (clause?.namedBindings) {
        if (ts.isNamedImports(clause.namedBindings)) {
          for (const element of clause.namedBindings.elements) {
            bindings.push({
              localName: element.name.text,
              importedName: element.propertyName?.text ?? element.name.text,
            });
          }
        } else {
          bindings.push({ localName: clause.namedBindings.name.text, importedName: "*" });
        }
      }
      imports.push({
        moduleSpecifier: stmt.moduleSpecifier.text,
        bindings,
        isTypeOnly: clause?.isTypeOnly ?? false,
        isDynamic: false,
      });
      continue;
    }

    // const x = require("./x") / const { a, b: c } = require("./x")
    if (ts.isVariableStatement(stmt)) {
      for (const decl of stmt.declarationList.declarations) {
        const specifier = requireSpecifier(decl.initializer);
        if (specifier === undefined) continue;
        imports.push({
          moduleSpecifier: specifier,
          bindings: bindingsFromPattern(decl.name),
          isTypeOnly: false,
          isDynamic: false,
        });
      }
    }
  }

  walkForDynamicImports(sourceFile, imports);
  return imports;
}

function requireSpecifier(expr: ts.Expression | undefined): string | undefined {
  if (
    expr &&
    ts.isCallExpression(expr) &&
    ts.isIdentifier(expr.expression) &&
    expr.expression.text === "require" &&
    expr.arguments.length > 0
  ) {
    const arg = expr.arguments[0];
    if (ts.isStringLiteral(arg)) return arg.text;
  }
  return undefined;
}

function bindingsFromPattern(name: ts.BindingName): ImportBinding[] {
  if (ts.isIdentifier(name)) {
    return [{ localName: name.text, importedName: "*" }];
  }
  const bindings: ImportBinding[] = [];
  if (ts.isObjectBindingPattern(name)) {
    for (const el of name.elements) {
      if (!ts.isIdentifier(el.name)) continue;
      const imported = el.propertyName && ts.isIdentifier(el.propertyName)
        ? el.propertyName.text
        : el.name.text;
      bindings.push({ localName: el.name.text, importedName: imported });
    }
  }
  return bindings;
}

function walkForDynamicImports(node: ts.Node, imports: ImportEntry[]): void {
  if (
    ts.isCallExpression(node) &&
    node.expression.kind === ts.SyntaxKind.ImportKeyword &&
    node.arguments.length > 0
  ) {
    const arg = node.arguments[0];
    if (ts.isStringLiteral(arg)) {
      imports.push({ moduleSpecifier: arg.text, bindings: [], isTypeOnly: false, isDynamic: true });
    }
  }
  ts.forEachChild(node, (child) => walkForDynamicImports(child, imports));
}

// ─── Symbol Extraction ───────────────────────────────────────────────────────

function extractSymbols(sourceFile: ts.SourceFile): DeclaredSymbol[] {
  const symbols: DeclaredSymbol[] = [];

  for (const stmt of sourceFile.statements) {
    const isDefault = hasModifier(stmt, ts.SyntaxKind.DefaultKeyword);

    if (ts.isFunctionDeclaration(stmt) && stmt.body) {
      symbols.push(makeSymbol(
        sourceFile,
        stmt,
        stmt.name?.text ?? "default",
        "function",
        stmt.body,
        isDefault,
      ));
    } else if (ts.isClassDeclaration(stmt)) {
      const className = stmt.name?.text ?? "default";
      symbols.push({
        ...lineRange(sourceFile, stmt),
        name: className,
        kind: "class",
        isDefaultExport: isDefault,
        calls: collectHeritageCalls(stmt),
      });
      for (const member of stmt.members) {
        const memberSymbol = classMemberSymbol(sourceFile, className, member);
        if (memberSymbol) symbols.push(memberSymbol);
      }
    } else if (ts.isVariableStatement(stmt)) {
      for (const decl of stmt.declarationList.declarations) {
        if (!ts.isIdentifier(decl.name) || !decl.initializer) continue;
        const fn = unwrapFunction(decl.initializer);
        if (!fn) continue;
        symbols.push(makeSymbol(
          sourceFile,
          stmt,
          decl.name.text,
          ts.isArrowFunction(fn) ? "arrow" : "function",
          fn.body,
          false,
        ));
      }
    } else if (ts.isExportAssignment(stmt)) {
      const fn = unwrapFunction(stmt.expression);
      if (fn) {
        symbols.push(makeSymbol(sourceFile, stmt, "default", "function", fn.body, true));
      }
    }
  }

  return symbols;
}

function classMemberSymbol(
  sourceFile: ts.SourceFile,
  className: string,
  member: ts.ClassElement,
): DeclaredSymbol | undefined {
  if (ts.isConstructorDeclaration(member) && member.body) {
    return {
      ...makeSymbol(sourceFile, member, `${className}.constructor`, "constructor", member.body, false),
      className,
    };
  }
  if (
    (ts.isMethodDeclaration(member) || ts.isGetAccessorDeclaration(member) || ts.isSetAccessorDeclaration(member)) &&
    member.body &&
    isNamed(member.name)
  ) {
    return {
      ...makeSymbol(sourceFile, member, `${className}.${member.name.text}`, "method", member.body, false),
      className,
    };
  }
  // Arrow-function class fields: `handle = () => { ... }`
  if (ts.isPropertyDeclaration(member) && member.initializer && isNamed(member.name)) {
    const fn = unwrapFunction(member.initializer);
    if (fn) {
      return {
        ...makeSymbol(sourceFile, member, `${className}.${member.name.text}`, "method", fn.body, false),
        className,
      };
    }
  }
  return undefined;
}

function isNamed(name: ts.PropertyName): name is ts.Identifier | ts.PrivateIdentifier | ts.StringLiteral {
  return ts.isIdentifier(name) || ts.isPrivateIdentifier(name) || ts.isStringLiteral(name);
}

function unwrapFunction(expr: ts.Expression): ts.ArrowFunction | ts.FunctionExpression | undefined {
  let current = expr;
  while (ts.isParenthesizedExpression(current) || ts.isAsExpression(current) || ts.isSatisfiesExpression(current)) {
    current = current.expression;
  }
  if (ts.isArrowFunction(current) || ts.isFunctionExpression(current)) return current;
  return undefined;
}

function makeSymbol(
  sourceFile: ts.SourceFile,
  node: ts.Node,
  name: string,
  kind: DeclaredSymbol["kind"],
  body: ts.Node,
  isDefaultExport: boolean,
): DeclaredSymbol {
  const calls: CallReference[] = [];
  collectCalls(body, calls);
  return {
    ...lineRange(sourceFile, node),
    name,
    kind,
    isDefaultExport,
    calls: dedupeCalls(calls),
  };
}

function lineRange(sourceFile: ts.SourceFile, node: ts.Node): { startLine: number; endLine: number } {
  const start = sourceFile.getLineAndCharacterOfPosition(node.getStart(sourceFile));
  const end = sourceFile.getLineAndCharacterOfPosition(node.getEnd());
  return { startLine: start.line + 1, endLine: end.line + 1 };
}

function hasModifier(node: ts.Node, kind: ts.SyntaxKind): boolean {
  const modifiers = ts.canHaveModifiers(node) ? ts.getModifiers(node) : undefined;
  return modifiers?.some((m) => m.kind === kind) ?? false;
}

/** `class A extends B` — constructing A runs B. */
function collectHeritageCalls(decl: ts.ClassDeclaration): CallReference[] {
  const calls: CallReference[] = [];
  for (const clause of decl.heritageClauses ?? []) {
    if (clause.token !== ts.SyntaxKind.ExtendsKeyword) continue;
    for (const type of clause.types) {
      const ref = calleeOf(type.expression);
      if (ref) calls.push({ ...ref, isConstructor: true });
    }
  }
  return calls;
}

// ─── Call Collection ─────────────────────────────────────────────────────────

function collectCalls(node: ts.Node, calls: CallReference[]): void {
  if (ts.isCallExpression(node) && node.expression.kind !== ts.SyntaxKind.ImportKeyword) {
    const ref = calleeOf(node.expression);
    if (ref) calls.push({ ...ref, isConstructor: false });
  } else if (ts.isNewExpression(node)) {
    const ref = calleeOf(node.expression);
    if (ref) calls.push({ ...ref, isConstructor: true });
  }
  ts.forEachChild(node, (child) => collectCalls(child, calls));
}

function calleeOf(expr: ts.Expression): { callee: string; receiver?: string } | undefined {
  if (ts.isIdentifier(expr)) {
    return { callee: expr.text };
  }
  if (ts.isPropertyAccessExpression(expr) && ts.isIdentifier(expr.name)) {
    if (expr.expression.kind === ts.SyntaxKind.ThisKeyword) {
      return { callee: expr.name.text, receiver: "this" };
    }
    if (ts.isIdentifier(expr.expression)) {
      return { callee: expr.name.text, receiver: expr.expression.text };
    }
  }
  return undefined;
}

function dedupeCalls(calls: CallReference[]): CallReference[] {
  const seen = new Set<string>();
  const result: CallReference[] = [];
  for (const call of calls) {
    const key = `${call.receiver ?? ""}|${call.callee}|${call.isConstructor}`;
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(call);
  }
  return result;
}
