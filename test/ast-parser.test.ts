import { describe, it, expect } from "vitest";
import { resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { parseFile, parseSource, languageOf } from "../src/ast-parser.js";
import { FileNotFoundError } from "../src/types.js";
import type { Warning } from "../src/types.js";

const FIXTURES = fileURLToPath(new URL("fixtures", import.meta.url));
const SHOP = resolve(FIXTURES, "shop-app");

const WIDGET_SOURCE = [
  'import fs from "node:fs";',
  'import { a, b as bee } from "./lib.js";',
  'import * as util from "./util";',
  'import type { T } from "./types.js";',
  'const { helper, other: alias } = require("./helpers");',
  "",
  "export function run(): void {",
  "  a();",
  "  bee();",
  "  util.format();",
  "  new Widget();",
  "}",
  "",
  "export class Widget extends Base {",
  "  constructor() {",
  "    super();",
  "    this.init();",
  "  }",
  "",
  "  init(): void {",
  "    helper();",
  "  }",
  "",
  "  handle = () => {",
  "    this.init();",
  "  };",
  "}",
  "",
  'export const load = async () => import("./lazy.js");',
  "",
  "export default function () {",
  "  run();",
  "}",
].join("\n");

describe("parseSource", () => {
  const pf = parseSource("src/widget.ts", WIDGET_SOURCE);

  describe("import extraction", () => {
    it("records default, named, aliased and namespace bindings", () => {
      expect(pf.imports[0]).toEqual({
        moduleSpecifier: "node:fs",
        bindings: [{ localName: "fs", importedName: "default" }],
        isTypeOnly: false,
        isDynamic: false,
      });
      expect(pf.imports[1].bindings).toEqual([
        { localName: "a", importedName: "a" },
        { localName: "bee", importedName: "b" },
      ]);
      expect(pf.imports[2].bindings).toEqual([{ localName: "util", importedName: "*" }]);
    });

    it("flags type-only imports", () => {
      expect(pf.imports[3].moduleSpecifier).toBe("./types.js");
      expect(pf.imports[3].isTypeOnly).toBe(true);
    });

    it("reads destructured require() calls", () => {
      expect(pf.imports[4]).toEqual({
        moduleSpecifier: "./helpers",
        bindings: [
          { localName: "helper", importedName: "helper" },
          { localName: "alias", importedName: "other" },
        ],
        isTypeOnly: false,
        isDynamic: false,
      });
    });

    it("records dynamic import() last, without bindings", () => {
      expect(pf.imports).toHaveLength(6);
      expect(pf.imports[5]).toEqual({
        moduleSpecifier: "./lazy.js",
        bindings: [],
        isTypeOnly: false,
        isDynamic: true,
      });
    });

    it("binds a plain require() to the whole module", () => {
      const cjs = parseSource("lib/a.js", 'const store = require("./store");\n');
      expect(cjs.imports[0].bindings).toEqual([{ localName: "store", importedName: "*" }]);
    });
  });

  describe("symbol extraction", () => {
    it("lists declared symbols in source order", () => {
      expect(pf.symbols.map((s) => s.name)).toEqual([
        "run",
        "Widget",
        "Widget.constructor",
        "Widget.init",
        "Widget.handle",
        "load",
        "default",
      ]);
    });

    it("records kinds and 1-based line ranges", () => {
      const byName = new Map(pf.symbols.map((s) => [s.name, s]));
      expect(byName.get("run")).toMatchObject({ kind: "function", startLine: 7, endLine: 12 });
      expect(byName.get("Widget")).toMatchObject({ kind: "class", startLine: 14, endLine: 27 });
      expect(byName.get("Widget.constructor")).toMatchObject({
        kind: "constructor",
        startLine: 15,
        endLine: 18,
        className: "Widget",
      });
      expect(byName.get("Widget.init")).toMatchObject({ kind: "method", startLine: 20, endLine: 22 });
      expect(byName.get("Widget.handle")).toMatchObject({ kind: "method", startLine: 24, endLine: 26 });
      expect(byName.get("load")).toMatchObject({ kind: "arrow", startLine: 29, endLine: 29 });
    });

    it("marks the anonymous default export", () => {
      const def = pf.symbols.find((s) => s.name === "default");
      expect(def?.isDefaultExport).toBe(true);
      expect(def?.kind).toBe("function");
      expect(pf.symbols.filter((s) => s.isDefaultExport)).toHaveLength(1);
    });

    it("names `export default` function expressions default", () => {
      const exp = parseSource("src/handler.ts", "export default (() => {\n  go();\n});\n");
      expect(exp.symbols).toHaveLength(1);
      expect(exp.symbols[0]).toMatchObject({ name: "default", isDefaultExport: true });
      expect(exp.symbols[0].calls).toEqual([{ callee: "go", isConstructor: false }]);
    });
  });

  describe("call collection", () => {
    it("collects bare, receiver and constructor calls", () => {
      const run = pf.symbols.find((s) => s.name === "run");
      expect(run?.calls).toEqual([
        { callee: "a", isConstructor: false },
        { callee: "bee", isConstructor: false },
        { callee: "format", receiver: "util", isConstructor: false },
        { callee: "Widget", isConstructor: true },
      ]);
    });

    it("treats extends as a constructor call", () => {
      const widget = pf.symbols.find((s) => s.name === "Widget");
      expect(widget?.calls).toEqual([{ callee: "Base", isConstructor: true }]);
    });

    it("keeps this-calls and skips super()", () => {
      const ctor = pf.symbols.find((s) => s.name === "Widget.constructor");
      expect(ctor?.calls).toEqual([{ callee: "init", receiver: "this", isConstructor: false }]);
      const handle = pf.symbols.find((s) => s.name === "Widget.handle");
      expect(handle?.calls).toEqual([{ callee: "init", receiver: "this", isConstructor: false }]);
    });

    it("ignores dynamic import() as a call", () => {
      const load = pf.symbols.find((s) => s.name === "load");
      expect(load?.calls).toEqual([]);
    });

    it("deduplicates repeated calls", () => {
      const dup = parseSource("src/dup.ts", "function f() {\n  g();\n  g();\n  x.g();\n}\n");
      expect(dup.symbols[0].calls).toEqual([
        { callee: "g", isConstructor: false },
        { callee: "g", receiver: "x", isConstructor: false },
      ]);
    });
  });

  describe("file facts", () => {
    it("derives language from the extension", () => {
      expect(pf.language).toBe("typescript");
      expect(languageOf("src/a.mts")).toBe("typescript");
      expect(languageOf("src/a.jsx")).toBe("javascript");
      expect(languageOf("src/a.cjs")).toBe("javascript");
    });

    it("flags test files", () => {
      expect(parseSource("src/a.test.ts", "").isTestFile).toBe(true);
      expect(parseSource("src/__tests__/a.ts", "").isTestFile).toBe(true);
      expect(pf.isTestFile).toBe(false);
    });

    it("warns about syntax errors and keeps going", () => {
      const warnings: Warning[] = [];
      const broken = parseSource("src/broken.ts", "function ok() {}\nfunction (\n", warnings);
      expect(broken.hasSyntaxErrors).toBe(true);
      expect(broken.symbols.map((s) => s.name)).toContain("ok");
      expect(warnings).toHaveLength(1);
      expect(warnings[0].module).toBe("ast-parser");
      expect(warnings[0].file).toBe("src/broken.ts");
      expect(warnings[0].message).toMatch(/^File src\/broken\.ts has \d+ syntax error\(s\)/);
    });

    it("emits no warning for clean files", () => {
      const warnings: Warning[] = [];
      parseSource("src/widget.ts", WIDGET_SOURCE, warnings);
      expect(warnings).toEqual([]);
    });
  });
});

describe("parseFile", () => {
  it("reads a fixture file relative to its repository", () => {
    const pf = parseFile(resolve(SHOP, "src/payments/payment-gateway.ts"), SHOP);
    expect(pf.relativePath).toBe("src/payments/payment-gateway.ts");
    expect(pf.symbols.map((s) => [s.name, s.kind, s.startLine, s.endLine])).toEqual([
      ["charge", "function", 3, 6],
      ["refund", "arrow", 8, 11],
    ]);
    expect(pf.imports[0].moduleSpecifier).toBe("./ledger.js");
  });

  it("throws FileNotFoundError for a missing file", () => {
    expect(() => parseFile(resolve(SHOP, "src/missing.ts"), SHOP)).toThrow(FileNotFoundError);
  });
});
