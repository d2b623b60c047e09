import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { analyze, render, ENGINE_VERSION, FileCoverage } from "../src/index.js";
import { HAS_GIT, git, initRepo } from "./helpers.js";

const FIXTURES = fileURLToPath(new URL("fixtures", import.meta.url));
const SHOP = resolve(FIXTURES, "shop-app");

describe("analyze (shop-app fixture)", () => {
  it("runs cleanly and parses every source file", async () => {
    const result = await analyze({ repoDir: SHOP });
    expect(result.warnings).toEqual([]);
    expect(result.analyzedFiles).toEqual([
      "src/orders/order-service.ts",
      "src/orders/order-validator.ts",
      "src/payments/ledger.ts",
      "src/payments/payment-gateway.ts",
      "src/utils/format.ts",
    ]);
  });

  it("builds the call graph across files", async () => {
    const { graph } = await analyze({ repoDir: SHOP });
    expect(graph.nodes.size).toBe(6);
    expect(graph.callees("src.orders.order-service.placeOrder")).toEqual([
      "src.orders.order-service.persistOrder",
      "src.orders.order-validator.validateOrder",
      "src.payments.payment-gateway.charge",
    ]);
    expect(graph.callees("src.payments.payment-gateway.refund")).toEqual([
      "src.payments.ledger.record",
      "src.payments.payment-gateway.charge",
    ]);
    expect(graph.nodes.get("src.payments.payment-gateway.refund")?.kind).toBe("arrow");
  });

  it("derives one component per feature directory", async () => {
    const { analysis } = await analyze({ repoDir: SHOP });
    expect(analysis.description).toBe(
      "shop-app is organized into 2 components derived from 2 call-graph clusters across 5 files. " +
        "1 file falls outside every cluster.",
    );
    expect(analysis.components.map((c) => [c.name, c.assignedFiles])).toEqual([
      ["Orders", ["src/orders/order-service.ts", "src/orders/order-validator.ts"]],
      ["Payments", ["src/payments/ledger.ts", "src/payments/payment-gateway.ts"]],
      ["Unclassified", ["src/utils/format.ts"]],
    ]);
    expect(analysis.components.every((c) => !c.canExpand)).toBe(true);
  });

  it("names key entities with their source ranges", async () => {
    const { analysis } = await analyze({ repoDir: SHOP });
    const [orders, payments] = analysis.components;
    expect(orders.keyEntities[0]).toEqual({
      qualifiedName: "src.orders.order-service.placeOrder",
      referenceFile: "src/orders/order-service.ts",
      referenceStartLine: 7,
      referenceEndLine: 11,
    });
    expect(payments.keyEntities.map((e) => e.qualifiedName)).toEqual([
      "src.payments.payment-gateway.charge",
      "src.payments.ledger.record",
      "src.payments.payment-gateway.refund",
    ]);
  });

  it("relates the components that call each other", async () => {
    const { analysis } = await analyze({ repoDir: SHOP });
    const [orders, payments] = analysis.components;
    expect(analysis.componentsRelations).toEqual([
      { relation: "calls", srcName: "Orders", dstName: "Payments", srcId: orders.componentId, dstId: payments.componentId },
    ]);
  });

  it("records metadata and file coverage", async () => {
    const { analysis, coverage } = await analyze({ repoDir: SHOP });
    expect(analysis.metadata.engineVersion).toBe(ENGINE_VERSION);
    expect(analysis.metadata.repoName).toBe("shop-app");
    expect(analysis.metadata.depthLevel).toBe(1);
    expect(coverage.notAnalyzedFiles).toEqual([
      { path: "README.md", reason: "unsupported-language" },
      { path: "src/orders/order-service.test.ts", reason: "test-file" },
      { path: "src/types.d.ts", reason: "declaration-file" },
      { path: "vendor/legacy.js", reason: "excluded-directory" },
    ]);
    expect(analysis.metadata.fileCoverageSummary).toEqual({
      totalFiles: 9,
      analyzed: 5,
      notAnalyzed: 4,
      notAnalyzedByReason: {
        "unsupported-language": 1,
        "test-file": 1,
        "declaration-file": 1,
        "excluded-directory": 1,
      },
    });
  });

  it("analyzes tests on request", async () => {
    const { analysis, analyzedFiles } = await analyze({ repoDir: SHOP, includeTests: true });
    expect(analyzedFiles).toContain("src/orders/order-service.test.ts");
    expect(analysis.components.at(-1)?.assignedFiles).toEqual([
      "src/orders/order-service.test.ts",
      "src/utils/format.ts",
    ]);
  });

  it("honors exclude globs", async () => {
    const { analysis, coverage } = await analyze({ repoDir: SHOP, exclude: ["src/utils/**"] });
    expect(analysis.components.map((c) => c.name)).toEqual(["Orders", "Payments"]);
    expect(coverage.notAnalyzedFiles).toContainEqual({ path: "src/utils/format.ts", reason: "excluded-pattern" });
  });

  it("renders the overview page", async () => {
    const { analysis } = await analyze({ repoDir: SHOP });
    const files = render(analysis, "markdown", { repoUrl: "https://example.com/shop" });
    expect(files.map((f) => f.filename)).toEqual(["overview.md"]);
    expect(files[0].content).toContain(
      "- [`src.orders.order-service.placeOrder`:7-11](https://example.com/shop/blob/main/src/orders/order-service.ts#L7-L11)",
    );
  });
});

describe.skipIf(!HAS_GIT)("analyze with --since", () => {
  let repo: string;
  let out: string;

  beforeEach(() => {
    repo = mkdtempSync(join(tmpdir(), "clustermap-since-"));
    out = mkdtempSync(join(tmpdir(), "clustermap-since-out-"));
    initRepo(repo, {
      "docs/guide.md": "# Guide\n",
      "src/a.ts": "import { b } from \"./b.js\";\n\nexport function a(): number {\n  return b();\n}\n",
      "src/b.ts": "export function b(): number {\n  return 1;\n}\n",
      "src/legacy.ts": "export function old(): string {\n  return \"legacy\";\n}\n",
    });
    const everything = ["docs/guide.md", "src/a.ts", "src/b.ts", "src/legacy.ts"];
    FileCoverage.save(out, new FileCoverage(repo).build(everything, everything));

    git(repo, "mv", "src/b.ts", "src/bee.ts");
    git(repo, "rm", "-q", "src/legacy.ts");
    git(repo, "commit", "-q", "-m", "rename and drop");
  });

  afterEach(() => {
    rmSync(repo, { recursive: true, force: true });
    rmSync(out, { recursive: true, force: true });
  });

  it("carries the earlier report forward through renames and deletions", async () => {
    const { coverage, warnings } = await analyze({
      repoDir: repo,
      since: "HEAD~1",
      output: { format: "json", dir: out },
    });
    expect(coverage.analyzedFiles).toEqual(["docs/guide.md", "src/a.ts", "src/bee.ts"]);
    expect(coverage.notAnalyzedFiles).toEqual([]);
    expect(warnings.filter((w) => w.module === "file-coverage" || w.module === "change-detector")).toEqual([]);
  });

  it("builds a fresh report without a base ref", async () => {
    const { coverage } = await analyze({ repoDir: repo, output: { format: "json", dir: out } });
    expect(coverage.analyzedFiles).toEqual(["src/a.ts", "src/bee.ts"]);
    expect(coverage.notAnalyzedFiles).toEqual([{ path: "docs/guide.md", reason: "unsupported-language" }]);
  });
});
