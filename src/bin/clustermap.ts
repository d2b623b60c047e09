#!/usr/bin/env node
// CLI entry point for clustermap

import { runCli } from "../cli.js";

async function main() {
  process.exit(await runCli(process.argv.slice(2)));
}

main().catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  process.stderr.write(`Fatal error: ${msg}\n`);
  process.exit(1);
});
