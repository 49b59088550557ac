#!/usr/bin/env node
import path from "node:path";
import { loadConfig } from "../core/config.js";
import { OpenRouterClassifier } from "../core/llm-classify.js";
import { sortIntake } from "../core/sorter.js";
import { parseArgs } from "./args.js";

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const config = loadConfig();

  await sortIntake({
    intakeDir: args.intakeDir ? path.resolve(args.intakeDir) : config.intakeDir,
    outputDir: args.outputDir ? path.resolve(args.outputDir) : config.outputDir,
    classifier: new OpenRouterClassifier(config),
    dryRun: args.dryRun,
    auditLog: args.dryRun ? null : config.auditLog,
  });
}

main().catch((err) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
