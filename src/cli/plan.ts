import path from "node:path";
import { loadConfig } from "../core/config.js";
import { OpenRouterClassifier } from "../core/llm-classify.js";
import { sortIntake } from "../core/sorter.js";
import { parseArgs } from "./args.js";

async function main() {
  const args = parseArgs(process.argv.slice(2), { dryRunFlag: false });
  const config = loadConfig();
  const outputDir = args.outputDir ? path.resolve(args.outputDir) : config.outputDir;

  const summary = await sortIntake({
    intakeDir: args.intakeDir ? path.resolve(args.intakeDir) : config.intakeDir,
    outputDir,
    classifier: new OpenRouterClassifier(config),
    dryRun: true,
  });

  console.log("");
  for (const result of summary.results) {
    if (result.target) {
      console.log(`${result.image} => ${path.relative(outputDir, result.target)}`);
    } else {
      console.log(`${result.image} => (skipped: ${result.reason})`);
    }
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
