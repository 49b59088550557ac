export type CliArgs = {
  intakeDir?: string;
  outputDir?: string;
  dryRun: boolean;
};

/** `plan` always runs dry, so it passes `{ dryRunFlag: false }` to refuse the flag. */
export function parseArgs(argv: string[], { dryRunFlag = true } = {}): CliArgs {
  const args: CliArgs = { dryRun: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--dry-run" && dryRunFlag) {
      args.dryRun = true;
    } else if (arg === "--in" || arg === "--out") {
      const value = argv[i + 1];
      if (value === undefined || value.startsWith("--")) {
        throw new Error(`${arg} needs a directory`);
      }
      if (arg === "--in") args.intakeDir = value;
      else args.outputDir = value;
      i++;
    } else {
      throw new Error(`Unknown option: ${arg}`);
    }
  }

  return args;
}
