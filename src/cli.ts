import { ConfigError } from "./errors.js";
import { HELP_TEXT, parseArgs, UsageArgError } from "./args.js";
import { run } from "./main.js";

function printHelp(): void {
  process.stdout.write(HELP_TEXT);
}

async function main(): Promise<void> {
  try {
    const parsed = parseArgs(process.argv.slice(2));
    if (parsed.help) {
      printHelp();
      process.exit(0);
    }
    const exitCode = await run(parsed.opts);
    process.exit(exitCode);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`${msg}\n\n`);
    if (err instanceof UsageArgError) printHelp();
    process.exit(err instanceof UsageArgError || err instanceof ConfigError ? 2 : 3);
  }
}

void main();
