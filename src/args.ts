import type { RunOptions } from "./main.js";

export class UsageArgError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageArgError";
  }
}

export type ParsedArgs = { help: true } | { help: false; opts: RunOptions };

export const HELP_TEXT = `quota-watch

Watches Claude Code 5-hour and weekly usage limits and alerts near the limit.

Usage:
  quota-watch [options]

Options:
  --once                 Check once, print, and exit (0 live, 1 stale, 3 unavailable)
  --json                 Print machine-readable JSON
  --interval <secs>      Poll interval in seconds (default: 120)
  --config <path>        Settings file (default: ~/.config/quota-watch/config.json)
  --no-desktop           Alert in the terminal only
  --debug                Print debug diagnostics (no secrets)
  -h, --help             Show help

While watching, type "r" and Enter to refresh now.
`;

function requireValue(argv: string[], i: number, flag: string): string {
  const raw = argv[i + 1];
  if (!raw || raw.startsWith("-")) {
    throw new UsageArgError(`${flag} requires a value`);
  }
  return raw;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const opts: RunOptions = {
    once: false,
    json: false,
    debug: false,
    desktop: null,
    intervalSecs: null,
    configPath: null,
  };

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === "-h" || a === "--help") return { help: true };
    if (a === "--once") {
      opts.once = true;
      continue;
    }
    if (a === "--json") {
      opts.json = true;
      continue;
    }
    if (a === "--debug") {
      opts.debug = true;
      continue;
    }
    if (a === "--no-desktop") {
      opts.desktop = false;
      continue;
    }
    if (a === "--interval") {
      const raw = requireValue(argv, i, "--interval");
      i++;
      const n = Number(raw);
      if (!Number.isInteger(n) || n <= 0) {
        throw new UsageArgError(`--interval must be a positive whole number of seconds, got ${raw}`);
      }
      opts.intervalSecs = n;
      continue;
    }
    if (a === "--config") {
      opts.configPath = requireValue(argv, i, "--config");
      i++;
      continue;
    }

    throw new UsageArgError(`Unknown argument: ${a}`);
  }

  return { help: false, opts };
}

