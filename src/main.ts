import readline from "node:readline";

import { Poller } from "./core/poller.js";
import { createLogger, type Logger } from "./log.js";
import { createNotifier } from "./notifiers/index.js";
import { renderDetail, renderLabel } from "./output.js";
import { AnthropicUsageClient } from "./providers/anthropicUsageClient.js";
import { ClaudeCredentialSource } from "./providers/credentials.js";
import { loadSettings, type Settings, type SettingsOverrides } from "./settings.js";
import { CurrentStateSchema, type CurrentState } from "./types.js";

export type RunOptions = {
  once: boolean;
  json: boolean;
  debug: boolean;
  desktop: boolean | null;
  intervalSecs: number | null;
  configPath: string | null;
};

function cliOverrides(opts: RunOptions): SettingsOverrides {
  const out: SettingsOverrides = {};
  if (opts.debug) out.debug = true;
  if (opts.desktop !== null) out.desktopNotifications = opts.desktop;
  if (opts.intervalSecs !== null) out.pollIntervalSecs = opts.intervalSecs;
  return out;
}

export function createPoller(settings: Settings, logger: Logger): Poller {
  return new Poller(
    {
      credentials: new ClaudeCredentialSource({ logger }),
      client: new AnthropicUsageClient({ timeoutMs: settings.requestTimeoutMs }),
      notifier: createNotifier({ desktop: settings.desktopNotifications }),
      logger,
    },
    {
      intervalMs: settings.pollIntervalSecs * 1000,
      thresholds: settings.thresholds,
      notifyTiers: settings.notifyTiers,
    }
  );
}

// Exit codes for --once:
// 0: live data
// 1: stale data (last check failed)
// 2: usage/config error (handled in cli.ts)
// 3: no data at all
export function exitCodeFor(state: CurrentState): number {
  switch (state.freshness) {
    case "live":
      return 0;
    case "stale":
      return 1;
    case "unavailable":
      return 3;
  }
}

function print(state: CurrentState, settings: Settings, json: boolean): void {
  if (json) {
    // Validate final shape.
    const checked = CurrentStateSchema.parse(state);
    process.stdout.write(`${JSON.stringify(checked, null, 2)}\n`);
    return;
  }
  process.stdout.write(`${renderLabel(state, settings.thresholds)}\n${renderDetail(state)}\n`);
}

function watch(poller: Poller, settings: Settings, json: boolean, logger: Logger): Promise<number> {
  return new Promise((resolve) => {
    const unsubscribe = poller.subscribe((state) => {
      if (!json) process.stdout.write("\n");
      print(state, settings, json);
    });

    const rl = readline.createInterface({ input: process.stdin });
    rl.on("line", (line) => {
      if (line.trim().toLowerCase() !== "r") return;
      logger.debug("manual refresh requested");
      void poller.refreshNow();
    });

    const shutdown = () => {
      poller.stop();
      unsubscribe();
      rl.close();
      resolve(0);
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);

    poller.start();
    logger.info(`polling every ${settings.pollIntervalSecs}s; type "r" + Enter to refresh now`);
  });
}

export async function run(opts: RunOptions): Promise<number> {
  const settings = await loadSettings({
    ...(opts.configPath ? { path: opts.configPath } : {}),
    overrides: cliOverrides(opts),
  });
  const logger = createLogger({ debug: settings.debug });
  const poller = createPoller(settings, logger);

  if (opts.once) {
    const state = await poller.pollOnce();
    print(state, settings, opts.json);
    return exitCodeFor(state);
  }

  return watch(poller, settings, opts.json, logger);
}
