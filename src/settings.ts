import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { z } from "zod";

import { ConfigError } from "./errors.js";

const Fraction = z.number().min(0).max(1);

const ThresholdsSchema = z.object({
  warning: Fraction,
  danger: Fraction,
  critical: Fraction,
});

const SettingsSchema = z.object({
  pollIntervalSecs: z.number().int().min(10).max(60 * 60),
  thresholds: ThresholdsSchema.refine((t) => t.warning < t.danger && t.danger < t.critical, {
    message: "thresholds must be strictly ascending (warning < danger < critical)",
  }),
  notifyTiers: z.array(z.enum(["warning", "danger", "critical"])).min(1),
  desktopNotifications: z.boolean(),
  requestTimeoutMs: z.number().int().min(1000).max(120_000),
  debug: z.boolean(),
});

export type Settings = z.infer<typeof SettingsSchema>;

const SettingsFileSchema = SettingsSchema.omit({ thresholds: true })
  .extend({ thresholds: ThresholdsSchema.partial() })
  .partial()
  .strict();

export type SettingsOverrides = z.infer<typeof SettingsFileSchema>;

export const DEFAULT_SETTINGS: Settings = {
  pollIntervalSecs: 120,
  thresholds: {
    warning: 0.7,
    danger: 0.85,
    critical: 0.95,
  },
  notifyTiers: ["danger", "critical"],
  desktopNotifications: true,
  requestTimeoutMs: 10_000,
  debug: false,
};

function defaultConfigDir(env: NodeJS.ProcessEnv): string {
  if (process.platform === "win32") {
    const base = env.APPDATA;
    if (base && base.trim()) return base;
  }
  const xdg = env.XDG_CONFIG_HOME;
  if (xdg && xdg.trim()) return xdg;
  return path.join(os.homedir(), ".config");
}

export function getSettingsPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.QUOTA_WATCH_CONFIG_PATH;
  if (override && override.trim()) return override;
  return path.join(defaultConfigDir(env), "quota-watch", "config.json");
}

function formatIssues(err: z.ZodError): string {
  return err.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
}

async function readSettingsFile(p: string): Promise<SettingsOverrides> {
  let raw: string;
  try {
    raw = await fs.readFile(p, "utf8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return {};
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`cannot read ${p}: ${msg}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`${p} is not valid JSON: ${msg}`);
  }

  const parsed = SettingsFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(`invalid settings in ${p}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function settingsFromEnv(env: NodeJS.ProcessEnv): SettingsOverrides {
  const out: SettingsOverrides = {};

  const interval = env.QUOTA_WATCH_INTERVAL_SECS;
  if (interval && interval.trim()) {
    const n = Number(interval);
    if (!Number.isFinite(n)) {
      throw new ConfigError(`QUOTA_WATCH_INTERVAL_SECS must be a number, got "${interval}"`);
    }
    out.pollIntervalSecs = n;
  }

  const debug = env.QUOTA_WATCH_DEBUG?.trim().toLowerCase();
  if (debug === "1" || debug === "true") out.debug = true;

  return out;
}

export function mergeSettings(base: Settings, ...layers: SettingsOverrides[]): Settings {
  let merged: Settings = base;
  for (const layer of layers) {
    const { thresholds, ...rest } = layer;
    merged = {
      ...merged,
      ...rest,
      thresholds: { ...merged.thresholds, ...thresholds },
    };
  }

  const parsed = SettingsSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(`invalid settings: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export type LoadSettingsOptions = {
  path?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: SettingsOverrides;
};

/** Defaults, then the settings file, then env, then explicit overrides (CLI flags). */
export async function loadSettings(opts: LoadSettingsOptions = {}): Promise<Settings> {
  const env = opts.env ?? process.env;
  const fromFile = await readSettingsFile(opts.path ?? getSettingsPath(env));
  return mergeSettings(DEFAULT_SETTINGS, fromFile, settingsFromEnv(env), opts.overrides ?? {});
}
