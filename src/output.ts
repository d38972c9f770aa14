import { isAuthProblem } from "./errors.js";
import { maxTier, tierOf, DEFAULT_THRESHOLDS, type TierThresholds } from "./core/tier.js";
import type { CurrentState, Tier } from "./types.js";

const TIER_ICON: Record<Tier, string> = {
  healthy: "🟢",
  warning: "🟡",
  danger: "🟠",
  critical: "🔴",
};

function pct(percent: number): string {
  return `${Math.round(percent)}%`;
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

export function formatResetIn(resetAt: string | null, now = new Date()): string {
  if (!resetAt) return "unknown";
  const t = Date.parse(resetAt);
  if (!Number.isFinite(t)) return "unknown";

  const totalSeconds = Math.floor((t - now.getTime()) / 1000);
  if (totalSeconds < 0) return "soon";

  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  if (hours > 24) return `in ${Math.floor(hours / 24)}d`;
  if (hours > 0) return `in ${hours}h ${minutes}m`;
  return `in ${minutes}m`;
}

/** Compact status-bar style label, e.g. "🟠 88%". */
export function renderLabel(state: CurrentState, thresholds: TierThresholds = DEFAULT_THRESHOLDS): string {
  if (isAuthProblem(state.lastError)) return "🔑 auth";

  const s = state.snapshot;
  if (!s) return "⚠️ --";

  const worst = maxTier(tierOf(s.fiveHourPercent, thresholds), tierOf(s.weeklyPercent, thresholds));
  const label = `${TIER_ICON[worst]} ${pct(s.fiveHourPercent)}`;
  return state.freshness === "stale" ? `${label} (stale)` : label;
}

export function renderDetail(state: CurrentState, now = new Date()): string {
  const lines: string[] = [];
  const s = state.snapshot;

  if (s) {
    lines.push(`5h: ${pct(s.fiveHourPercent)} used • resets ${formatResetIn(s.fiveHourResetAt, now)}`);
    lines.push(`Weekly: ${pct(s.weeklyPercent)} used • resets ${formatResetIn(s.weeklyResetAt, now)}`);
  } else {
    lines.push("5h: --");
    lines.push("Weekly: --");
  }

  const checked = state.lastCheckedAt ? new Date(state.lastCheckedAt) : null;
  const updated = s ? new Date(s.capturedAt) : null;
  lines.push(`Updated: ${updated ? `${pad2(updated.getHours())}:${pad2(updated.getMinutes())}` : "--"}`);
  if (state.freshness === "stale" && checked) {
    lines.push(`Last check failed at ${pad2(checked.getHours())}:${pad2(checked.getMinutes())}`);
  }

  if (state.lastError) {
    const action = state.actionable ? ` (next: ${state.actionable})` : "";
    lines.push(`Error: ${state.lastError}: ${state.lastErrorMessage ?? "unknown"}${action}`);
  }

  return lines.join("\n");
}
