import type { CrossingEvent, Dimension, Snapshot, Tier } from "../types.js";
import { TIERS } from "../types.js";

/** Lower edges of the warning, danger and critical tiers, as fractions of 1. */
export type TierThresholds = {
  warning: number;
  danger: number;
  critical: number;
};

export const DEFAULT_THRESHOLDS: TierThresholds = {
  warning: 0.7,
  danger: 0.85,
  critical: 0.95,
};

export function tierRank(tier: Tier): number {
  return TIERS.indexOf(tier);
}

export function maxTier(a: Tier, b: Tier): Tier {
  return tierRank(a) >= tierRank(b) ? a : b;
}

/**
 * Maps a 0..100 usage percentage to its tier. Each tier includes its
 * lower edge, so exactly 70 is already `warning`.
 */
export function tierOf(percent: number, thresholds: TierThresholds = DEFAULT_THRESHOLDS): Tier {
  // Divide rather than scale the threshold: 0.7 * 100 is not exactly 70.
  const fraction = percent / 100;
  if (fraction >= thresholds.critical) return "critical";
  if (fraction >= thresholds.danger) return "danger";
  if (fraction >= thresholds.warning) return "warning";
  return "healthy";
}

function percentOf(snapshot: Snapshot, dimension: Dimension): number {
  return dimension === "fiveHour" ? snapshot.fiveHourPercent : snapshot.weeklyPercent;
}

/**
 * Upward tier transitions between two consecutive successful observations,
 * five-hour first. A missing previous observation counts as `healthy`.
 */
export function crossings(
  previous: Snapshot | null,
  current: Snapshot,
  thresholds: TierThresholds = DEFAULT_THRESHOLDS
): CrossingEvent[] {
  const events: CrossingEvent[] = [];

  for (const dimension of ["fiveHour", "weekly"] as const) {
    const fromTier: Tier = previous ? tierOf(percentOf(previous, dimension), thresholds) : "healthy";
    const percent = percentOf(current, dimension);
    const toTier = tierOf(percent, thresholds);
    if (tierRank(toTier) > tierRank(fromTier)) {
      events.push({ dimension, fromTier, toTier, percent, at: current.capturedAt });
    }
  }

  return events;
}
