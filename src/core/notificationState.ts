import type { Dimension, Tier } from "../types.js";

/** Tiers already alerted per dimension since that dimension was last healthy. */
export type AlertLatch = Readonly<Record<Dimension, readonly Tier[]>>;

export const EMPTY_LATCH: AlertLatch = {
  fiveHour: [],
  weekly: [],
};

export function hasFired(latch: AlertLatch, dimension: Dimension, tier: Tier): boolean {
  return latch[dimension].includes(tier);
}

export function latchTier(latch: AlertLatch, dimension: Dimension, tier: Tier): AlertLatch {
  if (hasFired(latch, dimension, tier)) return latch;
  return { ...latch, [dimension]: [...latch[dimension], tier] };
}

export function clearDimension(latch: AlertLatch, dimension: Dimension): AlertLatch {
  if (latch[dimension].length === 0) return latch;
  return { ...latch, [dimension]: [] };
}
