import type { CrossingEvent, Snapshot, Tier } from "../types.js";
import {
  clearDimension,
  hasFired,
  latchTier,
  type AlertLatch,
} from "./notificationState.js";
import { tierOf, type TierThresholds } from "./tier.js";

export type NotificationPolicyConfig = {
  thresholds: TierThresholds;
  notifyTiers: readonly Tier[];
};

export const DEFAULT_NOTIFY_TIERS: readonly Tier[] = ["danger", "critical"];

export type NotificationEvaluation = {
  events: CrossingEvent[];
  nextLatch: AlertLatch;
};

export function evaluateNotificationPolicy(
  candidates: CrossingEvent[],
  snapshot: Snapshot,
  prevLatch: AlertLatch,
  cfg: NotificationPolicyConfig
): NotificationEvaluation {
  let nextLatch = prevLatch;

  // A dimension back under the warning edge means its window reset; re-arm it.
  if (tierOf(snapshot.fiveHourPercent, cfg.thresholds) === "healthy") {
    nextLatch = clearDimension(nextLatch, "fiveHour");
  }
  if (tierOf(snapshot.weeklyPercent, cfg.thresholds) === "healthy") {
    nextLatch = clearDimension(nextLatch, "weekly");
  }

  const events: CrossingEvent[] = [];
  for (const event of candidates) {
    if (!cfg.notifyTiers.includes(event.toTier)) continue;
    if (hasFired(nextLatch, event.dimension, event.toTier)) continue;
    events.push(event);
    nextLatch = latchTier(nextLatch, event.dimension, event.toTier);
  }

  return { events, nextLatch };
}
