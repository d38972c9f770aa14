import { describe, expect, test } from "vitest";

import {
  evaluateNotificationPolicy,
  type NotificationPolicyConfig,
} from "../src/core/notificationPolicy.js";
import { EMPTY_LATCH } from "../src/core/notificationState.js";
import { crossings, DEFAULT_THRESHOLDS } from "../src/core/tier.js";
import { makeSnapshot } from "../src/types.js";

const cfg: NotificationPolicyConfig = {
  thresholds: DEFAULT_THRESHOLDS,
  notifyTiers: ["danger", "critical"],
};

function snap(fiveHourPercent: number, weeklyPercent = 10) {
  return makeSnapshot({
    fiveHourPercent,
    weeklyPercent,
    fiveHourResetAt: null,
    weeklyResetAt: null,
    capturedAt: "2026-02-24T00:00:00.000Z",
  });
}

describe("notification policy", () => {
  test("warning crossings are not notified by default", () => {
    const current = snap(75);
    const res = evaluateNotificationPolicy(crossings(null, current), current, EMPTY_LATCH, cfg);
    expect(res.events).toHaveLength(0);
    expect(res.nextLatch).toEqual(EMPTY_LATCH);
  });

  test("warning crossings fire when configured", () => {
    const current = snap(75);
    const res = evaluateNotificationPolicy(crossings(null, current), current, EMPTY_LATCH, {
      ...cfg,
      notifyTiers: ["warning"],
    });
    expect(res.events.map((e) => e.toTier)).toEqual(["warning"]);
  });

  test("a tier fires once while usage hovers around its edge", () => {
    const s1 = snap(86);
    const r1 = evaluateNotificationPolicy(crossings(null, s1), s1, EMPTY_LATCH, cfg);
    expect(r1.events).toHaveLength(1);
    expect(r1.nextLatch.fiveHour).toEqual(["danger"]);

    const s2 = snap(84);
    const r2 = evaluateNotificationPolicy(crossings(s1, s2), s2, r1.nextLatch, cfg);
    expect(r2.events).toHaveLength(0);

    const s3 = snap(86);
    const r3 = evaluateNotificationPolicy(crossings(s2, s3), s3, r2.nextLatch, cfg);
    expect(r3.events).toHaveLength(0);
  });

  test("falling back to healthy re-arms the dimension", () => {
    const s1 = snap(90);
    const r1 = evaluateNotificationPolicy(crossings(null, s1), s1, EMPTY_LATCH, cfg);

    const reset = snap(5);
    const r2 = evaluateNotificationPolicy(crossings(s1, reset), reset, r1.nextLatch, cfg);
    expect(r2.nextLatch.fiveHour).toEqual([]);

    const again = snap(88);
    const r3 = evaluateNotificationPolicy(crossings(reset, again), again, r2.nextLatch, cfg);
    expect(r3.events).toHaveLength(1);
    expect(r3.events[0]?.toTier).toBe("danger");
  });

  test("jumping straight to critical fires critical only", () => {
    const s = snap(97, 96);
    const res = evaluateNotificationPolicy(crossings(null, s), s, EMPTY_LATCH, cfg);
    expect(res.events.map((e) => `${e.dimension}:${e.toTier}`)).toEqual([
      "fiveHour:critical",
      "weekly:critical",
    ]);
  });
});
