import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

import { ConfigError } from "../src/errors.js";
import { assertValidInterval, startFixedInterval } from "../src/core/scheduler.js";

describe("fixed interval scheduler", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  test("ticks immediately and then every interval", () => {
    const tick = vi.fn(async () => {});
    const handle = startFixedInterval(tick, 1000);
    expect(tick).toHaveBeenCalledTimes(1);

    vi.advanceTimersByTime(999);
    expect(tick).toHaveBeenCalledTimes(1);
    vi.advanceTimersByTime(1);
    expect(tick).toHaveBeenCalledTimes(2);
    vi.advanceTimersByTime(3000);
    expect(tick).toHaveBeenCalledTimes(5);

    handle.stop();
    vi.advanceTimersByTime(5000);
    expect(tick).toHaveBeenCalledTimes(5);
    handle.stop();
  });

  test("rejects intervals that are not positive and finite", () => {
    expect(() => assertValidInterval(0)).toThrow(ConfigError);
    expect(() => assertValidInterval(-5)).toThrow(ConfigError);
    expect(() => assertValidInterval(Number.NaN)).toThrow(ConfigError);
    expect(() => assertValidInterval(Number.POSITIVE_INFINITY)).toThrow(ConfigError);

    const tick = vi.fn(async () => {});
    expect(() => startFixedInterval(tick, 0)).toThrow(ConfigError);
    expect(tick).not.toHaveBeenCalled();
  });
});
