import { ConfigError } from "../errors.js";

export const DEFAULT_INTERVAL_MS = 120_000;

export type IntervalHandle = {
  stop(): void;
};

export function assertValidInterval(intervalMs: number): void {
  if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
    throw new ConfigError(`poll interval must be a positive number of ms, got ${intervalMs}`);
  }
}

/**
 * Runs `tick` now and then every `intervalMs`. The tick is fire-and-forget;
 * it must not reject.
 */
export function startFixedInterval(tick: () => Promise<unknown>, intervalMs: number): IntervalHandle {
  assertValidInterval(intervalMs);

  void tick();
  let timer: NodeJS.Timeout | null = setInterval(() => {
    void tick();
  }, intervalMs);

  return {
    stop() {
      if (timer) clearInterval(timer);
      timer = null;
    },
  };
}
