import { SnapshotCache } from "../cache.js";
import { ConfigError, toUsageError, type UsageError } from "../errors.js";
import { silentLogger, type Logger } from "../log.js";
import type { Notifier } from "../notifiers/notifier.js";
import type { CredentialSource, UsageClient } from "../providers/provider.js";
import { INITIAL_STATE, type CrossingEvent, type CurrentState, type Snapshot } from "../types.js";
import { evaluateNotificationPolicy, DEFAULT_NOTIFY_TIERS, type NotificationPolicyConfig } from "./notificationPolicy.js";
import { EMPTY_LATCH, type AlertLatch } from "./notificationState.js";
import { DEFAULT_INTERVAL_MS, startFixedInterval, type IntervalHandle } from "./scheduler.js";
import { crossings, DEFAULT_THRESHOLDS } from "./tier.js";

export type PollerDeps = {
  credentials: CredentialSource;
  client: UsageClient;
  notifier: Notifier;
  logger?: Logger;
  now?: () => Date;
};

export type PollerConfig = NotificationPolicyConfig & {
  intervalMs: number;
};

const DEFAULT_POLLER_CONFIG: PollerConfig = {
  intervalMs: DEFAULT_INTERVAL_MS,
  thresholds: DEFAULT_THRESHOLDS,
  notifyTiers: DEFAULT_NOTIFY_TIERS,
};

export type StateListener = (state: CurrentState) => void;

type CycleOutcome = { ok: true; snapshot: Snapshot } | { ok: false; error: UsageError };

/**
 * Owns the poll loop, the snapshot cache and the published state. Every
 * write happens inside the single in-flight cycle; readers only ever see
 * a whole `CurrentState`.
 */
export class Poller {
  private readonly cache = new SnapshotCache();
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly listeners = new Set<StateListener>();

  private state: CurrentState = INITIAL_STATE;
  private latch: AlertLatch = EMPTY_LATCH;
  private inFlight: Promise<CurrentState> | null = null;
  private timer: IntervalHandle | null = null;

  constructor(
    private readonly deps: PollerDeps,
    private readonly cfg: PollerConfig = DEFAULT_POLLER_CONFIG
  ) {
    this.logger = deps.logger ?? silentLogger;
    this.now = deps.now ?? (() => new Date());
  }

  start(intervalMs = this.cfg.intervalMs): void {
    if (this.timer) throw new ConfigError("poller already started");
    this.timer = startFixedInterval(() => this.pollOnce(), intervalMs);
    this.logger.debug(`poller started, interval ${intervalMs}ms`);
  }

  stop(): void {
    if (!this.timer) return;
    this.timer.stop();
    this.timer = null;
    this.logger.debug("poller stopped");
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  currentState(): CurrentState {
    return this.state;
  }

  refreshNow(): Promise<CurrentState> {
    return this.pollOnce();
  }

  /** Joins the in-flight cycle when there is one, so at most one fetch runs. */
  pollOnce(): Promise<CurrentState> {
    if (this.inFlight) return this.inFlight;

    const cycle = this.runCycle().finally(() => {
      this.inFlight = null;
    });
    this.inFlight = cycle;
    return cycle;
  }

  subscribe(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private async runCycle(): Promise<CurrentState> {
    const outcome = await this.fetchSnapshot();

    if (outcome.ok) {
      const events = this.reconcile(outcome.snapshot);
      await this.deliver(events);
    } else {
      const e = outcome.error;
      this.logger.warn(`poll failed: ${e.kind}: ${e.message}`);
      if (e.kind === "auth-error") this.deps.credentials.invalidate?.();
    }

    this.publish(outcome);
    return this.state;
  }

  private async fetchSnapshot(): Promise<CycleOutcome> {
    let token: string;
    try {
      token = await this.deps.credentials.getToken();
    } catch (err) {
      return { ok: false, error: toUsageError(err, "not-authenticated") };
    }

    try {
      const snapshot = await this.deps.client.fetchUsage(token);
      return { ok: true, snapshot };
    } catch (err) {
      return { ok: false, error: toUsageError(err, "network-error") };
    }
  }

  private reconcile(snapshot: Snapshot): CrossingEvent[] {
    const candidates = crossings(this.cache.get(), snapshot, this.cfg.thresholds);
    this.cache.put(snapshot);

    const evaluation = evaluateNotificationPolicy(candidates, snapshot, this.latch, this.cfg);
    this.latch = evaluation.nextLatch;
    return evaluation.events;
  }

  private async deliver(events: CrossingEvent[]): Promise<void> {
    for (const event of events) {
      try {
        await this.deps.notifier.notify(event);
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        this.logger.error(`notification for ${event.dimension} ${event.toTier} failed: ${msg}`);
      }
    }
  }

  private publish(outcome: CycleOutcome): void {
    const snapshot = this.cache.get();
    const error = outcome.ok ? null : outcome.error;

    const next: CurrentState = {
      snapshot,
      freshness: outcome.ok ? "live" : snapshot ? "stale" : "unavailable",
      lastError: error?.kind ?? null,
      lastErrorMessage: error?.message ?? null,
      actionable: error?.actionable ?? null,
      lastCheckedAt: this.now().toISOString(),
    };
    this.state = Object.freeze(next);

    for (const listener of this.listeners) {
      try {
        listener(this.state);
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        this.logger.error(`state listener failed: ${msg}`);
      }
    }
  }
}
