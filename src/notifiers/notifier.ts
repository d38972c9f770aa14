import type { CrossingEvent, Dimension, Tier } from "../types.js";

export interface Notifier {
  notify(event: CrossingEvent): Promise<void>;
}

export type AlertMessage = {
  title: string;
  body: string;
};

const DIMENSION_LABEL: Record<Dimension, string> = {
  fiveHour: "5-hour limit",
  weekly: "weekly limit",
};

const TITLE: Record<Exclude<Tier, "healthy">, string> = {
  warning: "Usage Warning",
  danger: "Usage High",
  critical: "Usage Critical",
};

export function formatAlert(event: CrossingEvent): AlertMessage {
  const pct = `${Math.round(event.percent)}%`;
  const label = DIMENSION_LABEL[event.dimension];

  switch (event.toTier) {
    case "critical":
      return { title: TITLE.critical, body: `You've used ${pct} of your ${label}. Consider pausing.` };
    case "danger":
      return { title: TITLE.danger, body: `You've used ${pct} of your ${label}.` };
    case "warning":
    case "healthy":
      return { title: TITLE.warning, body: `You've reached ${pct} of your ${label}.` };
  }
}

/** Delivers to every notifier; one failing does not stop the rest. */
export class FanoutNotifier implements Notifier {
  constructor(private readonly targets: Notifier[]) {}

  async notify(event: CrossingEvent): Promise<void> {
    const results = await Promise.allSettled(this.targets.map((t) => t.notify(event)));
    const failed = results.find((r): r is PromiseRejectedResult => r.status === "rejected");
    if (failed) throw failed.reason;
  }
}
