import { z } from "zod";

import { actionableFor, UsageError } from "../errors.js";
import { makeSnapshot, type Snapshot } from "../types.js";
import type { UsageClient } from "./provider.js";

export const USAGE_API_URL = "https://api.anthropic.com/api/oauth/usage";
const OAUTH_BETA = "oauth-2025-04-20";

// Allowed clock skew before a reset time counts as already past.
const RESET_SKEW_MS = 60_000;

const UsageWindowSchema = z.object({
  utilization: z.number(),
  resets_at: z.string().nullable().optional(),
});

const UsageResponseSchema = z.object({
  five_hour: UsageWindowSchema.nullable(),
  seven_day: UsageWindowSchema.nullable(),
});

export type UsageResponse = z.infer<typeof UsageResponseSchema>;

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export type AnthropicUsageClientOptions = {
  url?: string;
  timeoutMs?: number;
  fetch?: FetchLike;
  now?: () => Date;
};

function malformed(message: string): UsageError {
  return new UsageError("malformed-response", message);
}

function summarizeIssues(err: z.ZodError): string {
  return err.issues
    .slice(0, 3)
    .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
    .join("; ");
}

function toPercent(label: string, utilization: number): number {
  if (!Number.isFinite(utilization) || utilization < 0 || utilization > 100) {
    throw malformed(`${label} utilization out of range: ${utilization}`);
  }
  return utilization;
}

function toResetAt(label: string, raw: string | null | undefined, now: Date): string | null {
  if (raw == null) return null;
  const t = Date.parse(raw);
  if (!Number.isFinite(t)) throw malformed(`${label} resets_at is not a timestamp: ${raw}`);
  if (t < now.getTime() - RESET_SKEW_MS) {
    throw malformed(`${label} resets_at is in the past: ${raw}`);
  }
  return new Date(t).toISOString();
}

/** Converts a parsed API body into a snapshot, rejecting out-of-range values. */
export function toSnapshot(body: UsageResponse, now: Date): Snapshot {
  const five = body.five_hour ?? { utilization: 0, resets_at: null };
  const week = body.seven_day ?? { utilization: 0, resets_at: null };

  return makeSnapshot({
    fiveHourPercent: toPercent("five_hour", five.utilization),
    weeklyPercent: toPercent("seven_day", week.utilization),
    fiveHourResetAt: toResetAt("five_hour", five.resets_at, now),
    weeklyResetAt: toResetAt("seven_day", week.resets_at, now),
    capturedAt: now.toISOString(),
  });
}

export class AnthropicUsageClient implements UsageClient {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchLike;
  private readonly now: () => Date;

  constructor(opts: AnthropicUsageClientOptions = {}) {
    this.url = opts.url ?? USAGE_API_URL;
    this.timeoutMs = opts.timeoutMs ?? 10_000;
    this.fetchFn = opts.fetch ?? ((input, init) => fetch(input, init));
    this.now = opts.now ?? (() => new Date());
  }

  async fetchUsage(token: string): Promise<Snapshot> {
    let res: Response;
    try {
      res = await this.fetchFn(this.url, {
        headers: {
          Authorization: `Bearer ${token}`,
          "anthropic-beta": OAUTH_BETA,
        },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new UsageError("network-error", `usage request failed: ${msg}`);
    }

    if (!res.ok) {
      // Release the connection; the error body is not used.
      await res.body?.cancel();
    }
    if (res.status === 401 || res.status === 403) {
      throw new UsageError(
        "auth-error",
        `usage API rejected the token (${res.status})`,
        actionableFor("auth-error")
      );
    }
    if (!res.ok) {
      throw new UsageError("network-error", `usage API returned ${res.status}`);
    }

    let json: unknown;
    try {
      json = await res.json();
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      throw malformed(`usage response is not JSON: ${msg}`);
    }

    const parsed = UsageResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw malformed(`unexpected usage response: ${summarizeIssues(parsed.error)}`);
    }

    return toSnapshot(parsed.data, this.now());
  }
}
