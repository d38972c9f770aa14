import { describe, expect, test, vi } from "vitest";

import { AnthropicUsageClient, USAGE_API_URL } from "../src/providers/anthropicUsageClient.js";
import { UsageError } from "../src/errors.js";

const NOW = new Date("2026-02-24T00:00:00.000Z");

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

function clientReturning(res: Response | Error) {
  const fetch = vi.fn(async (_input: string, _init: RequestInit): Promise<Response> => {
    if (res instanceof Error) throw res;
    return res;
  });
  return { fetch, client: new AnthropicUsageClient({ fetch, now: () => NOW }) };
}

const okBody = {
  five_hour: { utilization: 42.5, resets_at: "2026-02-24T03:00:00.123456+00:00" },
  seven_day: { utilization: 12, resets_at: "2026-02-28T00:00:00+00:00" },
  seven_day_opus: null,
};

describe("anthropic usage client", () => {
  test("maps the usage response into a snapshot", async () => {
    const { fetch, client } = clientReturning(jsonResponse(okBody));

    const snapshot = await client.fetchUsage("test-token");
    expect(snapshot).toEqual({
      fiveHourPercent: 42.5,
      weeklyPercent: 12,
      fiveHourResetAt: "2026-02-24T03:00:00.123Z",
      weeklyResetAt: "2026-02-28T00:00:00.000Z",
      capturedAt: "2026-02-24T00:00:00.000Z",
    });

    expect(fetch).toHaveBeenCalledTimes(1);
    const [url, init] = fetch.mock.calls[0] ?? [];
    expect(url).toBe(USAGE_API_URL);
    expect(init?.headers).toEqual({
      Authorization: "Bearer test-token",
      "anthropic-beta": "oauth-2025-04-20",
    });
  });

  test("an inactive window reads as zero with no reset time", async () => {
    const { client } = clientReturning(
      jsonResponse({ five_hour: null, seven_day: { utilization: 3, resets_at: null } })
    );

    const snapshot = await client.fetchUsage("test-token");
    expect(snapshot.fiveHourPercent).toBe(0);
    expect(snapshot.fiveHourResetAt).toBeNull();
    expect(snapshot.weeklyResetAt).toBeNull();
  });

  test("401 and 403 are auth errors", async () => {
    for (const status of [401, 403]) {
      const res = jsonResponse({ error: "unauthorized" }, status);
      const { client } = clientReturning(res);
      await expect(client.fetchUsage("test-token")).rejects.toMatchObject({
        kind: "auth-error",
        message: `usage API rejected the token (${status})`,
      });
      expect(res.bodyUsed).toBe(true);
    }
  });

  test("server errors and rate limits are network errors", async () => {
    for (const status of [429, 503]) {
      const res = jsonResponse({}, status);
      const { client } = clientReturning(res);
      await expect(client.fetchUsage("test-token")).rejects.toMatchObject({
        kind: "network-error",
        message: `usage API returned ${status}`,
      });
      expect(res.bodyUsed).toBe(true);
    }
  });

  test("transport failures are network errors", async () => {
    const { client } = clientReturning(new TypeError("fetch failed"));
    const err = await client.fetchUsage("test-token").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(UsageError);
    expect(err).toMatchObject({ kind: "network-error", message: "usage request failed: fetch failed" });
  });

  test("a body that is not JSON is malformed", async () => {
    const { client } = clientReturning(new Response("<html>oops</html>", { status: 200 }));
    await expect(client.fetchUsage("test-token")).rejects.toMatchObject({ kind: "malformed-response" });
  });

  test("a missing window is malformed", async () => {
    const { client } = clientReturning(jsonResponse({ five_hour: okBody.five_hour }));
    await expect(client.fetchUsage("test-token")).rejects.toMatchObject({
      kind: "malformed-response",
      message: "unexpected usage response: seven_day: Required",
    });
  });

  test("out of range utilization is malformed", async () => {
    const { client } = clientReturning(
      jsonResponse({ ...okBody, five_hour: { utilization: 120, resets_at: null } })
    );
    await expect(client.fetchUsage("test-token")).rejects.toMatchObject({
      kind: "malformed-response",
      message: "five_hour utilization out of range: 120",
    });
  });

  test("a reset time in the past is malformed, within a minute of skew is not", async () => {
    const past = clientReturning(
      jsonResponse({ ...okBody, seven_day: { utilization: 5, resets_at: "2026-02-23T23:58:00Z" } })
    );
    await expect(past.client.fetchUsage("test-token")).rejects.toMatchObject({
      kind: "malformed-response",
      message: "seven_day resets_at is in the past: 2026-02-23T23:58:00Z",
    });

    const skewed = clientReturning(
      jsonResponse({ ...okBody, seven_day: { utilization: 5, resets_at: "2026-02-23T23:59:30Z" } })
    );
    const snapshot = await skewed.client.fetchUsage("test-token");
    expect(snapshot.weeklyResetAt).toBe("2026-02-23T23:59:30.000Z");
  });
});
