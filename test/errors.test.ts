import { describe, expect, test } from "vitest";

import { actionableFor, isAuthProblem, toUsageError, UsageError } from "../src/errors.js";

describe("usage errors", () => {
  test("foreign errors take the fallback kind", () => {
    const kept = new UsageError("malformed-response", "bad body");
    expect(toUsageError(kept, "network-error")).toBe(kept);

    const wrapped = toUsageError("boom", "not-authenticated");
    expect(wrapped).toBeInstanceOf(UsageError);
    expect(wrapped.kind).toBe("not-authenticated");
    expect(wrapped.message).toBe("boom");
    expect(wrapped.actionable).toBe("run `claude` in a terminal to authenticate");

    const network = toUsageError(new TypeError("fetch failed"), "network-error");
    expect(network.message).toBe("fetch failed");
    expect(network.actionable).toBeNull();
  });

  test("only credential kinds are auth problems", () => {
    expect(isAuthProblem("auth-error")).toBe(true);
    expect(isAuthProblem("not-authenticated")).toBe(true);
    expect(isAuthProblem("network-error")).toBe(false);
    expect(isAuthProblem(null)).toBe(false);
    expect(actionableFor("auth-error")).toBe("run `claude` in a terminal to authenticate again");
    expect(actionableFor("malformed-response")).toBeNull();
  });
});
