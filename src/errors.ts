import type { ErrorKind } from "./types.js";

export class UsageError extends Error {
  public readonly kind: ErrorKind;
  public readonly actionable: string | null;

  constructor(kind: ErrorKind, message: string, actionable: string | null = null) {
    super(message);
    this.name = "UsageError";
    this.kind = kind;
    this.actionable = actionable;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const DEFAULT_ACTIONABLE: Record<ErrorKind, string | null> = {
  "not-authenticated": "run `claude` in a terminal to authenticate",
  "auth-error": "run `claude` in a terminal to authenticate again",
  "network-error": null,
  "malformed-response": null,
};

export function isAuthProblem(kind: ErrorKind | null): boolean {
  return kind === "not-authenticated" || kind === "auth-error";
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// Foreign errors carry no kind; the stage they escaped from decides it.
export function toUsageError(err: unknown, fallback: ErrorKind): UsageError {
  if (err instanceof UsageError) return err;
  return new UsageError(fallback, messageOf(err), DEFAULT_ACTIONABLE[fallback]);
}

export function actionableFor(kind: ErrorKind): string | null {
  return DEFAULT_ACTIONABLE[kind];
}
