import type { Snapshot } from "../types.js";

export interface CredentialSource {
  /** Rejects with a `not-authenticated` UsageError when no token is stored. */
  getToken(): Promise<string>;
  /** Forget a cached token so the next call re-reads the store. */
  invalidate?(): void;
}

export interface UsageClient {
  /** Rejects with a `network-error`, `auth-error` or `malformed-response` UsageError. */
  fetchUsage(token: string): Promise<Snapshot>;
}
