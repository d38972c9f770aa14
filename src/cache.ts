import type { Snapshot } from "./types.js";

/**
 * Last successful snapshot, in memory only. The capture time travels in
 * `snapshot.capturedAt`. Never expires: staleness is reported through
 * `CurrentState.freshness` instead of eviction.
 */
export class SnapshotCache {
  private snapshot: Snapshot | null = null;

  get(): Snapshot | null {
    return this.snapshot;
  }

  put(snapshot: Snapshot): void {
    this.snapshot = snapshot;
  }
}
