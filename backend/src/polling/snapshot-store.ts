import type { Snapshot } from "@imbalance-tracker/domain";

/**
 * Holds the single accepted snapshot for the lifetime of the process. Only the
 * scheduler writes; readers get the immutable snapshot itself.
 */
export class SnapshotStore {
  private accepted: Snapshot | null = null;
  private acceptedAtMs: number | null = null;

  current(): Snapshot | null {
    return this.accepted;
  }

  get publishedAtMs(): number | null {
    return this.accepted?.publishedAtMs ?? null;
  }

  /** When the current snapshot was accepted, in wall-clock milliseconds. */
  get acceptedAt(): number | null {
    return this.acceptedAtMs;
  }

  isNewer(candidate: Snapshot): boolean {
    return candidate.isNewerThan(this.accepted);
  }

  /** Replace the accepted snapshot if `candidate` is strictly newer. */
  accept(candidate: Snapshot, nowMs: number = Date.now()): boolean {
    if (!this.isNewer(candidate)) {
      return false;
    }
    this.accepted = candidate;
    this.acceptedAtMs = nowMs;
    return true;
  }
}
