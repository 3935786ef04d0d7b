import { Logger } from "@nestjs/common";

import {
  describeError,
  diffSnapshots,
  Duration,
  FetchFailure,
  isCancellation,
  MalformedInputError,
  normalizeSnapshot,
  summarizeDiff,
} from "@imbalance-tracker/domain";
import type {
  RawImbalanceRecord,
  SettlementDay,
  Snapshot,
  SnapshotDiff,
  SnapshotDiffSummary,
} from "@imbalance-tracker/domain";
import { throwIfCancelled, type Clock } from "./clock";
import type { RetryingFetcher } from "./retrying-fetcher";
import type { SnapshotStore } from "./snapshot-store";

export type SchedulerState = "idle" | "waiting" | "checking" | "retrying";
export type HitKind = "first-attempt" | "retry";
export type CycleOutcome = "first-attempt-hit" | "retry-hit" | "no-new-data";

export interface PollSchedulerOptions {
  settlementDay: SettlementDay;
  updateInterval: Duration;
  retryEnabled: boolean;
  retryIncrements: Duration[];
}

/** Title-time context handed to presentation alongside a diff. */
export interface DiffContext {
  label: string;
  settlementDay: string;
  previousPublishedAt: string | null;
  newPublishedAt: string | null;
  previousSettlementDates: string[];
  newSettlementDates: string[];
}

export interface DiffEvent {
  cycle: number;
  hit: HitKind;
  /** Zero-based index into the retry increments for retry hits. */
  retryIndex: number | null;
  previous: Snapshot;
  current: Snapshot;
  diff: SnapshotDiff;
  summary: SnapshotDiffSummary;
  context: DiffContext;
}

export interface NoNewDataEvent {
  cycle: number;
  retried: boolean;
}

export interface PollObserver {
  onInitialSnapshot?(snapshot: Snapshot): void | Promise<void>;
  onDiff?(event: DiffEvent): void | Promise<void>;
  onNoNewData?(event: NoNewDataEvent): void | Promise<void>;
  onFetchFailure?(error: FetchFailure, cycle: number): void | Promise<void>;
  onMalformedInput?(error: MalformedInputError, cycle: number): void | Promise<void>;
}

export interface SchedulerStatus {
  state: SchedulerState;
  cycle: number;
  settlementDay: string;
  lastPublishedAt: string | null;
  nextExpectedAt: string | null;
  lastOutcome: CycleOutcome | null;
  lastCheckedAt: string | null;
}

/**
 * Waits until the next publication is due, checks for it, and walks a short
 * backoff sequence when it has not appeared yet. Expectations are always derived
 * from the accepted snapshot, so a missed update does not shift the schedule.
 */
export class PollScheduler {
  private readonly logger = new Logger(PollScheduler.name);
  private _state: SchedulerState = "idle";
  private _cycle = 1;
  private lastOutcome: CycleOutcome | null = null;
  private lastCheckedAtMs: number | null = null;
  /** Start of the last cycle's check when that cycle found nothing new. */
  private lastMissAtMs: number | null = null;

  constructor(
    private readonly fetcher: RetryingFetcher<RawImbalanceRecord>,
    private readonly store: SnapshotStore,
    private readonly options: PollSchedulerOptions,
    private readonly clock: Clock,
    private readonly observers: PollObserver[] = [],
  ) {}

  get state(): SchedulerState {
    return this._state;
  }

  get cycle(): number {
    return this._cycle;
  }

  status(): SchedulerStatus {
    const published = this.store.publishedAtMs;
    return {
      state: this._state,
      cycle: this._cycle,
      settlementDay: this.options.settlementDay.date,
      lastPublishedAt: published === null ? null : new Date(published).toISOString(),
      nextExpectedAt: published === null ? null : this.options.updateInterval.after(published).toISOString(),
      lastOutcome: this.lastOutcome,
      lastCheckedAt: this.lastCheckedAtMs === null ? null : new Date(this.lastCheckedAtMs).toISOString(),
    };
  }

  /** Runs until `signal` aborts. Resolves once the loop has unwound. */
  async run(signal: AbortSignal): Promise<void> {
    this.logger.log(`Starting auto-update loop for settlement day ${this.options.settlementDay.date}`);
    try {
      await this.initialize(signal);
      for (;;) {
        await this.runCycle(signal);
      }
    } catch (error) {
      if (isCancellation(error)) {
        this.logger.log("Polling cancelled; loop stopped");
        return;
      }
      throw error;
    } finally {
      this._state = "idle";
    }
  }

  /**
   * Acquire the first snapshot, retrying until one with data arrives. Returns the
   * already accepted snapshot when there is one.
   */
  async initialize(signal?: AbortSignal): Promise<Snapshot> {
    const existing = this.store.current();
    if (existing) {
      return existing;
    }
    this.logger.log("Fetching initial snapshot");
    for (;;) {
      this._state = "checking";
      const snapshot = await this.fetchCandidate(0, signal);
      if (snapshot && this.store.accept(snapshot, this.clock.now())) {
        this._state = "idle";
        this.logger.log(`Initial snapshot published at ${snapshot.publishedAt?.toISOString() ?? "n/a"} (${snapshot.size} periods)`);
        await this.notify((observer) => observer.onInitialSnapshot?.(snapshot));
        return snapshot;
      }
      if (snapshot) {
        this.logger.warn("Initial snapshot contains no published values yet");
      }
      const pause = this.initialRetryDelay();
      this._state = "waiting";
      this.logger.log(`Retrying initial fetch in ${pause.toString()}`);
      await this.clock.sleep(pause.milliseconds, signal);
    }
  }

  async runCycle(signal?: AbortSignal): Promise<CycleOutcome> {
    const cycle = this._cycle;
    try {
      await this.waitForExpectedUpdate(cycle, signal);

      this._state = "checking";
      const checkStartedAt = this.clock.now();
      this.logger.log(`Update cycle ${cycle}: checking for new data`);
      if (await this.check(cycle, "first-attempt", null, signal)) {
        this.logger.log(`Update cycle ${cycle}: new data found on first attempt`);
        return this.finishCycle("first-attempt-hit");
      }

      if (!this.options.retryEnabled) {
        this.logger.log(`Update cycle ${cycle}: no new data and retries disabled; waiting for next interval`);
        await this.notify((observer) => observer.onNoNewData?.({cycle, retried: false}));
        return this.finishCycle("no-new-data", checkStartedAt);
      }

      this._state = "retrying";
      this.logger.log(`Update cycle ${cycle}: no new data on first attempt; starting retry sequence`);
      for (const [index, increment] of this.options.retryIncrements.entries()) {
        this.logger.log(`Update cycle ${cycle}: retrying in ${increment.seconds} s`);
        await this.clock.sleep(increment.milliseconds, signal);
        if (await this.check(cycle, "retry", index, signal)) {
          this.logger.log(`Update cycle ${cycle}: new data found after retry ${index + 1}`);
          return this.finishCycle("retry-hit");
        }
      }

      this.logger.log(`Update cycle ${cycle}: no new data after all retries; waiting for next interval`);
      await this.notify((observer) => observer.onNoNewData?.({cycle, retried: true}));
      return this.finishCycle("no-new-data", checkStartedAt);
    } finally {
      this._state = "idle";
    }
  }

  /**
   * The expectation stays anchored to the accepted publish time. After a miss the
   * next check is also held back a full interval from the previous one, so an
   * overdue expectation is checked at most once per interval.
   */
  private async waitForExpectedUpdate(cycle: number, signal?: AbortSignal): Promise<void> {
    const {updateInterval} = this.options;
    const published = this.store.publishedAtMs ?? this.clock.now();
    const nextExpected = updateInterval.after(published);
    const nextCheck = this.lastMissAtMs === null
      ? nextExpected
      : new Date(Math.max(nextExpected.getTime(), updateInterval.after(this.lastMissAtMs).getTime()));
    const now = this.clock.now();
    const wait = Duration.until(now, nextCheck);
    this._state = "waiting";
    if (!wait.isZero()) {
      const reason = nextCheck.getTime() === nextExpected.getTime()
        ? `next expected update at ${nextExpected.toISOString()}`
        : `next check at ${nextCheck.toISOString()} (expected update ${nextExpected.toISOString()} still outstanding)`;
      this.logger.log(`Update cycle ${cycle}: waiting ${wait.minutes.toFixed(1)} minutes until ${reason}`);
      await this.clock.sleep(wait.milliseconds, signal);
      return;
    }
    const lateMinutes = (now - nextExpected.getTime()) / 60_000;
    this.logger.log(
      `Update cycle ${cycle}: expected update time ${nextExpected.toISOString()} is already ${lateMinutes.toFixed(1)} minutes in the past, checking now`,
    );
  }

  private async check(cycle: number, hit: HitKind, retryIndex: number | null, signal?: AbortSignal): Promise<boolean> {
    const candidate = await this.fetchCandidate(cycle, signal);
    const previous = this.store.current();
    if (!candidate || !previous) {
      return false;
    }

    const hasNewData = this.store.isNewer(candidate);
    this.logger.verbose(
      `Previous publish: ${previous.publishedAt?.toISOString() ?? "n/a"}, new publish: ${candidate.publishedAt?.toISOString() ?? "n/a"}, has new data: ${hasNewData}`,
    );
    if (!hasNewData) {
      return false;
    }

    const diff = diffSnapshots(previous, candidate);
    const event: DiffEvent = {
      cycle,
      hit,
      retryIndex,
      previous,
      current: candidate,
      diff,
      summary: summarizeDiff(diff),
      context: {
        label: hit === "retry" ? `Update ${cycle} (Retry)` : `Update ${cycle}`,
        settlementDay: this.options.settlementDay.date,
        previousPublishedAt: diff.previousPublishedAt,
        newPublishedAt: diff.newPublishedAt,
        previousSettlementDates: previous.settlementDates,
        newSettlementDates: candidate.settlementDates,
      },
    };
    const {counts} = event.summary;
    this.logger.log(
      `${event.context.label}: ${counts.changed} changed, ${counts.unchanged} unchanged, ${counts.appeared} appeared, ${counts.disappeared} disappeared`,
    );
    throwIfCancelled(signal);
    await this.notify((observer) => observer.onDiff?.(event));
    this.store.accept(candidate, this.clock.now());
    return true;
  }

  /** Fetch and normalise; failures that only affect this check resolve to null. */
  private async fetchCandidate(cycle: number, signal?: AbortSignal): Promise<Snapshot | null> {
    this.lastCheckedAtMs = this.clock.now();
    try {
      const snapshot = await this.fetcher.fetch(
        this.options.settlementDay.windows(),
        (records) => normalizeSnapshot(records, {
          onSkippedRecord: (index, reason) => this.logger.verbose(`Update cycle ${cycle}: skipping record #${index}: ${reason}`),
        }),
        signal,
      );
      throwIfCancelled(signal);
      return snapshot;
    } catch (error) {
      if (error instanceof FetchFailure) {
        this.logger.warn(`Update cycle ${cycle}: ${error.message}`);
        await this.notify((observer) => observer.onFetchFailure?.(error, cycle));
        return null;
      }
      if (error instanceof MalformedInputError) {
        this.logger.warn(`Update cycle ${cycle}: malformed payload: ${error.message}`);
        await this.notify((observer) => observer.onMalformedInput?.(error, cycle));
        return null;
      }
      throw error;
    }
  }

  private finishCycle(outcome: CycleOutcome, missCheckedAt: number | null = null): CycleOutcome {
    this.lastOutcome = outcome;
    this.lastMissAtMs = missCheckedAt;
    this._cycle += 1;
    return outcome;
  }

  private initialRetryDelay(): Duration {
    const increments = this.options.retryIncrements;
    const last = increments[increments.length - 1];
    return this.options.retryEnabled && last ? last : this.options.updateInterval;
  }

  private async notify(call: (observer: PollObserver) => void | Promise<void>): Promise<void> {
    for (const observer of this.observers) {
      try {
        await call(observer);
      } catch (error) {
        this.logger.warn(`Poll observer failed: ${describeError(error)}`);
      }
    }
  }
}
