import { Inject, Injectable, Logger, OnModuleDestroy } from "@nestjs/common";

import { describeError, type RawImbalanceRecord, type Snapshot, type SnapshotJson } from "@imbalance-tracker/domain";
import { PollConfigFactory, type PollConfig } from "../config/poll-config.factory";
import { RuntimeConfigService } from "../config/runtime-config.service";
import type { DataSource } from "../sources/source.types";
import type { DiffEntry } from "../storage/storage.schemas";
import { StorageService } from "../storage/storage.service";
import { CLOCK, type Clock } from "./clock";
import { PollScheduler, type DiffEvent, type PollObserver, type SchedulerStatus } from "./poll-scheduler";
import { RetryingFetcher } from "./retrying-fetcher";
import { SnapshotStore } from "./snapshot-store";

export const IMBALANCE_SOURCE = Symbol("IMBALANCE_SOURCE");

export interface MonitorStatus extends SchedulerStatus {
  running: boolean;
  lastError: string | null;
}

/** Owns the polling loop for the configured settlement day and exposes read-only views of it. */
@Injectable()
export class MonitorService implements PollObserver, OnModuleDestroy {
  private readonly logger = new Logger(MonitorService.name);
  private readonly store = new SnapshotStore();
  private readonly pollScheduler: PollScheduler;
  private readonly pollConfig: PollConfig;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private lastDiff: DiffEntry | null = null;
  private lastError: string | null = null;

  constructor(
    @Inject(RuntimeConfigService) configState: RuntimeConfigService,
    @Inject(PollConfigFactory) configFactory: PollConfigFactory,
    @Inject(IMBALANCE_SOURCE) source: DataSource<RawImbalanceRecord>,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(StorageService) private readonly storage: StorageService,
  ) {
    this.pollConfig = configFactory.create(configState.getDocument(), clock.now());
    const fetcher = new RetryingFetcher(source, {
      maxAttempts: this.pollConfig.maxFetchAttempts,
      interAttemptDelay: this.pollConfig.interAttemptDelay,
      interRequestPause: this.pollConfig.interRequestPause,
    }, clock);
    this.pollScheduler = new PollScheduler(fetcher, this.store, this.pollConfig, clock, [this]);
  }

  get scheduler(): PollScheduler {
    return this.pollScheduler;
  }

  get config(): PollConfig {
    return this.pollConfig;
  }

  start(): void {
    if (this.loop) {
      this.logger.warn("Polling already running; ignoring start request.");
      return;
    }
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.pollScheduler
      .run(controller.signal)
      .catch((error: unknown) => {
        this.lastError = describeError(error);
        this.logger.error(`Polling loop stopped unexpectedly: ${this.lastError}`);
      })
      .finally(() => {
        this.loop = null;
        this.controller = null;
      });
  }

  async stop(): Promise<void> {
    this.controller?.abort();
    await this.loop;
  }

  async onModuleDestroy(): Promise<void> {
    await this.stop();
  }

  status(): MonitorStatus {
    return {
      ...this.pollScheduler.status(),
      running: this.loop !== null,
      lastError: this.lastError,
    };
  }

  snapshot(): SnapshotJson | null {
    return this.store.current()?.toJSON() ?? this.storage.getLatestSnapshot()?.payload ?? null;
  }

  latestDiff(): DiffEntry | null {
    return this.lastDiff;
  }

  diffs(limit: number): DiffEntry[] {
    return this.storage.listDiffs(limit).map((record) => record.payload);
  }

  onInitialSnapshot(snapshot: Snapshot): void {
    this.lastError = null;
    this.storage.replaceSnapshot(snapshot.toJSON());
  }

  onDiff(event: DiffEvent): void {
    const {summary} = event;
    const entry: DiffEntry = {
      cycle: event.cycle,
      hit: event.hit,
      label: event.context.label,
      recordedAt: new Date(this.clock.now()).toISOString(),
      diff: event.diff,
      summary,
    };
    if (summary.meanDelta !== null) {
      this.logger.log(
        `${entry.label}: mean change ${summary.meanDelta.toFixed(1)} MW, mean absolute change ${summary.meanAbsoluteDelta?.toFixed(1) ?? "n/a"} MW`,
      );
    }
    this.lastDiff = entry;
    this.lastError = null;
    this.storage.appendDiff(entry);
    this.storage.replaceSnapshot(event.current.toJSON());
  }

  onFetchFailure(error: Error): void {
    this.lastError = `${error.name}: ${error.message}`;
  }

  onMalformedInput(error: Error): void {
    this.lastError = `${error.name}: ${error.message}`;
  }
}
