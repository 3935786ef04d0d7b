import { Logger } from "@nestjs/common";

import {
  describeError,
  Duration,
  FetchFailure,
  isCancellation,
  MalformedInputError,
  PollCancelledError,
  TransportError,
  UpstreamStatusError,
} from "@imbalance-tracker/domain";
import type { DataSource, SourceQuery, SourceResponse } from "../sources/source.types";
import { systemClock, throwIfCancelled, type Clock } from "./clock";

export interface RetryOptions {
  maxAttempts: number;
  interAttemptDelay: Duration;
  /** Pause between the sub-requests of a single attempt. */
  interRequestPause: Duration;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 5,
  interAttemptDelay: Duration.fromSeconds(2),
  interRequestPause: Duration.fromSeconds(1),
};

/**
 * Runs one logical fetch (one or more sub-requests) against a data source.
 * An attempt only counts as successful when every sub-request succeeded; results
 * of a partially successful attempt are discarded.
 */
export class RetryingFetcher<TRecord> {
  private readonly logger = new Logger(RetryingFetcher.name);

  constructor(
    private readonly source: DataSource<TRecord>,
    private readonly options: RetryOptions = DEFAULT_RETRY_OPTIONS,
    private readonly clock: Clock = systemClock,
  ) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new RangeError("maxAttempts must be an integer of at least 1");
    }
  }

  async fetch<TResult>(
    queries: readonly SourceQuery[],
    transform: (records: TRecord[]) => TResult,
    signal?: AbortSignal,
  ): Promise<TResult> {
    const records = await this.fetchRecords(queries, signal);
    return transform(records);
  }

  async fetchRecords(queries: readonly SourceQuery[], signal?: AbortSignal): Promise<TRecord[]> {
    const batches = await this.fetchBatches(queries, signal);
    return batches.flat();
  }

  /** Like {@link fetchRecords}, keeping each query's records apart, in query order. */
  async fetchBatches(queries: readonly SourceQuery[], signal?: AbortSignal): Promise<TRecord[][]> {
    const {maxAttempts, interAttemptDelay} = this.options;
    let lastError: TransportError | UpstreamStatusError | null = null;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      throwIfCancelled(signal);
      try {
        this.logger.verbose(`${this.source.key}: attempt ${attempt}/${maxAttempts}`);
        const batches = await this.attempt(queries, signal);
        if (attempt > 1) {
          this.logger.log(`${this.source.key}: succeeded on attempt ${attempt}`);
        }
        return batches;
      } catch (error) {
        if (error instanceof MalformedInputError || isCancellation(error)) {
          throw error;
        }
        lastError = error instanceof TransportError || error instanceof UpstreamStatusError
          ? error
          : new TransportError(describeError(error), {cause: error});
        this.logger.warn(`${this.source.key}: attempt ${attempt}/${maxAttempts} failed: ${lastError.message}`);
      }
      if (attempt < maxAttempts) {
        await this.clock.sleep(interAttemptDelay.milliseconds, signal);
      }
    }

    const lastStatus = lastError instanceof UpstreamStatusError ? lastError.status : null;
    throw new FetchFailure(maxAttempts, lastStatus, lastError);
  }

  private async attempt(queries: readonly SourceQuery[], signal?: AbortSignal): Promise<TRecord[][]> {
    const batches: TRecord[][] = [];
    for (const [index, query] of queries.entries()) {
      if (index > 0 && !this.options.interRequestPause.isZero()) {
        await this.clock.sleep(this.options.interRequestPause.milliseconds, signal);
      }
      let response: SourceResponse<TRecord>;
      try {
        response = await this.source.get(query, signal);
      } catch (error) {
        if (error instanceof MalformedInputError) {
          throw error;
        }
        if (signal?.aborted) {
          throw new PollCancelledError();
        }
        throw new TransportError(`${query.settlementDate}: ${describeError(error)}`, {cause: error});
      }
      if (!response.ok) {
        throw new UpstreamStatusError(response.status, `${query.settlementDate}: HTTP ${response.status}`);
      }
      batches.push(response.records);
    }
    return batches;
  }
}
