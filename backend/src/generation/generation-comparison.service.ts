import { Inject, Injectable, Logger } from "@nestjs/common";

import {
  compareGeneration,
  ConfigurationError,
  SettlementDay,
  selectLocalDayRecords,
  summarizeGenerationError,
  type Fuel,
  type GenerationComparisonRow,
  type GenerationErrorSummary,
  type RawGenerationRecord,
} from "@imbalance-tracker/domain";
import { PollConfigFactory } from "../config/poll-config.factory";
import { RuntimeConfigService } from "../config/runtime-config.service";
import { CLOCK, type Clock } from "../polling/clock";
import { RetryingFetcher } from "../polling/retrying-fetcher";
import type { DataSource, SourceQuery } from "../sources/source.types";

export const GENERATION_SOURCES = Symbol("GENERATION_SOURCES");

export interface GenerationSources {
  forecast: DataSource<RawGenerationRecord>;
  actual: DataSource<RawGenerationRecord>;
}

export interface GenerationComparison {
  date: string;
  rows: GenerationComparisonRow[];
  summaries: GenerationErrorSummary[];
}

const FUELS: readonly Fuel[] = ["Wind", "Solar"];

/** Day-ahead wind and solar forecast against outturn for one local day. */
@Injectable()
export class GenerationComparisonService {
  private readonly logger = new Logger(GenerationComparisonService.name);
  private readonly enabled: boolean;
  private readonly forecastFetcher: RetryingFetcher<RawGenerationRecord>;
  private readonly actualFetcher: RetryingFetcher<RawGenerationRecord>;

  constructor(
    @Inject(RuntimeConfigService) configState: RuntimeConfigService,
    @Inject(PollConfigFactory) configFactory: PollConfigFactory,
    @Inject(GENERATION_SOURCES) sources: GenerationSources,
    @Inject(CLOCK) clock: Clock,
  ) {
    const document = configState.getDocument();
    const config = configFactory.create(document, clock.now());
    this.enabled = document.generation?.enabled ?? true;
    const options = {
      maxAttempts: config.maxFetchAttempts,
      interAttemptDelay: config.interAttemptDelay,
      interRequestPause: config.interRequestPause,
    };
    this.forecastFetcher = new RetryingFetcher(sources.forecast, options, clock);
    this.actualFetcher = new RetryingFetcher(sources.actual, options, clock);
  }

  async compare(localDate: string, signal?: AbortSignal): Promise<GenerationComparison> {
    if (!this.enabled) {
      throw new ConfigurationError("Generation comparison is disabled (generation.enabled=false)");
    }
    const day = SettlementDay.fromIsoDate(localDate);
    const previousDate = day.previous().date;
    this.logger.log(`Comparing wind and solar forecast with outturn for ${day.date}`);

    const queries = [{settlementDate: previousDate}, {settlementDate: day.date}];
    const forecast = await this.fetchLocalDay(this.forecastFetcher, queries, signal);
    const actuals = await this.fetchLocalDay(this.actualFetcher, queries, signal);

    const rows = compareGeneration(forecast, actuals);
    const summaries = FUELS
      .map((fuel) => summarizeGenerationError(rows, fuel))
      .filter((summary): summary is GenerationErrorSummary => summary !== null);
    for (const summary of summaries) {
      this.logger.log(
        `${summary.fuel}: ${summary.samples} periods, mean error ${summary.meanErrorMw.toFixed(1)} MW, MAE ${summary.meanAbsoluteErrorMw.toFixed(1)} MW`,
      );
    }
    if (!rows.length) {
      this.logger.warn(`No overlapping forecast and outturn rows for ${day.date}`);
    }
    return {date: day.date, rows, summaries};
  }

  private async fetchLocalDay(
    fetcher: RetryingFetcher<RawGenerationRecord>,
    queries: readonly SourceQuery[],
    signal?: AbortSignal,
  ): Promise<RawGenerationRecord[]> {
    const [previous = [], selected = []] = await fetcher.fetchBatches(queries, signal);
    return selectLocalDayRecords(previous, selected);
  }
}
