import { Logger } from "@nestjs/common";

import { parseGenerationResponse, type RawGenerationRecord } from "@imbalance-tracker/domain";
import type { SourceSettings } from "../config/poll-config.factory";
import type { DataSource, SourceQuery, SourceResponse } from "./source.types";
import { buildUrl, nextIsoDate, requestJson } from "./source.utils";

export type GenerationKind = "forecast" | "actual";

/**
 * Wind and solar generation for one UTC settlement date, either the day-ahead
 * forecast or the actual/estimated outturn.
 */
export class BmrsGenerationSource implements DataSource<RawGenerationRecord> {
  readonly key: string;
  private readonly logger = new Logger(BmrsGenerationSource.name);

  constructor(
    private readonly kind: GenerationKind,
    private readonly settings: SourceSettings,
  ) {
    this.key = `bmrs-wind-solar-${kind}`;
  }

  async get(query: SourceQuery, signal?: AbortSignal): Promise<SourceResponse<RawGenerationRecord>> {
    const url = this.kind === "forecast" ? this.forecastUrl(query) : this.actualUrl(query);
    this.logger.verbose(`GET ${url}`);
    const response = await requestJson(url, this.settings.requestTimeoutMs, signal);
    if (!response.ok) {
      return {ok: false, status: response.status, records: []};
    }
    return {ok: true, status: response.status, records: parseGenerationResponse(response.payload)};
  }

  private forecastUrl(query: SourceQuery): string {
    return buildUrl(this.settings.baseUrl, "forecast/generation/wind-and-solar/day-ahead", {
      ...query.filters,
      from: `${query.settlementDate}T00:00Z`,
      to: `${query.settlementDate}T23:30Z`,
      processType: "Day ahead",
      format: "json",
    });
  }

  private actualUrl(query: SourceQuery): string {
    const periods = query.settlementPeriods ?? [];
    return buildUrl(this.settings.baseUrl, "generation/actual/per-type/wind-and-solar", {
      ...query.filters,
      from: `${query.settlementDate}T00:00Z`,
      to: `${nextIsoDate(query.settlementDate)}T00:00Z`,
      settlementPeriodFrom: periods.length ? Math.min(...periods) : 1,
      settlementPeriodTo: periods.length ? Math.max(...periods) : 48,
      format: "json",
    });
  }
}
