import { Logger } from "@nestjs/common";

import { parseImbalanceResponse, type RawImbalanceRecord } from "@imbalance-tracker/domain";
import type { SourceSettings } from "../config/poll-config.factory";
import type { DataSource, SourceQuery, SourceResponse } from "./source.types";
import { buildUrl, requestJson } from "./source.utils";

const DATASET_PATH = "forecast/indicated/day-ahead/evolution";

/** Indicated imbalance day-ahead evolution: every publication for the requested periods. */
export class BmrsImbalanceSource implements DataSource<RawImbalanceRecord> {
  readonly key = "bmrs-indicated-imbalance";
  private readonly logger = new Logger(BmrsImbalanceSource.name);

  constructor(private readonly settings: SourceSettings) {}

  async get(query: SourceQuery, signal?: AbortSignal): Promise<SourceResponse<RawImbalanceRecord>> {
    const url = buildUrl(this.settings.baseUrl, DATASET_PATH, {
      ...query.filters,
      settlementDate: query.settlementDate,
      settlementPeriod: query.settlementPeriods,
      format: "json",
    });
    this.logger.verbose(`GET ${url}`);
    const response = await requestJson(url, this.settings.requestTimeoutMs, signal);
    if (!response.ok) {
      return {ok: false, status: response.status, records: []};
    }
    const records = parseImbalanceResponse(response.payload);
    this.logger.verbose(`${query.settlementDate}: ${records.length} observation(s)`);
    return {ok: true, status: response.status, records};
  }
}
