import { Injectable } from "@nestjs/common";

import { ConfigurationError, Duration, SettlementDay } from "@imbalance-tracker/domain";
import type { ConfigDocument } from "./schemas";

export const DEFAULT_BASE_URL = "https://data.elexon.co.uk/bmrs/api/v1";
export const DEFAULT_REQUEST_TIMEOUT_MS = 15_000;
export const DEFAULT_UPDATE_INTERVAL_MINUTES = 30;
export const DEFAULT_RETRY_INCREMENTS_SECONDS: readonly number[] = [30, 60, 120];
export const DEFAULT_MAX_FETCH_ATTEMPTS = 5;
export const DEFAULT_INTER_ATTEMPT_DELAY_SECONDS = 2;
export const DEFAULT_INTER_REQUEST_PAUSE_SECONDS = 1;

export interface PollConfig {
  settlementDay: SettlementDay;
  updateInterval: Duration;
  retryEnabled: boolean;
  retryIncrements: Duration[];
  maxFetchAttempts: number;
  interAttemptDelay: Duration;
  interRequestPause: Duration;
}

export interface SourceSettings {
  baseUrl: string;
  requestTimeoutMs: number;
}

@Injectable()
export class PollConfigFactory {
  create(config: ConfigDocument, now: Date | number = Date.now()): PollConfig {
    const polling = config.polling ?? {};

    const settlementDay = config.settlement_date
      ? SettlementDay.fromIsoDate(config.settlement_date)
      : SettlementDay.today(now);

    const intervalMinutes = polling.update_interval_minutes ?? DEFAULT_UPDATE_INTERVAL_MINUTES;
    if (!(intervalMinutes > 0)) {
      throw new ConfigurationError("polling.update_interval_minutes must be positive");
    }

    const retryEnabled = polling.retry_enabled ?? true;
    const incrementsSeconds = polling.retry_increments_seconds ?? DEFAULT_RETRY_INCREMENTS_SECONDS;
    if (retryEnabled && incrementsSeconds.length === 0) {
      throw new ConfigurationError("polling.retry_increments_seconds must not be empty while retries are enabled");
    }
    if (incrementsSeconds.some((value) => !Number.isFinite(value) || value < 0)) {
      throw new ConfigurationError("polling.retry_increments_seconds must contain non-negative numbers");
    }

    const maxAttempts = polling.max_fetch_attempts ?? DEFAULT_MAX_FETCH_ATTEMPTS;
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new ConfigurationError("polling.max_fetch_attempts must be an integer of at least 1");
    }

    return {
      settlementDay,
      updateInterval: Duration.fromMinutes(intervalMinutes),
      retryEnabled,
      retryIncrements: incrementsSeconds.map((seconds) => Duration.fromSeconds(seconds)),
      maxFetchAttempts: maxAttempts,
      interAttemptDelay: Duration.fromSeconds(polling.inter_attempt_delay_seconds ?? DEFAULT_INTER_ATTEMPT_DELAY_SECONDS),
      interRequestPause: Duration.fromSeconds(polling.inter_request_pause_seconds ?? DEFAULT_INTER_REQUEST_PAUSE_SECONDS),
    };
  }

  createSourceSettings(config: ConfigDocument): SourceSettings {
    const source = config.source ?? {};
    return {
      baseUrl: (source.base_url ?? DEFAULT_BASE_URL).replace(/\/+$/, ""),
      requestTimeoutMs: source.request_timeout_ms ?? DEFAULT_REQUEST_TIMEOUT_MS,
    };
  }
}
