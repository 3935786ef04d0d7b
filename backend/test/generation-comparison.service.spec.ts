import { afterEach, describe, expect, it } from "vitest";

import { ConfigurationError, type RawGenerationRecord } from "@imbalance-tracker/domain";
import { PollConfigFactory } from "../src/config/poll-config.factory";
import { clearRuntimeConfig, setRuntimeConfig } from "../src/config/runtime-config";
import { RuntimeConfigService } from "../src/config/runtime-config.service";
import type { ConfigDocument } from "../src/config/schemas";
import { GenerationComparisonService } from "../src/generation/generation-comparison.service";
import type { SourceQuery } from "../src/sources/source.types";
import { FakeSource, ok } from "./support/fake-source";
import { ManualClock } from "./support/manual-clock";

const DAY = "2025-03-10";
const PREVIOUS = "2025-03-09";

const generation = (settlementDate: string, settlementPeriod: number, psrType: string, megawatts: number): RawGenerationRecord => ({
  settlementDate,
  settlementPeriod,
  psrType,
  megawatts,
});

const byDate = (rows: Record<string, RawGenerationRecord[]>) => (query: SourceQuery) => ok(rows[query.settlementDate] ?? []);

describe("GenerationComparisonService", () => {
  afterEach(() => {
    clearRuntimeConfig();
  });

  const createService = (document: ConfigDocument) => {
    setRuntimeConfig(document);
    const clock = new ManualClock(Date.parse(`${DAY}T12:00:00Z`));
    const forecast = new FakeSource<RawGenerationRecord>(byDate({
      [PREVIOUS]: [generation(PREVIOUS, 47, "Wind Onshore", 100), generation(PREVIOUS, 10, "Wind Onshore", 5)],
      [DAY]: [generation(DAY, 1, "Solar", 20)],
    }));
    const actual = new FakeSource<RawGenerationRecord>(byDate({
      [PREVIOUS]: [generation(PREVIOUS, 47, "Wind Offshore", 90)],
      [DAY]: [generation(DAY, 1, "Solar", 25)],
    }));
    const service = new GenerationComparisonService(new RuntimeConfigService(), new PollConfigFactory(), {forecast, actual}, clock);
    return {service, clock, forecast, actual};
  };

  it("pauses between the two settlement dates of each dataset", async () => {
    const {service, clock, forecast, actual} = createService({polling: {inter_request_pause_seconds: 1}});

    const comparison = await service.compare(DAY);

    expect(clock.sleeps).toEqual([1000, 1000]);
    expect(forecast.queries.map((query) => query.settlementDate)).toEqual([PREVIOUS, DAY]);
    expect(actual.queries.map((query) => query.settlementDate)).toEqual([PREVIOUS, DAY]);
    expect(comparison.rows.map((row) => [row.fuel, row.settlementDate, row.settlementPeriod, row.differenceMw])).toEqual([
      ["Solar", DAY, 1, 5],
      ["Wind", PREVIOUS, 47, -10],
    ]);
  });

  it("refuses to compare when disabled", async () => {
    const {service, forecast} = createService({generation: {enabled: false}});

    await expect(service.compare(DAY)).rejects.toBeInstanceOf(ConfigurationError);
    expect(forecast.queries).toHaveLength(0);
  });
});
