import { describe, expect, it } from "vitest";

import {
  compareGeneration,
  fuelForPsrType,
  MalformedInputError,
  selectLocalDayRecords,
  summarizeGenerationError,
  type RawGenerationRecord,
} from "../src";

const row = (settlementPeriod: number, psrType: string, megawatts: number | null): RawGenerationRecord => ({
  settlementDate: "2025-03-10",
  settlementPeriod,
  psrType,
  megawatts,
  startTime: null,
});

describe("fuelForPsrType", () => {
  it("maps production types onto wind and solar", () => {
    expect(fuelForPsrType("Wind Offshore")).toBe("Wind");
    expect(fuelForPsrType("wind onshore")).toBe("Wind");
    expect(fuelForPsrType("Solar")).toBe("Solar");
    expect(fuelForPsrType("Biomass")).toBeNull();
    expect(fuelForPsrType(null)).toBeNull();
  });
});

describe("selectLocalDayRecords", () => {
  it("takes 47 and 48 from the previous date and 1..46 from the selected one", () => {
    const previous = [{settlementPeriod: 47}, {settlementPeriod: 1}, {settlementPeriod: 48}];
    const selected = [{settlementPeriod: 1}, {settlementPeriod: 47}, {settlementPeriod: 46}];
    expect(selectLocalDayRecords(previous, selected)).toEqual([
      {settlementPeriod: 47},
      {settlementPeriod: 48},
      {settlementPeriod: 1},
      {settlementPeriod: 46},
    ]);
  });
});

describe("compareGeneration", () => {
  const forecast = [
    row(1, "Wind Offshore", 100),
    row(1, "Wind Onshore", 50),
    row(1, "Solar", 20),
    row(2, "Wind Onshore", 200),
    row(2, "Biomass", 999),
  ];
  const actuals = [
    row(1, "Wind Onshore", 120),
    row(1, "Wind Offshore", 60),
    row(1, "Solar", 10),
    row(1, "Solar", null),
  ];

  it("sums production types per fuel and keeps periods present on both sides", () => {
    expect(compareGeneration(forecast, actuals)).toEqual([
      {
        settlementDate: "2025-03-10",
        settlementPeriod: 1,
        fuel: "Solar",
        startTime: null,
        forecastMw: 20,
        actualMw: 10,
        differenceMw: -10,
      },
      {
        settlementDate: "2025-03-10",
        settlementPeriod: 1,
        fuel: "Wind",
        startTime: null,
        forecastMw: 150,
        actualMw: 180,
        differenceMw: 30,
      },
    ]);
  });

  it("summarises the error per fuel", () => {
    const rows = compareGeneration(
      [row(1, "Wind Onshore", 100), row(2, "Wind Onshore", 100)],
      [row(1, "Wind Onshore", 130), row(2, "Wind Onshore", 90)],
    );
    expect(summarizeGenerationError(rows, "Wind")).toEqual({
      fuel: "Wind",
      samples: 2,
      meanErrorMw: 10,
      meanAbsoluteErrorMw: 20,
      maxUnderForecastMw: -10,
      maxOverForecastMw: 30,
    });
    expect(summarizeGenerationError(rows, "Solar")).toBeNull();
  });

  it("rejects rows with a value but no settlement period", () => {
    expect(() => compareGeneration([{psrType: "Solar", megawatts: 5}], [])).toThrow(MalformedInputError);
  });
});
