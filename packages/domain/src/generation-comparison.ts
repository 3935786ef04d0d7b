import { MalformedInputError } from "./errors";
import { compareSettlementPeriods, CURRENT_DAY_PERIODS, isSettlementPeriod, PREVIOUS_DAY_PERIODS } from "./settlement-period";

export type Fuel = "Wind" | "Solar";

export interface RawGenerationRecord {
  settlementDate?: string | null;
  settlementPeriod?: number | null;
  psrType?: string | null;
  startTime?: string | null;
  megawatts?: number | null;
}

export interface GenerationComparisonRow {
  settlementDate: string;
  settlementPeriod: number;
  fuel: Fuel;
  startTime: string | null;
  forecastMw: number;
  actualMw: number;
  /** Actual minus forecast. */
  differenceMw: number;
}

export interface GenerationErrorSummary {
  fuel: Fuel;
  samples: number;
  meanErrorMw: number;
  meanAbsoluteErrorMw: number;
  maxUnderForecastMw: number;
  maxOverForecastMw: number;
}

interface AggregatedGeneration {
  settlementDate: string;
  settlementPeriod: number;
  fuel: Fuel;
  megawatts: number;
  startTime: string | null;
}

export function fuelForPsrType(psrType: string | null | undefined): Fuel | null {
  if (!psrType) {
    return null;
  }
  const lower = psrType.toLowerCase();
  if (lower.includes("solar")) {
    return "Solar";
  }
  if (lower.includes("wind")) {
    return "Wind";
  }
  return null;
}

/**
 * Keep the rows belonging to one local day: periods 47 and 48 of the previous
 * settlement date and periods 1..46 of the selected one.
 */
export function selectLocalDayRecords<T extends { settlementPeriod?: number | null }>(
  previousDate: readonly T[],
  selectedDate: readonly T[],
): T[] {
  const inPrevious = (record: T) => record.settlementPeriod != null && PREVIOUS_DAY_PERIODS.includes(record.settlementPeriod);
  const inSelected = (record: T) => record.settlementPeriod != null && CURRENT_DAY_PERIODS.includes(record.settlementPeriod);
  return [...previousDate.filter(inPrevious), ...selectedDate.filter(inSelected)];
}

function generationKey(settlementDate: string, settlementPeriod: number, fuel: Fuel): string {
  return `${settlementDate}#${settlementPeriod}#${fuel}`;
}

function earliest(a: string | null, b: string | null): string | null {
  if (a === null) return b;
  if (b === null) return a;
  return Date.parse(b) < Date.parse(a) ? b : a;
}

export function aggregateGeneration(records: readonly RawGenerationRecord[]): Map<string, AggregatedGeneration> {
  const totals = new Map<string, AggregatedGeneration>();
  records.forEach((record, index) => {
    const fuel = fuelForPsrType(record.psrType);
    const megawatts = record.megawatts;
    if (!fuel || typeof megawatts !== "number" || !Number.isFinite(megawatts)) {
      return;
    }
    const settlementDate = record.settlementDate?.trim();
    const settlementPeriod = record.settlementPeriod;
    if (!settlementDate || !isSettlementPeriod(settlementPeriod)) {
      throw new MalformedInputError(`Generation record #${index} lacks settlementDate or settlementPeriod`);
    }
    const key = generationKey(settlementDate, settlementPeriod, fuel);
    const existing = totals.get(key);
    if (existing) {
      existing.megawatts += megawatts;
      existing.startTime = earliest(existing.startTime, record.startTime ?? null);
      return;
    }
    totals.set(key, {settlementDate, settlementPeriod, fuel, megawatts, startTime: record.startTime ?? null});
  });
  return totals;
}

/** Inner-join forecast and actual totals per settlement period and fuel. */
export function compareGeneration(
  forecast: readonly RawGenerationRecord[],
  actuals: readonly RawGenerationRecord[],
): GenerationComparisonRow[] {
  const forecastTotals = aggregateGeneration(forecast);
  const actualTotals = aggregateGeneration(actuals);
  const rows: GenerationComparisonRow[] = [];

  for (const [key, predicted] of forecastTotals) {
    const observed = actualTotals.get(key);
    if (!observed) {
      continue;
    }
    rows.push({
      settlementDate: predicted.settlementDate,
      settlementPeriod: predicted.settlementPeriod,
      fuel: predicted.fuel,
      startTime: predicted.startTime ?? observed.startTime,
      forecastMw: predicted.megawatts,
      actualMw: observed.megawatts,
      differenceMw: observed.megawatts - predicted.megawatts,
    });
  }

  return rows.sort((a, b) => {
    if (a.fuel !== b.fuel) {
      return a.fuel.localeCompare(b.fuel);
    }
    const byPeriod = compareSettlementPeriods(a.settlementPeriod, b.settlementPeriod);
    return byPeriod !== 0 ? byPeriod : a.settlementDate.localeCompare(b.settlementDate);
  });
}

export function summarizeGenerationError(
  rows: readonly GenerationComparisonRow[],
  fuel: Fuel,
): GenerationErrorSummary | null {
  const differences = rows.filter((row) => row.fuel === fuel).map((row) => row.differenceMw);
  if (!differences.length) {
    return null;
  }
  const total = differences.reduce((sum, value) => sum + value, 0);
  const absoluteTotal = differences.reduce((sum, value) => sum + Math.abs(value), 0);
  return {
    fuel,
    samples: differences.length,
    meanErrorMw: total / differences.length,
    meanAbsoluteErrorMw: absoluteTotal / differences.length,
    maxUnderForecastMw: Math.min(...differences),
    maxOverForecastMw: Math.max(...differences),
  };
}
