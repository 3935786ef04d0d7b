export const SETTLEMENT_PERIODS_PER_DAY = 48;

/** Periods of the previous settlement date that fall inside the local calendar day. */
export const PREVIOUS_DAY_PERIODS: readonly number[] = Object.freeze([47, 48]);

/** Periods of the selected settlement date that fall inside the local calendar day. */
export const CURRENT_DAY_PERIODS: readonly number[] = Object.freeze(
  Array.from({length: 46}, (_, index) => index + 1),
);

const CANONICAL_ORDER: readonly number[] = Object.freeze([...PREVIOUS_DAY_PERIODS, ...CURRENT_DAY_PERIODS]);

const RANK = new Map<number, number>(CANONICAL_ORDER.map((period, index) => [period, index]));

/**
 * Presentation order of settlement periods for a local day: 47, 48, then 1..46.
 * The sequence does not depend on the date; the parameter is accepted so callers can
 * pass the day they are rendering.
 */
export function canonicalOrder(_localDate?: string | Date): number[] {
  return [...CANONICAL_ORDER];
}

/** Index in the canonical order; unknown periods rank after every known one. */
export function settlementPeriodRank(period: number): number {
  return RANK.get(period) ?? CANONICAL_ORDER.length;
}

export function compareSettlementPeriods(a: number, b: number): number {
  const byRank = settlementPeriodRank(a) - settlementPeriodRank(b);
  if (byRank !== 0) {
    return byRank;
  }
  return a - b;
}

export function sortBySettlementPeriod<T>(items: readonly T[], periodOf: (item: T) => number): T[] {
  // Array.prototype.sort is stable, so items sharing a period keep their input order.
  return [...items].sort((left, right) => compareSettlementPeriods(periodOf(left), periodOf(right)));
}

export function isSettlementPeriod(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 1 && value <= 50;
}
