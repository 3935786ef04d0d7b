import { ConfigurationError } from "./errors";
import { CURRENT_DAY_PERIODS, PREVIOUS_DAY_PERIODS } from "./settlement-period";

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 24 * 60 * 60 * 1000;

export interface SettlementWindow {
  settlementDate: string;
  settlementPeriods: number[];
}

/**
 * A local calendar day expressed in settlement terms: the last two periods of the
 * previous settlement date followed by periods 1..46 of the selected one.
 */
export class SettlementDay {
  private readonly _utcMidnight: number;

  private constructor(utcMidnight: number) {
    this._utcMidnight = utcMidnight;
  }

  static fromIsoDate(value: string): SettlementDay {
    const match = ISO_DATE.exec(value.trim());
    if (!match) {
      throw new ConfigurationError(`Invalid settlement date '${value}'; expected YYYY-MM-DD`);
    }
    const [, year, month, day] = match;
    const utcMidnight = Date.UTC(Number(year), Number(month) - 1, Number(day));
    const roundTrip = new Date(utcMidnight).toISOString().slice(0, 10);
    if (roundTrip !== value.trim()) {
      throw new ConfigurationError(`Invalid settlement date '${value}'; no such calendar day`);
    }
    return new SettlementDay(utcMidnight);
  }

  static today(now: Date | number = Date.now()): SettlementDay {
    const instant = now instanceof Date ? now.getTime() : now;
    return new SettlementDay(Math.floor(instant / DAY_MS) * DAY_MS);
  }

  get date(): string {
    return new Date(this._utcMidnight).toISOString().slice(0, 10);
  }

  previous(): SettlementDay {
    return new SettlementDay(this._utcMidnight - DAY_MS);
  }

  windows(): SettlementWindow[] {
    return [
      {settlementDate: this.previous().date, settlementPeriods: [...PREVIOUS_DAY_PERIODS]},
      {settlementDate: this.date, settlementPeriods: [...CURRENT_DAY_PERIODS]},
    ];
  }

  toJSON(): string {
    return this.date;
  }
}
