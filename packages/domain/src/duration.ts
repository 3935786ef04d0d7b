export class Duration {
  private readonly _milliseconds: number;

  private constructor(milliseconds: number) {
    if (!Number.isFinite(milliseconds)) {
      throw new TypeError("Duration requires a finite number of milliseconds");
    }
    if (milliseconds < 0) {
      throw new RangeError("Duration cannot be negative");
    }
    this._milliseconds = milliseconds;
  }

  static fromMilliseconds(value: number): Duration {
    return new Duration(value);
  }

  static fromSeconds(value: number): Duration {
    return new Duration(value * 1000);
  }

  static fromMinutes(value: number): Duration {
    return new Duration(value * 60_000);
  }

  static zero(): Duration {
    return new Duration(0);
  }

  /** Time from `from` until `to`, clamped to zero when `to` is not after `from`. */
  static until(from: Date | number, to: Date | number): Duration {
    const fromMs = from instanceof Date ? from.getTime() : from;
    const toMs = to instanceof Date ? to.getTime() : to;
    return new Duration(Math.max(0, toMs - fromMs));
  }

  get milliseconds(): number {
    return this._milliseconds;
  }

  get seconds(): number {
    return this._milliseconds / 1000;
  }

  get minutes(): number {
    return this._milliseconds / 60_000;
  }

  isZero(): boolean {
    return this._milliseconds === 0;
  }

  add(other: Duration): Duration {
    return new Duration(this._milliseconds + other._milliseconds);
  }

  after(instant: Date | number): Date {
    const base = instant instanceof Date ? instant.getTime() : instant;
    return new Date(base + this._milliseconds);
  }

  equals(other: Duration | null | undefined): boolean {
    return other instanceof Duration && other._milliseconds === this._milliseconds;
  }

  toJSON(): number {
    return this._milliseconds;
  }

  toString(): string {
    const totalSeconds = Math.round(this.seconds);
    const hours = Math.floor(totalSeconds / 3600);
    const minutes = Math.floor((totalSeconds % 3600) / 60);
    const seconds = totalSeconds % 60;
    const pad = (value: number) => String(value).padStart(2, "0");
    return `${pad(hours)}:${pad(minutes)}:${pad(seconds)}`;
  }
}
