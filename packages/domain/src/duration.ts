const SECONDS_PER_HOUR = 3600;
const SECONDS_PER_DAY = 86_400;
const DAYS_PER_YEAR = 365;

export class Duration {
  private readonly _seconds: number;

  private constructor(seconds: number) {
    if (!Number.isFinite(seconds)) {
      throw new TypeError("Duration requires a finite numeric value in seconds");
    }
    this._seconds = seconds;
  }

  static fromSeconds(value: number): Duration {
    return new Duration(value);
  }

  static fromDays(value: number): Duration {
    return new Duration(value * SECONDS_PER_DAY);
  }

  static zero(): Duration {
    return new Duration(0);
  }

  get seconds(): number {
    return this._seconds;
  }

  get hours(): number {
    return this._seconds / SECONDS_PER_HOUR;
  }

  get days(): number {
    return this._seconds / SECONDS_PER_DAY;
  }

  /** Mission years use a flat 365-day year. */
  get years(): number {
    return this.days / DAYS_PER_YEAR;
  }

  /** Fraction of `other` covered by this duration. */
  ratioOf(other: Duration): number {
    if (other._seconds === 0) {
      throw new RangeError("Cannot compute a ratio against a zero duration");
    }
    return this._seconds / other._seconds;
  }

  /** Remainder after removing whole multiples of `period`. */
  phaseWithin(period: Duration): Duration {
    if (period._seconds <= 0) {
      throw new RangeError("Period must be positive");
    }
    return new Duration(this._seconds % period._seconds);
  }
}
