export class Percentage {
  private readonly _ratio: number;

  private constructor(ratio: number) {
    this._ratio = Percentage.normalize(ratio);
  }

  static fromRatio(value: number): Percentage {
    return new Percentage(value);
  }

  static full(): Percentage {
    return new Percentage(1);
  }

  /** Product of a chain of efficiencies, e.g. cell × MPPT × wiring. */
  static chain(...stages: Percentage[]): Percentage {
    return stages.reduce((total, stage) => total.times(stage), Percentage.full());
  }

  get ratio(): number {
    return this._ratio;
  }

  get percent(): number {
    return this._ratio * 100;
  }

  times(other: Percentage): Percentage {
    return new Percentage(this._ratio * other._ratio);
  }

  format(fractionDigits = 1): string {
    return `${this.percent.toFixed(fractionDigits)}%`;
  }

  private static normalize(value: number): number {
    if (!Number.isFinite(value)) {
      throw new TypeError("Percentage requires a finite numeric value");
    }
    if (value < 0) {
      return 0;
    }
    if (value > 1) {
      return 1;
    }
    return value;
  }
}
