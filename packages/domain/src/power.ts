import type { Duration } from "./duration";
import { Energy } from "./energy";
import { Percentage } from "./percentage";

export class Power {
  private readonly _watts: number;

  private constructor(watts: number) {
    if (!Number.isFinite(watts)) {
      throw new TypeError("Power requires a finite numeric value in watts");
    }
    this._watts = watts;
  }

  static fromWatts(value: number): Power {
    return new Power(value);
  }

  static zero(): Power {
    return new Power(0);
  }

  static sum(values: Power[]): Power {
    return values.reduce((total, value) => total.add(value), Power.zero());
  }

  get watts(): number {
    return this._watts;
  }

  add(other: Power): Power {
    return new Power(this._watts + other._watts);
  }

  subtract(other: Power): Power {
    return new Power(this._watts - other._watts);
  }

  scale(factor: number | Percentage): Power {
    const numeric = factor instanceof Percentage ? factor.ratio : factor;
    return new Power(this._watts * numeric);
  }

  forDuration(duration: Duration): Energy {
    return Energy.fromPowerAndDuration(this, duration);
  }
}
