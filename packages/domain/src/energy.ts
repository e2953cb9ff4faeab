import type { Duration } from "./duration";
import { Percentage } from "./percentage";
import type { Power } from "./power";

export class Energy {
  private readonly _wattHours: number;

  private constructor(wattHours: number) {
    if (!Number.isFinite(wattHours)) {
      throw new TypeError("Energy requires a finite numeric value in watt-hours");
    }
    this._wattHours = wattHours;
  }

  static fromWattHours(value: number): Energy {
    return new Energy(value);
  }

  static fromPowerAndDuration(power: Power, duration: Duration): Energy {
    return new Energy(power.watts * duration.hours);
  }

  get wattHours(): number {
    return this._wattHours;
  }

  add(other: Energy): Energy {
    return new Energy(this._wattHours + other._wattHours);
  }

  subtract(other: Energy): Energy {
    return new Energy(this._wattHours - other._wattHours);
  }

  scale(factor: number | Percentage): Energy {
    const numeric = factor instanceof Percentage ? factor.ratio : factor;
    return new Energy(this._wattHours * numeric);
  }

  /** Share of `capacity` this energy represents, unbounded and signed. */
  fractionOf(capacity: Energy): number {
    if (capacity._wattHours === 0) {
      throw new RangeError("Cannot express energy as a fraction of zero capacity");
    }
    return this._wattHours / capacity._wattHours;
  }

  isPositive(): boolean {
    return this._wattHours > 0;
  }

  exceeds(other: Energy): boolean {
    return this._wattHours > other._wattHours;
  }

  max(other: Energy): Energy {
    return this._wattHours >= other._wattHours ? this : other;
  }
}
