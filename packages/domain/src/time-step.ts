import { Duration } from "./duration";

/** Position on the fixed simulation grid: `elapsed = index × step`. */
export class TimeStep {
  private readonly _index: number;
  private readonly _step: Duration;

  private constructor(index: number, step: Duration) {
    if (!Number.isInteger(index) || index < 0) {
      throw new RangeError("Time step index must be a non-negative integer");
    }
    if (step.seconds <= 0) {
      throw new RangeError("Time step size must be positive");
    }
    this._index = index;
    this._step = step;
  }

  static at(index: number, step: Duration): TimeStep {
    return new TimeStep(index, step);
  }

  /** Number of grid points in `[0, horizon)`. */
  static countWithin(horizon: Duration, step: Duration): number {
    return Math.max(0, Math.ceil(horizon.ratioOf(step)));
  }

  get index(): number {
    return this._index;
  }

  get elapsed(): Duration {
    return Duration.fromSeconds(this._index * this._step.seconds);
  }

  next(): TimeStep {
    return new TimeStep(this._index + 1, this._step);
  }
}
