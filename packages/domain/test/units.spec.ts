import { describe, expect, it } from "vitest";

import { ConfigurationError, describeError, Duration, Energy, Percentage, Power, TimeStep } from "../src";

describe("Duration", () => {
  it("converts between seconds, hours, days and years", () => {
    const day = Duration.fromDays(1);
    expect(day.seconds).toBe(86_400);
    expect(day.hours).toBe(24);
    expect(Duration.fromDays(365).years).toBe(1);
    expect(Duration.fromSeconds(5700).hours).toBeCloseTo(95 / 60, 12);
  });

  it("reduces elapsed time to a phase within a period", () => {
    expect(Duration.fromSeconds(5750).phaseWithin(Duration.fromSeconds(5700)).seconds).toBe(50);
    expect(() => Duration.fromSeconds(10).phaseWithin(Duration.zero())).toThrow(RangeError);
  });

  it("rejects non-finite values", () => {
    expect(() => Duration.fromSeconds(Number.NaN)).toThrow(TypeError);
  });
});

describe("Power and Energy", () => {
  it("integrates power over a duration", () => {
    const energy = Power.fromWatts(15).forDuration(Duration.fromSeconds(900));
    expect(energy.wattHours).toBe(3.75);
  });

  it("sums power contributions", () => {
    expect(Power.sum([Power.fromWatts(0.5), Power.fromWatts(1.5)]).watts).toBe(2);
    expect(Power.sum([]).watts).toBe(0);
  });

  it("expresses energy as a signed fraction of a capacity", () => {
    expect(Energy.fromWattHours(-0.5).fractionOf(Energy.fromWattHours(10))).toBe(-0.05);
    expect(() => Energy.fromWattHours(1).fractionOf(Energy.fromWattHours(0))).toThrow(RangeError);
  });

  it("compares and picks the larger energy", () => {
    const small = Energy.fromWattHours(3);
    const large = Energy.fromWattHours(8);
    expect(large.exceeds(small)).toBe(true);
    expect(small.max(large)).toBe(large);
    expect(Energy.fromWattHours(0).isPositive()).toBe(false);
  });
});

describe("Percentage", () => {
  it("clamps into [0, 1]", () => {
    expect(Percentage.fromRatio(1.2).ratio).toBe(1);
    expect(Percentage.fromRatio(-0.1).ratio).toBe(0);
  });

  it("chains efficiencies multiplicatively", () => {
    const chained = Percentage.chain(Percentage.fromRatio(0.5), Percentage.fromRatio(0.5));
    expect(chained.ratio).toBe(0.25);
    expect(Percentage.chain().ratio).toBe(1);
  });

  it("formats with a fixed number of decimals", () => {
    expect(Percentage.fromRatio(0.25).format()).toBe("25.0%");
    expect(Percentage.fromRatio(0.5).format(0)).toBe("50%");
  });
});

describe("TimeStep", () => {
  const step = Duration.fromSeconds(100);

  it("counts grid points in a half-open horizon", () => {
    expect(TimeStep.countWithin(Duration.fromSeconds(570_000), step)).toBe(5700);
    expect(TimeStep.countWithin(Duration.fromSeconds(250), step)).toBe(3);
  });

  it("derives elapsed time from its index", () => {
    const third = TimeStep.at(3, step);
    expect(third.index).toBe(3);
    expect(third.elapsed.seconds).toBe(300);
  });

  it("walks the grid one step at a time", () => {
    const fourth = TimeStep.at(3, step).next();
    expect(fourth.index).toBe(4);
    expect(fourth.elapsed.seconds).toBe(400);
  });

  it("rejects negative indices", () => {
    expect(() => TimeStep.at(-1, step)).toThrow(RangeError);
  });
});

describe("errors", () => {
  it("lists every configuration issue", () => {
    const error = new ConfigurationError(["a is wrong", "b is wrong"]);
    expect(error.name).toBe("ConfigurationError");
    expect(error.issues).toEqual(["a is wrong", "b is wrong"]);
    expect(error.message).toBe("Invalid configuration (2 issues):\n  - a is wrong\n  - b is wrong");
  });

  it("describes unknown thrown values", () => {
    expect(describeError(new Error("boom"))).toBe("boom");
    expect(describeError("plain")).toBe("plain");
  });
});
