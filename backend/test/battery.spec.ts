import { describe, expect, it } from "vitest";

import { Duration, Energy, Power } from "@eps-sizer/domain";
import { advanceSoc, clampSoc, effectiveCapacity, netEnergy, selfDischargeFactor } from "../src/simulation/battery";
import { buildConfig } from "./support";

const STEP = Duration.fromSeconds(100);

describe("effectiveCapacity", () => {
  it("fades linearly with mission years", () => {
    const {battery} = buildConfig();
    expect(effectiveCapacity(battery, Duration.zero()).wattHours).toBe(10);
    expect(effectiveCapacity(battery, Duration.fromDays(365)).wattHours).toBeCloseTo(8, 12);
    expect(effectiveCapacity(battery, Duration.fromDays(365)).wattHours)
      .toBeLessThanOrEqual(effectiveCapacity(battery, Duration.zero()).wattHours);
  });

  it("never drops below the capacity floor", () => {
    const {battery} = buildConfig();
    expect(effectiveCapacity(battery, Duration.fromDays(365 * 10)).wattHours).toBeCloseTo(3, 12);
    expect(effectiveCapacity(battery, Duration.fromDays(365 * 100)).wattHours).toBeCloseTo(3, 12);
  });
});

describe("netEnergy", () => {
  it("passes discharge through without derating", () => {
    const {battery} = buildConfig();
    const delta = netEnergy(Power.zero(), Power.fromWatts(2.5), STEP, battery);
    expect(delta.wattHours).toBeCloseTo(-0.069444, 6);
  });

  it("applies the charge efficiency to surplus energy", () => {
    const {battery} = buildConfig();
    const delta = netEnergy(Power.fromWatts(10), Power.fromWatts(2.5), STEP, battery);
    expect(delta.wattHours).toBeCloseTo((7.5 * 100 / 3600) * 0.95, 12);
  });
});

describe("advanceSoc", () => {
  it("integrates a discharge step and applies self-discharge", () => {
    const {battery} = buildConfig();
    const delta = Energy.fromWattHours(-2.5 * 100 / 3600);
    const soc = advanceSoc(0.6, delta, Energy.fromWattHours(10), STEP, battery);
    expect(0.6 - soc).toBeGreaterThan(0.00694);
    expect(soc).toBeCloseTo(0.593055, 6);
  });

  it("derives self-discharge from the monthly rate", () => {
    const {battery} = buildConfig();
    expect(selfDischargeFactor(battery, STEP)).toBeCloseTo(1 - (0.02 / 30) * (100 / 86_400), 15);
  });

  it("saturates at both bounds", () => {
    const {battery} = buildConfig();
    const capacity = Energy.fromWattHours(10);
    expect(advanceSoc(0.205, Energy.fromWattHours(-1), capacity, STEP, battery)).toBe(0.2);
    expect(advanceSoc(0.99, Energy.fromWattHours(1), capacity, STEP, battery)).toBe(0.99);
    expect(clampSoc(0.2, battery)).toBe(0.2);
    expect(clampSoc(0.5, battery)).toBe(0.5);
  });
});
