import { Energy, Percentage } from "@eps-sizer/domain";
import type { BatteryConfig, Duration, Power } from "@eps-sizer/domain";

const DAYS_PER_MONTH = 30;

/** Linear fade with mission age, never below the configured floor of nominal capacity. */
export function effectiveCapacity(battery: Readonly<BatteryConfig>, elapsed: Duration): Energy {
  const nominal = Energy.fromWattHours(battery.capacity_wh);
  const faded = nominal.scale(1 - battery.fade_rate_per_year * elapsed.years);
  return faded.max(nominal.scale(battery.capacity_floor_fraction));
}

/** Energy delivered to the cells over one step; only charging is derated. */
export function netEnergy(solar: Power, load: Power, step: Duration, battery: Readonly<BatteryConfig>): Energy {
  const delta = solar.subtract(load).forDuration(step);
  return delta.isPositive() ? delta.scale(Percentage.fromRatio(battery.charge_efficiency)) : delta;
}

export function selfDischargeFactor(battery: Readonly<BatteryConfig>, step: Duration): number {
  const perDay = battery.self_discharge_per_month / DAYS_PER_MONTH;
  return 1 - perDay * step.days;
}

export function clampSoc(soc: number, battery: Readonly<BatteryConfig>): number {
  return Math.min(Math.max(soc, battery.soc_min), battery.soc_max);
}

export function advanceSoc(
  previousSoc: number,
  delta: Energy,
  capacity: Energy,
  step: Duration,
  battery: Readonly<BatteryConfig>,
): number {
  const integrated = previousSoc + delta.fractionOf(capacity);
  return clampSoc(integrated * selfDischargeFactor(battery, step), battery);
}
