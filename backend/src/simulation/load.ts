import { Duration, Power } from "@eps-sizer/domain";
import type { Energy, LoadConfig, OrbitalGeometry, SimulationConfig, TransmissionConfig } from "@eps-sizer/domain";

export interface LoadDecision {
  baseline: Power;
  load: Power;
  safe_mode: boolean;
  transmission_active: boolean;
}

export function nominalLoad(loads: Readonly<LoadConfig>): Power {
  return Power.sum([
    Power.fromWatts(loads.obc_w),
    Power.fromWatts(loads.adcs_w),
    Power.fromWatts(loads.comms_w),
    Power.fromWatts(loads.payload_w),
  ]);
}

/** Angular width of the per-orbit transmission window, starting at 0°. */
export function transmissionWindowDeg(transmission: Readonly<TransmissionConfig>, orbitPeriodSeconds: number): number {
  return (360 * transmission.duration_seconds) / orbitPeriodSeconds;
}

/** Safe mode engages strictly below the threshold. */
export function isSafeMode(previousSoc: number, loads: Readonly<LoadConfig>): boolean {
  return previousSoc < loads.safe_mode_threshold_soc;
}

export function baselineLoad(previousSoc: number, loads: Readonly<LoadConfig>): Power {
  return isSafeMode(previousSoc, loads) ? Power.fromWatts(loads.obc_w) : nominalLoad(loads);
}

/**
 * The pass is only taken if the battery, after covering the nominal bus for the
 * whole pass, still holds the reserve plus the transmitter's own energy.
 */
export function hasTransmissionReserve(
  previousSoc: number,
  capacity: Energy,
  config: Pick<SimulationConfig, "loads" | "transmission">,
): boolean {
  const passDuration = Duration.fromSeconds(config.transmission.duration_seconds);
  const available = capacity.scale(previousSoc);
  const busEnergy = nominalLoad(config.loads).forDuration(passDuration);
  const transmitEnergy = Power.fromWatts(config.transmission.power_w).forDuration(passDuration);
  const reserve = capacity.scale(config.transmission.reserve_fraction);
  return available.subtract(busEnergy).exceeds(reserve.add(transmitEnergy));
}

export function isInTransmissionWindow(
  geometry: OrbitalGeometry,
  config: Pick<SimulationConfig, "time" | "transmission">,
): boolean {
  const width = transmissionWindowDeg(config.transmission, config.time.orbit_period_seconds);
  return geometry.eclipse_flag === 1 && geometry.orbital_angle_deg >= 0 && geometry.orbital_angle_deg <= width;
}

export function resolveLoad(
  previousSoc: number,
  geometry: OrbitalGeometry,
  capacity: Energy,
  config: Pick<SimulationConfig, "time" | "loads" | "transmission">,
): LoadDecision {
  const baseline = baselineLoad(previousSoc, config.loads);
  const transmissionActive =
    isInTransmissionWindow(geometry, config) && hasTransmissionReserve(previousSoc, capacity, config);
  return {
    baseline,
    load: transmissionActive ? baseline.add(Power.fromWatts(config.transmission.power_w)) : baseline,
    safe_mode: isSafeMode(previousSoc, config.loads),
    transmission_active: transmissionActive,
  };
}
