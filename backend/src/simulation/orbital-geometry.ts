import { Duration } from "@eps-sizer/domain";
import type { EclipseFlag, OrbitalGeometry, TimeGridConfig } from "@eps-sizer/domain";

export const ECLIPSE_ENTRY_DEG = 120;
export const ECLIPSE_EXIT_DEG = 270;

const PROJECTION_BASE = 0.6;
const PROJECTION_SWING = 0.4;
const PROJECTION_PHASE_DEG = 45;

const toRadians = (degrees: number): number => (degrees * Math.PI) / 180;

/** Phase within the current orbit, in degrees on [0, 360). */
export function orbitalAngleDeg(elapsed: Duration, orbitPeriod: Duration): number {
  return (360 * elapsed.phaseWithin(orbitPeriod).seconds) / orbitPeriod.seconds;
}

/** The sun is occluded strictly between entry and exit; both edges count as lit. */
export function eclipseFlag(angleDeg: number): EclipseFlag {
  return angleDeg > ECLIPSE_ENTRY_DEG && angleDeg < ECLIPSE_EXIT_DEG ? 0 : 1;
}

export function projectionFactor(angleDeg: number): number {
  const factor = PROJECTION_BASE + PROJECTION_SWING * Math.cos(toRadians(angleDeg - PROJECTION_PHASE_DEG));
  return Math.max(factor, 0);
}

export function computeGeometry(elapsed: Duration, time: Readonly<TimeGridConfig>): OrbitalGeometry {
  const angle = orbitalAngleDeg(elapsed, Duration.fromSeconds(time.orbit_period_seconds));
  return {
    elapsed_seconds: elapsed.seconds,
    orbital_angle_deg: angle,
    eclipse_flag: eclipseFlag(angle),
    projection_factor: projectionFactor(angle),
  };
}
