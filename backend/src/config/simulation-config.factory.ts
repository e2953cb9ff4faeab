import { Injectable, Logger } from "@nestjs/common";

import { ConfigurationError } from "@eps-sizer/domain";
import type { SimulationConfig } from "@eps-sizer/domain";
import type { ConfigDocument } from "./schemas";

type IssueSink = (message: string) => void;

function requirePositive(value: number, key: string, report: IssueSink): void {
  if (!(value > 0)) {
    report(`${key} must be greater than 0 (got ${value})`);
  }
}

function requireNonNegative(value: number, key: string, report: IssueSink): void {
  if (value < 0) {
    report(`${key} must not be negative (got ${value})`);
  }
}

function requireRatio(value: number, key: string, report: IssueSink): void {
  if (value < 0 || value > 1) {
    report(`${key} must be within [0, 1] (got ${value})`);
  }
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  const nestedValues: unknown[] = Object.values(value);
  for (const nested of nestedValues) {
    if (typeof nested === "object" && nested !== null && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}

export function collectConfigurationIssues(document: ConfigDocument): string[] {
  const issues: string[] = [];
  const report: IssueSink = (message) => issues.push(message);
  const {time, solar, loads, transmission, battery, viability} = document;

  requirePositive(time.step_seconds, "time.step_seconds", report);
  requirePositive(time.orbit_period_seconds, "time.orbit_period_seconds", report);
  requirePositive(time.mission_orbits, "time.mission_orbits", report);
  const missionSeconds = time.mission_orbits * time.orbit_period_seconds;
  if (time.step_seconds > 0 && missionSeconds > 0 && time.step_seconds > missionSeconds) {
    report(`time.step_seconds (${time.step_seconds}) exceeds the mission duration (${missionSeconds} s)`);
  }

  requirePositive(solar.solar_constant_w_per_m2, "solar.solar_constant_w_per_m2", report);
  requirePositive(solar.panel_area_m2, "solar.panel_area_m2", report);
  requireNonNegative(solar.panel_mass_kg, "solar.panel_mass_kg", report);
  requireRatio(solar.packing_efficiency, "solar.packing_efficiency", report);
  requireRatio(solar.cell_efficiency, "solar.cell_efficiency", report);
  requireRatio(solar.mppt_efficiency, "solar.mppt_efficiency", report);
  requireRatio(solar.wiring_efficiency, "solar.wiring_efficiency", report);
  if (!solar.panel_counts.length) {
    report("solar.panel_counts must list at least one candidate");
  }
  const seen = new Set<number>();
  solar.panel_counts.forEach((count, index) => {
    if (!Number.isInteger(count) || count <= 0) {
      report(`solar.panel_counts[${index}] must be a positive integer (got ${count})`);
    } else if (seen.has(count)) {
      report(`solar.panel_counts[${index}] duplicates panel count ${count}`);
    }
    seen.add(count);
  });

  requireNonNegative(loads.obc_w, "loads.obc_w", report);
  requireNonNegative(loads.adcs_w, "loads.adcs_w", report);
  requireNonNegative(loads.comms_w, "loads.comms_w", report);
  requireNonNegative(loads.payload_w, "loads.payload_w", report);
  requireRatio(loads.safe_mode_threshold_soc, "loads.safe_mode_threshold_soc", report);

  requireNonNegative(transmission.power_w, "transmission.power_w", report);
  requireNonNegative(transmission.duration_seconds, "transmission.duration_seconds", report);
  requireRatio(transmission.reserve_fraction, "transmission.reserve_fraction", report);
  if (time.orbit_period_seconds > 0 && transmission.duration_seconds > time.orbit_period_seconds) {
    report(
      `transmission.duration_seconds (${transmission.duration_seconds}) exceeds the orbit period (${time.orbit_period_seconds} s)`,
    );
  }

  requirePositive(battery.capacity_wh, "battery.capacity_wh", report);
  requireRatio(battery.soc_min, "battery.soc_min", report);
  requireRatio(battery.soc_max, "battery.soc_max", report);
  if (battery.soc_min >= battery.soc_max) {
    report(`battery.soc_min (${battery.soc_min}) must be lower than battery.soc_max (${battery.soc_max})`);
  } else if (battery.soc_initial < battery.soc_min || battery.soc_initial > battery.soc_max) {
    report(
      `battery.soc_initial (${battery.soc_initial}) must lie within [${battery.soc_min}, ${battery.soc_max}]`,
    );
  }
  requireNonNegative(battery.fade_rate_per_year, "battery.fade_rate_per_year", report);
  requireRatio(battery.self_discharge_per_month, "battery.self_discharge_per_month", report);
  requireRatio(battery.charge_efficiency, "battery.charge_efficiency", report);
  // Effective capacity divides the SOC update; keep it above zero.
  if (!(battery.capacity_floor_fraction > 0) || battery.capacity_floor_fraction > 1) {
    report(`battery.capacity_floor_fraction must be within (0, 1] (got ${battery.capacity_floor_fraction})`);
  }

  requireRatio(viability.min_soc_threshold, "viability.min_soc_threshold", report);
  return issues;
}

@Injectable()
export class SimulationConfigFactory {
  private readonly logger = new Logger(SimulationConfigFactory.name);

  create(document: ConfigDocument): SimulationConfig {
    const issues = collectConfigurationIssues(document);
    if (issues.length) {
      this.logger.warn(`Rejecting configuration with ${issues.length} issue(s)`);
      throw new ConfigurationError(issues);
    }

    const config: SimulationConfig = {
      time: {...document.time},
      solar: {...document.solar, panel_counts: [...document.solar.panel_counts]},
      loads: {...document.loads},
      transmission: {...document.transmission},
      battery: {...document.battery},
      viability: {...document.viability},
    };
    this.logger.verbose(
      `Simulation config ready: dt=${config.time.step_seconds}s, orbit=${config.time.orbit_period_seconds}s, ` +
      `orbits=${config.time.mission_orbits}, panels=[${config.solar.panel_counts.join(", ")}]`,
    );
    return deepFreeze(config);
  }
}
