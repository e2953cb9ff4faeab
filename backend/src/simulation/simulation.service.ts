import { Injectable, Logger } from "@nestjs/common";
import { Duration, TimeStep } from "@eps-sizer/domain";
import type {
  Energy,
  EnergyBalanceRecord,
  MissionRun,
  OrbitalGeometry,
  Percentage,
  PanelSeries,
  SimulationConfig,
} from "@eps-sizer/domain";
import { advanceSoc, effectiveCapacity, netEnergy } from "./battery";
import { resolveLoad } from "./load";
import { computeGeometry } from "./orbital-geometry";
import { conversionEfficiency, describePanelConfiguration, solarPower, type PanelConfiguration } from "./solar";

export interface StepContext {
  geometry: OrbitalGeometry;
  capacity: Energy;
  step: Duration;
  efficiency: Percentage;
  config: SimulationConfig;
}

export interface PanelStepResult {
  soc: number;
  record: EnergyBalanceRecord;
}

const IDLE_RECORD: EnergyBalanceRecord = {
  solar_power_w: 0,
  load_power_w: 0,
  net_energy_wh: 0,
  transmission_active: false,
  safe_mode: false,
};

export function missionStepCount(config: SimulationConfig): number {
  const horizon = Duration.fromSeconds(config.time.mission_orbits * config.time.orbit_period_seconds);
  return TimeStep.countWithin(horizon, Duration.fromSeconds(config.time.step_seconds));
}

/** Geometry → solar → load → battery for one configuration over one step. */
export function advancePanel(panel: PanelConfiguration, previousSoc: number, context: StepContext): PanelStepResult {
  const {geometry, capacity, step, efficiency, config} = context;
  const solar = solarPower(panel, geometry, efficiency);
  const load = resolveLoad(previousSoc, geometry, capacity, config);
  const delta = netEnergy(solar, load.load, step, config.battery);
  return {
    soc: advanceSoc(previousSoc, delta, capacity, step, config.battery),
    record: {
      solar_power_w: solar.watts,
      load_power_w: load.load.watts,
      net_energy_wh: delta.wattHours,
      transmission_active: load.transmission_active,
      safe_mode: load.safe_mode,
    },
  };
}

function appendStep(series: PanelSeries, soc: number, record: EnergyBalanceRecord): void {
  series.soc.push(soc);
  series.solar_power_w.push(record.solar_power_w);
  series.load_power_w.push(record.load_power_w);
  series.net_energy_wh.push(record.net_energy_wh);
  series.transmission_active.push(record.transmission_active);
  series.safe_mode.push(record.safe_mode);
}

function emptySeries(panelCount: number): PanelSeries {
  return {
    panel_count: panelCount,
    soc: [],
    solar_power_w: [],
    load_power_w: [],
    net_energy_wh: [],
    transmission_active: [],
    safe_mode: [],
  };
}

/**
 * Runs every candidate panel count over the whole mission grid. Time is a strict
 * fold; within a step each configuration only reads its own previous SOC and the
 * shared geometry, so the per-configuration map has no ordering dependency.
 */
export function simulateMission(config: SimulationConfig): MissionRun {
  const step = Duration.fromSeconds(config.time.step_seconds);
  const stepCount = missionStepCount(config);
  const efficiency = conversionEfficiency(config.solar);
  const panels = config.solar.panel_counts.map((count) => describePanelConfiguration(config.solar, count));

  const run: MissionRun = {
    time_seconds: [],
    orbital_angle_deg: [],
    eclipse_flag: [],
    series: panels.map((panel) => emptySeries(panel.panel_count)),
  };

  for (let timeStep = TimeStep.at(0, step); timeStep.index < stepCount; timeStep = timeStep.next()) {
    const index = timeStep.index;
    const geometry = computeGeometry(timeStep.elapsed, config.time);
    run.time_seconds.push(geometry.elapsed_seconds);
    run.orbital_angle_deg.push(geometry.orbital_angle_deg);
    run.eclipse_flag.push(geometry.eclipse_flag);

    if (index === 0) {
      run.series.forEach((series) => appendStep(series, config.battery.soc_initial, IDLE_RECORD));
      continue;
    }

    const context: StepContext = {
      geometry,
      capacity: effectiveCapacity(config.battery, timeStep.elapsed),
      step,
      efficiency,
      config,
    };
    const results = panels.map((panel, p) => advancePanel(panel, run.series[p].soc[index - 1], context));
    results.forEach(({soc, record}, p) => appendStep(run.series[p], soc, record));
  }

  return run;
}

@Injectable()
export class SimulationService {
  private readonly logger = new Logger(SimulationService.name);

  run(config: SimulationConfig): MissionRun {
    this.logger.log(
      `Running mission simulation with steps=${missionStepCount(config)}, ` +
      `configurations=${config.solar.panel_counts.length}, initial_soc=${config.battery.soc_initial}`,
    );
    const started = performance.now();
    const run = simulateMission(config);
    this.logger.verbose(`Simulation finished in ${(performance.now() - started).toFixed(1)} ms`);
    for (const series of run.series) {
      const finalSoc = series.soc.length ? series.soc[series.soc.length - 1] : config.battery.soc_initial;
      this.logger.verbose(`${series.panel_count} panel(s): final SOC ${finalSoc.toFixed(4)}`);
    }
    return run;
  }
}
