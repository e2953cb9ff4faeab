import { Injectable, Logger } from "@nestjs/common";
import { Duration } from "@eps-sizer/domain";
import type {
  MissionReport,
  MissionRun,
  OrbitDetail,
  PanelSeries,
  PanelSummary,
  SimulationConfig,
} from "@eps-sizer/domain";
import { missionStepCount } from "./simulation.service";

const mean = (values: number[]): number =>
  values.length ? values.reduce((total, value) => total + value, 0) / values.length : 0;

export interface SeriesRange {
  min: number;
  max: number;
}

/** Min and max in one pass, without spreading the samples into call arguments. */
export function seriesRange(values: readonly number[]): SeriesRange | null {
  if (!values.length) {
    return null;
  }
  let min = values[0];
  let max = values[0];
  for (const value of values) {
    if (value < min) {
      min = value;
    } else if (value > max) {
      max = value;
    }
  }
  return {min, max};
}

export function summarizeSeries(series: PanelSeries, config: SimulationConfig): PanelSummary {
  const sunlit = series.solar_power_w.filter((power) => power > 0);
  const minSoc = seriesRange(series.soc)?.min ?? config.battery.soc_initial;
  return {
    panel_count: series.panel_count,
    mass_kg: series.panel_count * config.solar.panel_mass_kg,
    min_soc: minSoc,
    average_soc: mean(series.soc),
    final_soc: series.soc.length ? series.soc[series.soc.length - 1] : config.battery.soc_initial,
    peak_solar_power_w: seriesRange(series.solar_power_w)?.max ?? 0,
    average_sunlit_power_w: mean(sunlit),
    transmissions: series.transmission_active.filter(Boolean).length,
    safe_mode_steps: series.safe_mode.filter(Boolean).length,
    viable: minSoc > config.viability.min_soc_threshold,
  };
}

/** Lightest viable candidate, or null when no candidate stays above the threshold. */
export function recommendPanelCount(summaries: PanelSummary[]): number | null {
  const viable = summaries.filter((summary) => summary.viable);
  if (!viable.length) {
    return null;
  }
  return viable.reduce((best, summary) => (summary.panel_count < best.panel_count ? summary : best)).panel_count;
}

/** The last full orbit of one configuration; the whole run when it is shorter. */
export function extractOrbitDetail(run: MissionRun, config: SimulationConfig, panelCount: number): OrbitDetail | null {
  const series = run.series.find((candidate) => candidate.panel_count === panelCount);
  if (!series) {
    return null;
  }
  const window = Math.floor(config.time.orbit_period_seconds / config.time.step_seconds);
  const start = window > 0 ? Math.max(0, run.time_seconds.length - window) : 0;
  const points = run.orbital_angle_deg.slice(start).map((angle, offset) => {
    const index = start + offset;
    return {
      orbital_angle_deg: angle,
      in_eclipse: run.eclipse_flag[index] === 0,
      soc: series.soc[index],
      solar_power_w: series.solar_power_w[index],
      load_power_w: series.load_power_w[index],
      net_power_w: series.solar_power_w[index] - series.load_power_w[index],
    };
  });
  return {panel_count: panelCount, points};
}

@Injectable()
export class SummaryService {
  private readonly logger = new Logger(SummaryService.name);

  toReport(run: MissionRun, config: SimulationConfig, detailPanelCount: number | null): MissionReport {
    this.logger.log(`Building mission summary for ${run.series.length} configuration(s)`);
    const summaries = run.series.map((series) => summarizeSeries(series, config));
    const recommended = recommendPanelCount(summaries);
    const orbitDetail = detailPanelCount == null ? null : extractOrbitDetail(run, config, detailPanelCount);
    if (detailPanelCount != null && !orbitDetail) {
      this.logger.warn(`Orbit detail requested for ${detailPanelCount} panel(s), which is not a candidate`);
    }
    this.logger.verbose(
      `Summary context: viable=${summaries.filter((summary) => summary.viable).length}, ` +
      `recommended=${recommended ?? "none"}, detail_points=${orbitDetail?.points.length ?? 0}`,
    );

    return {
      mission_orbits: config.time.mission_orbits,
      mission_hours: Duration.fromSeconds(config.time.mission_orbits * config.time.orbit_period_seconds).hours,
      viability_threshold: config.viability.min_soc_threshold,
      steps: missionStepCount(config),
      summaries,
      recommended_panel_count: recommended,
      orbit_detail: orbitDetail,
    };
  }
}
