export interface TimeGridConfig {
  step_seconds: number;
  orbit_period_seconds: number;
  mission_orbits: number;
}

export interface SolarArrayConfig {
  solar_constant_w_per_m2: number;
  panel_area_m2: number;
  packing_efficiency: number;
  panel_counts: readonly number[];
  cell_efficiency: number;
  mppt_efficiency: number;
  wiring_efficiency: number;
  panel_mass_kg: number;
}

export interface LoadConfig {
  obc_w: number;
  adcs_w: number;
  comms_w: number;
  payload_w: number;
  safe_mode_threshold_soc: number;
}

export interface TransmissionConfig {
  power_w: number;
  duration_seconds: number;
  reserve_fraction: number;
}

export interface BatteryConfig {
  capacity_wh: number;
  soc_min: number;
  soc_max: number;
  soc_initial: number;
  fade_rate_per_year: number;
  capacity_floor_fraction: number;
  self_discharge_per_month: number;
  charge_efficiency: number;
}

export interface ViabilityConfig {
  min_soc_threshold: number;
}

export interface SimulationConfig {
  readonly time: Readonly<TimeGridConfig>;
  readonly solar: Readonly<SolarArrayConfig>;
  readonly loads: Readonly<LoadConfig>;
  readonly transmission: Readonly<TransmissionConfig>;
  readonly battery: Readonly<BatteryConfig>;
  readonly viability: Readonly<ViabilityConfig>;
}

export type EclipseFlag = 0 | 1;

export interface OrbitalGeometry {
  elapsed_seconds: number;
  orbital_angle_deg: number;
  /** 0 while the sun is occluded, 1 otherwise. */
  eclipse_flag: EclipseFlag;
  projection_factor: number;
}

export interface EnergyBalanceRecord {
  solar_power_w: number;
  load_power_w: number;
  net_energy_wh: number;
  transmission_active: boolean;
  safe_mode: boolean;
}

export interface PanelSeries {
  panel_count: number;
  soc: number[];
  solar_power_w: number[];
  load_power_w: number[];
  net_energy_wh: number[];
  transmission_active: boolean[];
  safe_mode: boolean[];
}

export interface MissionRun {
  time_seconds: number[];
  orbital_angle_deg: number[];
  eclipse_flag: EclipseFlag[];
  series: PanelSeries[];
}

export interface PanelSummary {
  panel_count: number;
  mass_kg: number;
  min_soc: number;
  average_soc: number;
  final_soc: number;
  peak_solar_power_w: number;
  average_sunlit_power_w: number;
  transmissions: number;
  safe_mode_steps: number;
  viable: boolean;
}

export interface OrbitDetailPoint {
  orbital_angle_deg: number;
  in_eclipse: boolean;
  soc: number;
  solar_power_w: number;
  load_power_w: number;
  net_power_w: number;
}

export interface OrbitDetail {
  panel_count: number;
  points: OrbitDetailPoint[];
}

export interface MissionReport {
  mission_orbits: number;
  mission_hours: number;
  viability_threshold: number;
  steps: number;
  summaries: PanelSummary[];
  recommended_panel_count: number | null;
  orbit_detail: OrbitDetail | null;
}
