export { Power } from "./power";
export { Energy } from "./energy";
export { Duration } from "./duration";
export { TimeStep } from "./time-step";
export { Percentage } from "./percentage";
export { ConfigurationError, describeError } from "./errors";
export type {
  BatteryConfig,
  EclipseFlag,
  EnergyBalanceRecord,
  LoadConfig,
  MissionReport,
  MissionRun,
  OrbitalGeometry,
  OrbitDetail,
  OrbitDetailPoint,
  PanelSeries,
  PanelSummary,
  SimulationConfig,
  SolarArrayConfig,
  TimeGridConfig,
  TransmissionConfig,
  ViabilityConfig,
} from "./simulation";
