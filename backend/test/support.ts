import type { OrbitalGeometry, SimulationConfig } from "@eps-sizer/domain";
import { parseConfigDocument, type ConfigDocumentInput } from "../src/config/schemas";
import { SimulationConfigFactory } from "../src/config/simulation-config.factory";

export function buildConfig(input: ConfigDocumentInput = {}): SimulationConfig {
  return new SimulationConfigFactory().create(parseConfigDocument(input));
}

export function geometryAt(angleDeg: number, eclipseFlag: 0 | 1, projectionFactor = 1): OrbitalGeometry {
  return {
    elapsed_seconds: 0,
    orbital_angle_deg: angleDeg,
    eclipse_flag: eclipseFlag,
    projection_factor: projectionFactor,
  };
}
