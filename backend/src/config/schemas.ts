import { z } from "zod";

import { ConfigurationError } from "@eps-sizer/domain";

const finite = () => z.number().finite();

export const timeGridSchema = z.object({
  step_seconds: finite().default(100),
  orbit_period_seconds: finite().default(95 * 60),
  mission_orbits: finite().default(100),
});

export const solarArraySchema = z.object({
  solar_constant_w_per_m2: finite().default(1361),
  panel_area_m2: finite().default(0.1 * 0.1),
  packing_efficiency: finite().default(0.5),
  panel_counts: z.array(finite()).default([1, 2, 3, 4, 5, 6]),
  cell_efficiency: finite().default(0.3),
  mppt_efficiency: finite().default(0.95),
  wiring_efficiency: finite().default(0.97),
  panel_mass_kg: finite().default(0.05),
});

export const loadSchema = z.object({
  obc_w: finite().default(0.5),
  adcs_w: finite().default(0.8),
  comms_w: finite().default(0.7),
  payload_w: finite().default(0.5),
  safe_mode_threshold_soc: finite().default(0.3),
});

export const transmissionSchema = z.object({
  power_w: finite().default(15),
  duration_seconds: finite().default(15 * 60),
  reserve_fraction: finite().default(0.3),
});

export const batterySchema = z.object({
  capacity_wh: finite().default(10),
  soc_min: finite().default(0.2),
  soc_max: finite().default(0.99),
  soc_initial: finite().default(0.6),
  fade_rate_per_year: finite().default(0.2),
  capacity_floor_fraction: finite().default(0.3),
  self_discharge_per_month: finite().default(0.02),
  charge_efficiency: finite().default(0.95),
});

export const viabilitySchema = z.object({
  min_soc_threshold: finite().default(0.25),
});

export const loggingSchema = z.object({
  level: z.string().default("info"),
});

export const reportSchema = z.object({
  detail_panel_count: finite().nullable().default(4),
});

export const configDocumentSchema = z.object({
  logging: loggingSchema.default({}),
  time: timeGridSchema.default({}),
  solar: solarArraySchema.default({}),
  loads: loadSchema.default({}),
  transmission: transmissionSchema.default({}),
  battery: batterySchema.default({}),
  viability: viabilitySchema.default({}),
  report: reportSchema.default({}),
});

export type ConfigDocument = z.infer<typeof configDocumentSchema>;
export type ConfigDocumentInput = z.input<typeof configDocumentSchema>;

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.length ? issue.path.join(".") : "(root)";
  return `${path}: ${issue.message}`;
}

export function parseConfigDocument(raw: unknown): ConfigDocument {
  const result = configDocumentSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigurationError(result.error.issues.map(formatIssue));
  }
  return result.data;
}
