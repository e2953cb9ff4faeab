import { Percentage, Power } from "@eps-sizer/domain";
import type { OrbitalGeometry, SolarArrayConfig } from "@eps-sizer/domain";

export interface PanelConfiguration {
  panel_count: number;
  total_area_m2: number;
  /** Raw irradiance on the active area before any conversion losses. */
  peak_power: Power;
  mass_kg: number;
}

export function describePanelConfiguration(solar: Readonly<SolarArrayConfig>, panelCount: number): PanelConfiguration {
  const totalArea = panelCount * solar.panel_area_m2 * solar.packing_efficiency;
  return {
    panel_count: panelCount,
    total_area_m2: totalArea,
    peak_power: Power.fromWatts(solar.solar_constant_w_per_m2 * totalArea),
    mass_kg: panelCount * solar.panel_mass_kg,
  };
}

export function conversionEfficiency(solar: Readonly<SolarArrayConfig>): Percentage {
  return Percentage.chain(
    Percentage.fromRatio(solar.cell_efficiency),
    Percentage.fromRatio(solar.mppt_efficiency),
    Percentage.fromRatio(solar.wiring_efficiency),
  );
}

export function solarPower(
  panel: PanelConfiguration,
  geometry: OrbitalGeometry,
  efficiency: Percentage,
): Power {
  if (geometry.eclipse_flag === 0 || geometry.projection_factor === 0) {
    return Power.zero();
  }
  return panel.peak_power.scale(efficiency).scale(geometry.projection_factor);
}
