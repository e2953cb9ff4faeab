import { describe, expect, it } from "vitest";

import type { MissionReport } from "@eps-sizer/domain";
import { renderReport, ReportService } from "../src/report/report.service";

const RULE = "=".repeat(60);

const baseReport: MissionReport = {
  mission_orbits: 2,
  mission_hours: 11_400 / 3600,
  viability_threshold: 0.3,
  steps: 114,
  summaries: [
    {
      panel_count: 1,
      mass_kg: 0.05,
      min_soc: 0.2637,
      average_soc: 0.3894,
      final_soc: 0.2859,
      peak_solar_power_w: 1.881171,
      average_sunlit_power_w: 1.460482,
      transmissions: 0,
      safe_mode_steps: 36,
      viable: false,
    },
    {
      panel_count: 2,
      mass_kg: 0.1,
      min_soc: 0.3478,
      average_soc: 0.5028,
      final_soc: 0.3532,
      peak_solar_power_w: 3.762342,
      average_sunlit_power_w: 2.920965,
      transmissions: 0,
      safe_mode_steps: 0,
      viable: true,
    },
  ],
  recommended_panel_count: 2,
  orbit_detail: null,
};

describe("renderReport", () => {
  it("renders the sanity block, one block per configuration and the recommendation", () => {
    expect(renderReport(baseReport)).toEqual([
      RULE,
      "EPS OPTIMIZATION RESULTS",
      RULE,
      "Mission: 2 orbits (3.2 h), 114 steps",
      "Peak solar power per config [W]: 1p=1.88, 2p=3.76",
      "Average sunlit power [W]: 1p=1.46, 2p=2.92",
      "",
      "1 Panels:",
      "  Min SOC: 26.4%",
      "  Avg SOC: 38.9%",
      "  Final SOC (2 orbits): 28.6%",
      "  Mass: 0.05 kg",
      "  Transmissions: 0, safe-mode steps: 36",
      "  Status: FAILS",
      "",
      "2 Panels:",
      "  Min SOC: 34.8%",
      "  Avg SOC: 50.3%",
      "  Final SOC (2 orbits): 35.3%",
      "  Mass: 0.10 kg",
      "  Transmissions: 0, safe-mode steps: 0",
      "  Status: VIABLE",
      "",
      RULE,
      "RECOMMENDATION: 2 panels (0.10 kg) is the lightest viable configuration",
      RULE,
    ]);
  });

  it("says so when no configuration is viable", () => {
    const lines = renderReport({...baseReport, recommended_panel_count: null});
    expect(lines[lines.length - 2]).toBe("RECOMMENDATION: no candidate keeps SOC above 30.0%");
  });

  it("appends a last-orbit line when a detail is present", () => {
    const lines = renderReport({
      ...baseReport,
      orbit_detail: {
        panel_count: 4,
        points: [
          {orbital_angle_deg: 0, in_eclipse: false, soc: 0.5, solar_power_w: 6, load_power_w: 2.5, net_power_w: 3.5},
          {orbital_angle_deg: 130, in_eclipse: true, soc: 0.45, solar_power_w: 0, load_power_w: 2.5, net_power_w: -2.5},
          {orbital_angle_deg: 200, in_eclipse: true, soc: 0.4, solar_power_w: 0, load_power_w: 2.5, net_power_w: -2.5},
        ],
      },
    });
    expect(lines[lines.length - 1]).toBe("Last orbit (4 panels): 3 steps, 2 in eclipse, SOC 40.0% to 50.0%");
  });

  it("renders an orbit detail with more samples than a call can take as arguments", () => {
    const points = Array.from({length: 200_000}, (_, index) => ({
      orbital_angle_deg: (index * 360) / 200_000,
      in_eclipse: index % 2 === 0,
      soc: 0.3 + (index % 1000) / 10_000,
      solar_power_w: 0,
      load_power_w: 2.5,
      net_power_w: -2.5,
    }));
    const lines = renderReport({...baseReport, orbit_detail: {panel_count: 4, points}});
    expect(lines[lines.length - 1]).toBe("Last orbit (4 panels): 200000 steps, 100000 in eclipse, SOC 30.0% to 40.0%");
  });
});

describe("ReportService", () => {
  it("delegates to the pure renderer", () => {
    expect(new ReportService().render(baseReport)).toEqual(renderReport(baseReport));
  });
});
