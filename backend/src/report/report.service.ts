import { Injectable, Logger } from "@nestjs/common";
import { Percentage } from "@eps-sizer/domain";
import type { MissionReport, PanelSummary } from "@eps-sizer/domain";
import { seriesRange } from "../simulation/summary.service";

const RULE = "=".repeat(60);

const formatSoc = (value: number): string => Percentage.fromRatio(value).format(1);

const formatPowers = (summaries: PanelSummary[], pick: (summary: PanelSummary) => number): string =>
  summaries.map((summary) => `${summary.panel_count}p=${pick(summary).toFixed(2)}`).join(", ");

function renderPanelBlock(summary: PanelSummary, missionOrbits: number): string[] {
  return [
    `${summary.panel_count} Panels:`,
    `  Min SOC: ${formatSoc(summary.min_soc)}`,
    `  Avg SOC: ${formatSoc(summary.average_soc)}`,
    `  Final SOC (${missionOrbits} orbits): ${formatSoc(summary.final_soc)}`,
    `  Mass: ${summary.mass_kg.toFixed(2)} kg`,
    `  Transmissions: ${summary.transmissions}, safe-mode steps: ${summary.safe_mode_steps}`,
    `  Status: ${summary.viable ? "VIABLE" : "FAILS"}`,
  ];
}

function renderRecommendation(report: MissionReport): string {
  const recommended = report.summaries.find((summary) => summary.panel_count === report.recommended_panel_count);
  if (!recommended) {
    return `RECOMMENDATION: no candidate keeps SOC above ${formatSoc(report.viability_threshold)}`;
  }
  return `RECOMMENDATION: ${recommended.panel_count} panels (${recommended.mass_kg.toFixed(2)} kg) is the lightest viable configuration`;
}

export function renderReport(report: MissionReport): string[] {
  const lines = [
    RULE,
    "EPS OPTIMIZATION RESULTS",
    RULE,
    `Mission: ${report.mission_orbits} orbits (${report.mission_hours.toFixed(1)} h), ${report.steps} steps`,
    `Peak solar power per config [W]: ${formatPowers(report.summaries, (summary) => summary.peak_solar_power_w)}`,
    `Average sunlit power [W]: ${formatPowers(report.summaries, (summary) => summary.average_sunlit_power_w)}`,
  ];
  for (const summary of report.summaries) {
    lines.push("", ...renderPanelBlock(summary, report.mission_orbits));
  }
  lines.push("", RULE, renderRecommendation(report), RULE);

  const detail = report.orbit_detail;
  const socRange = detail ? seriesRange(detail.points.map((point) => point.soc)) : null;
  if (detail && socRange) {
    const eclipsed = detail.points.filter((point) => point.in_eclipse).length;
    lines.push(
      `Last orbit (${detail.panel_count} panels): ${detail.points.length} steps, ${eclipsed} in eclipse, ` +
      `SOC ${formatSoc(socRange.min)} to ${formatSoc(socRange.max)}`,
    );
  }
  return lines;
}

@Injectable()
export class ReportService {
  private readonly logger = new Logger(ReportService.name);

  render(report: MissionReport): string[] {
    const lines = renderReport(report);
    this.logger.verbose(`Rendered report with ${lines.length} lines`);
    return lines;
  }
}
