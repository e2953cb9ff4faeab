import { Inject, Injectable, Logger } from "@nestjs/common";
import type { MissionReport, MissionRun } from "@eps-sizer/domain";

import type { ConfigDocument } from "../config/schemas";
import { SimulationConfigFactory } from "../config/simulation-config.factory";
import { ReportService } from "../report/report.service";
import { SimulationService } from "../simulation/simulation.service";
import { SummaryService } from "../simulation/summary.service";

export interface MissionOutcome {
  run: MissionRun;
  report: MissionReport;
  lines: string[];
}

@Injectable()
export class MissionRunnerService {
  private readonly logger = new Logger(MissionRunnerService.name);

  constructor(
    @Inject(SimulationConfigFactory) private readonly configFactory: SimulationConfigFactory,
    @Inject(SimulationService) private readonly simulationService: SimulationService,
    @Inject(SummaryService) private readonly summaryService: SummaryService,
    @Inject(ReportService) private readonly reportService: ReportService,
  ) {
  }

  run(document: ConfigDocument): MissionOutcome {
    const config = this.configFactory.create(document);
    const run = this.simulationService.run(config);
    const report = this.summaryService.toReport(run, config, document.report.detail_panel_count);
    const lines = this.reportService.render(report);
    for (const line of lines) {
      this.logger.log(line);
    }
    return {run, report, lines};
  }
}
