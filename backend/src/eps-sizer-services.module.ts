import { Module } from "@nestjs/common";

import { ConfigFileService } from "./config/config-file.service";
import { SimulationConfigFactory } from "./config/simulation-config.factory";
import { MissionRunnerService } from "./mission/mission-runner.service";
import { ReportService } from "./report/report.service";
import { SimulationService } from "./simulation/simulation.service";
import { SummaryService } from "./simulation/summary.service";

@Module({
  providers: [
    ConfigFileService,
    SimulationConfigFactory,
    SimulationService,
    SummaryService,
    ReportService,
    MissionRunnerService,
  ],
  exports: [
    ConfigFileService,
    SimulationConfigFactory,
    SimulationService,
    SummaryService,
    ReportService,
    MissionRunnerService,
  ],
})
export class EpsSizerServicesModule {}
