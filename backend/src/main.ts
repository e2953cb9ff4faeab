import "reflect-metadata";

import { Logger } from "@nestjs/common";
import type { INestApplicationContext } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";

import { ConfigurationError, describeError } from "@eps-sizer/domain";
import { AppModule } from "./app.module";
import { ConfigFileService } from "./config/config-file.service";
import { DEFAULT_LOG_LEVELS, resolveLogLevels } from "./config/logging";
import type { ConfigDocument } from "./config/schemas";
import { MissionRunnerService, type MissionOutcome } from "./mission/mission-runner.service";

async function loadConfiguration(app: INestApplicationContext): Promise<ConfigDocument> {
  const bootstrapLogger = new Logger("bootstrap");
  const configFileService = app.get(ConfigFileService);
  const document = await configFileService.loadDocument(configFileService.resolvePath());

  const {levels, normalized, fallbackUsed} = resolveLogLevels(document.logging.level);
  if (fallbackUsed) {
    bootstrapLogger.warn(`Unknown logging.level value '${document.logging.level}'; defaulting to INFO`);
  }
  Logger.overrideLogger(levels);
  bootstrapLogger.log(`Logger minimum level set to ${normalized.toUpperCase()}`);
  return document;
}

async function bootstrap(): Promise<MissionOutcome | null> {
  const logger = new Logger("eps-sizer");
  const app = await NestFactory.createApplicationContext(AppModule, {logger: DEFAULT_LOG_LEVELS});
  try {
    const document = await loadConfiguration(app);
    return app.get(MissionRunnerService).run(document);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error(error.message);
    } else {
      logger.error(`Mission sizing failed: ${describeError(error)}`);
    }
    process.exitCode = 1;
    return null;
  } finally {
    await app.close();
  }
}

if (process.env.NODE_ENV !== "test") {
  void bootstrap();
}

export { bootstrap };
