import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { isAbsolute, join, resolve } from "node:path";
import { Inject, Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";

import { ConfigurationError, describeError } from "@eps-sizer/domain";
import { parseConfigDocument, type ConfigDocument } from "./schemas";

export const CONFIG_PATH_ENV = "EPS_SIZER_CONFIG";
const DEFAULT_CONFIG_FILE = "config.json";

@Injectable()
export class ConfigFileService {
  private readonly logger = new Logger(ConfigFileService.name);

  constructor(@Inject(ConfigService) private readonly env: ConfigService) {
  }

  resolvePath(cwd = process.cwd()): string {
    const override = this.env.get<string>(CONFIG_PATH_ENV)?.trim();
    if (override) {
      const resolved = isAbsolute(override) ? override : resolve(cwd, override);
      this.logger.verbose(`Using configuration from ${CONFIG_PATH_ENV}: ${resolved}`);
      return resolved;
    }
    const candidates = [join(cwd, DEFAULT_CONFIG_FILE), join(cwd, "..", DEFAULT_CONFIG_FILE)];
    const found = candidates.find((candidate) => existsSync(candidate));
    if (!found) {
      throw new ConfigurationError([
        `no configuration file found (looked in ${candidates.join(", ")}; set ${CONFIG_PATH_ENV} to override)`,
      ]);
    }
    return found;
  }

  async loadDocument(path: string): Promise<ConfigDocument> {
    this.logger.log(`Loading configuration from ${path}`);
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(path, "utf-8"));
    } catch (error) {
      throw new ConfigurationError([`cannot read ${path}: ${describeError(error)}`]);
    }
    return parseConfigDocument(raw);
  }
}
