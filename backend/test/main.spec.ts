import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { bootstrap } from "../src/main";
import { CONFIG_PATH_ENV } from "../src/config/config-file.service";

describe("bootstrap", () => {
  let workDir: string;

  beforeEach(() => {
    workDir = mkdtempSync(join(tmpdir(), "eps-sizer-main-"));
  });

  afterEach(() => {
    rmSync(workDir, {recursive: true, force: true});
    delete process.env[CONFIG_PATH_ENV];
    process.exitCode = undefined;
  });

  it("sizes the mission described by the configured file", async () => {
    const path = join(workDir, "mission.json");
    writeFileSync(path, JSON.stringify({
      logging: {level: "warn"},
      time: {mission_orbits: 1},
      solar: {panel_counts: [3, 4]},
    }));
    process.env[CONFIG_PATH_ENV] = path;

    const outcome = await bootstrap();

    expect(outcome?.report.steps).toBe(57);
    expect(outcome?.report.summaries.map((summary) => summary.panel_count)).toEqual([3, 4]);
    expect(outcome?.report.orbit_detail?.points).toHaveLength(57);
    expect(process.exitCode).toBeUndefined();
  });

  it("sets a failing exit code for an invalid configuration", async () => {
    const path = join(workDir, "mission.json");
    writeFileSync(path, JSON.stringify({battery: {soc_min: 0.9, soc_max: 0.1}}));
    process.env[CONFIG_PATH_ENV] = path;

    const outcome = await bootstrap();

    expect(outcome).toBeNull();
    expect(process.exitCode).toBe(1);
  });
});
