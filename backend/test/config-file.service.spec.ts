import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ConfigurationError } from "@imbalance-tracker/domain";
import { ConfigFileService } from "../src/config/config-file.service";

describe("ConfigFileService", () => {
  let folder: string;
  let originalOverride: string | undefined;
  const service = new ConfigFileService();

  beforeEach(() => {
    folder = mkdtempSync(join(tmpdir(), "imbalance-config-"));
    originalOverride = process.env.IMBALANCE_TRACKER_CONFIG;
  });

  afterEach(() => {
    rmSync(folder, {recursive: true, force: true});
    if (originalOverride === undefined) {
      delete process.env.IMBALANCE_TRACKER_CONFIG;
    } else {
      process.env.IMBALANCE_TRACKER_CONFIG = originalOverride;
    }
  });

  it("loads the file named by the environment", async () => {
    const path = join(folder, "custom.yaml");
    writeFileSync(path, [
      "settlement_date: \"2025-03-10\"",
      "polling:",
      "  update_interval_minutes: 15",
      "  retry_increments_seconds: [10, 20]",
      "logging:",
      "  level: debug",
      "",
    ].join("\n"));
    process.env.IMBALANCE_TRACKER_CONFIG = path;

    const resolved = service.resolvePath();
    expect(resolved).toBe(path);
    await expect(service.loadDocument(resolved)).resolves.toEqual({
      settlement_date: "2025-03-10",
      polling: {update_interval_minutes: 15, retry_increments_seconds: [10, 20]},
      logging: {level: "debug"},
    });
  });

  it("fails when the named file is missing", () => {
    process.env.IMBALANCE_TRACKER_CONFIG = join(folder, "absent.yaml");
    expect(() => service.resolvePath()).toThrow(ConfigurationError);
  });

  it("uses defaults without a file", async () => {
    await expect(service.loadDocument(null)).resolves.toEqual({});
  });

  it("reports invalid documents as configuration errors", async () => {
    const path = join(folder, "broken.yaml");
    writeFileSync(path, "polling:\n  retry_enabled: sometimes\n");
    await expect(service.loadDocument(path)).rejects.toThrow("Invalid configuration: polling.retry_enabled");
  });
});
