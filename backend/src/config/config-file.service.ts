import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { isAbsolute, join, resolve } from "node:path";
import { Injectable, Logger } from "@nestjs/common";
import { parse as parseYaml } from "yaml";

import { ConfigurationError, describeError } from "@imbalance-tracker/domain";
import { parseConfigDocument, type ConfigDocument } from "./schemas";

const DEFAULT_FILE_NAMES = ["config.local.yaml", "config.yaml"];

@Injectable()
export class ConfigFileService {
  private readonly logger = new Logger(ConfigFileService.name);

  /**
   * `IMBALANCE_TRACKER_CONFIG` wins; otherwise the first default file found in the
   * working directory or its parent. Returns null when nothing exists, in which
   * case defaults apply.
   */
  resolvePath(): string | null {
    const override = process.env.IMBALANCE_TRACKER_CONFIG?.trim();
    if (override) {
      const path = isAbsolute(override) ? override : resolve(process.cwd(), override);
      if (!existsSync(path)) {
        throw new ConfigurationError(`Configuration file ${path} does not exist`);
      }
      return path;
    }
    for (const folder of [process.cwd(), join(process.cwd(), "..")]) {
      for (const name of DEFAULT_FILE_NAMES) {
        const candidate = join(folder, name);
        if (existsSync(candidate)) {
          return candidate;
        }
      }
    }
    return null;
  }

  async loadDocument(path: string | null): Promise<ConfigDocument> {
    if (!path) {
      this.logger.warn("No configuration file found; using defaults");
      return parseConfigDocument({});
    }
    this.logger.log(`Loading configuration from ${path}`);
    let raw: unknown;
    try {
      raw = parseYaml(await readFile(path, "utf-8"));
    } catch (error) {
      throw new ConfigurationError(`Unable to read configuration ${path}: ${describeError(error)}`);
    }
    return parseConfigDocument(raw);
  }
}
