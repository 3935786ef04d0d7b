import { Injectable } from "@nestjs/common";

import { ConfigurationError } from "@imbalance-tracker/domain";
import type { ConfigDocument } from "./schemas";
import { getRuntimeConfig } from "./runtime-config";

@Injectable()
export class RuntimeConfigService {
  private readonly document: ConfigDocument;

  constructor() {
    const config = getRuntimeConfig();
    if (!config) {
      throw new ConfigurationError("Runtime configuration not initialised");
    }
    this.document = config;
  }

  getDocument(): ConfigDocument {
    return structuredClone(this.document);
  }
}
