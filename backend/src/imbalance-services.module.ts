import { Module } from "@nestjs/common";

import { ConfigFileService } from "./config/config-file.service";
import { PollConfigFactory } from "./config/poll-config.factory";
import { RuntimeConfigService } from "./config/runtime-config.service";
import { GENERATION_SOURCES, GenerationComparisonService, type GenerationSources } from "./generation/generation-comparison.service";
import { CLOCK, systemClock } from "./polling/clock";
import { IMBALANCE_SOURCE, MonitorService } from "./polling/monitor.service";
import { BmrsGenerationSource } from "./sources/bmrs-generation.source";
import { BmrsImbalanceSource } from "./sources/bmrs-imbalance.source";
import { StorageModule } from "./storage/storage.module";

@Module({
  imports: [StorageModule],
  providers: [
    ConfigFileService,
    RuntimeConfigService,
    PollConfigFactory,
    {provide: CLOCK, useValue: systemClock},
    {
      provide: IMBALANCE_SOURCE,
      inject: [RuntimeConfigService, PollConfigFactory],
      useFactory: (configState: RuntimeConfigService, factory: PollConfigFactory) =>
        new BmrsImbalanceSource(factory.createSourceSettings(configState.getDocument())),
    },
    {
      provide: GENERATION_SOURCES,
      inject: [RuntimeConfigService, PollConfigFactory],
      useFactory: (configState: RuntimeConfigService, factory: PollConfigFactory): GenerationSources => {
        const settings = factory.createSourceSettings(configState.getDocument());
        return {
          forecast: new BmrsGenerationSource("forecast", settings),
          actual: new BmrsGenerationSource("actual", settings),
        };
      },
    },
    MonitorService,
    GenerationComparisonService,
  ],
  exports: [
    ConfigFileService,
    RuntimeConfigService,
    PollConfigFactory,
    MonitorService,
    GenerationComparisonService,
  ],
})
export class ImbalanceServicesModule {}
