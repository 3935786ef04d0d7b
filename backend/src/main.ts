import "reflect-metadata";

import type { AddressInfo } from "node:net";

import cors from "@fastify/cors";
import type { FastifyInstance } from "fastify";
import { fastifyTRPCPlugin } from "@trpc/server/adapters/fastify";
import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { FastifyAdapter, NestFastifyApplication } from "@nestjs/platform-fastify";

import { ConfigurationError, describeError } from "@imbalance-tracker/domain";
import { AppModule } from "./app.module";
import { ConfigFileService } from "./config/config-file.service";
import { PollConfigFactory } from "./config/poll-config.factory";
import { setRuntimeConfig } from "./config/runtime-config";
import type { ConfigDocument } from "./config/schemas";
import { resolveLogLevels } from "./logging/log-levels";
import { MonitorService } from "./polling/monitor.service";
import { TrpcRouter } from "./trpc/trpc.router";

const isAddressInfo = (value: AddressInfo | string | null): value is AddressInfo =>
  typeof value === "object" && value !== null && "port" in value;

async function bootstrap(): Promise<NestFastifyApplication> {
  const initialConfig = await configureGlobalLogging();
  validateConfigDocument(initialConfig);
  setRuntimeConfig(initialConfig);
  const adapter = new FastifyAdapter({logger: false});
  const app = await NestFactory.create<NestFastifyApplication>(AppModule, adapter, {
    bufferLogs: true,
  });

  app.useLogger(new Logger("bootstrap"));
  app.flushLogs();
  app.enableShutdownHooks();

  const fastify: FastifyInstance = app.getHttpAdapter().getInstance();
  await fastify.register(cors, {
    origin: true,
    methods: ["GET", "POST", "OPTIONS"],
  });

  const trpcRouter = app.get(TrpcRouter);
  const monitorService = app.get(MonitorService);
  await fastify.register(fastifyTRPCPlugin, {
    prefix: "/trpc",
    trpcOptions: {
      router: trpcRouter.router,
      createContext: () => ({monitorService}),
    },
  });

  const port = Number(process.env.PORT ?? 4000);
  const host = process.env.HOST ?? "0.0.0.0";
  await app.listen(port, host);

  if (process.env.NODE_ENV !== "test") {
    const logger = new Logger("imbalance-tracker");
    const address = fastify.server.address();
    let baseUrl = `http://localhost:${port}`;
    if (isAddressInfo(address)) {
      const resolvedHost = address.address === "::" || address.address === "0.0.0.0" ? "localhost" : address.address;
      baseUrl = `http://${resolvedHost}:${address.port}`;
    } else if (typeof address === "string" && address.length > 0) {
      baseUrl = address;
    }

    logger.log(`API ready at ${baseUrl}`);

    const trpcProcedures = trpcRouter.listProcedures();
    if (trpcProcedures.length) {
      const formatted = trpcProcedures
        .map(({path, type}, index) => {
          const prefix = index === trpcProcedures.length - 1 ? "└──" : "├──";
          return `${prefix} ${type.toUpperCase()} /trpc/${path}`;
        })
        .join("\n");
      logger.log(`tRPC procedures:\n${formatted}`);
    }

    monitorService.start();
  }

  return app;
}

async function configureGlobalLogging(): Promise<ConfigDocument> {
  const bootstrapLogger = new Logger("bootstrap");
  const configFileService = new ConfigFileService();

  let document: ConfigDocument;
  try {
    document = await configFileService.loadDocument(configFileService.resolvePath());
  } catch (error) {
    bootstrapLogger.error(`Failed to load configuration: ${describeError(error)}`);
    throw error;
  }

  const rawLevel = document.logging?.level ?? "info";
  const {levels, normalized, fallbackUsed} = resolveLogLevels(rawLevel);
  if (fallbackUsed) {
    bootstrapLogger.warn(`Unknown logging.level value '${rawLevel}'; defaulting to INFO`);
  }
  Logger.overrideLogger(levels);
  bootstrapLogger.log(`Logger minimum level set to ${normalized.toUpperCase()}`);
  return document;
}

function validateConfigDocument(document: ConfigDocument): void {
  const factory = new PollConfigFactory();
  const config = factory.create(document);
  const source = factory.createSourceSettings(document);
  new Logger("bootstrap").log(
    `Tracking settlement day ${config.settlementDay.date} from ${source.baseUrl}; update interval ${config.updateInterval.minutes} min, retries ${
      config.retryEnabled ? config.retryIncrements.map((increment) => `${increment.seconds}s`).join("/") : "disabled"
    }`,
  );
}

if (process.env.NODE_ENV !== "test") {
  bootstrap().catch((error: unknown) => {
    const logger = new Logger("bootstrap");
    if (error instanceof ConfigurationError) {
      logger.fatal(`Configuration invalid: ${error.message}`);
    } else {
      logger.fatal(`Startup failed: ${describeError(error)}`);
    }
    process.exitCode = 1;
  });
}

export { bootstrap };
