#!/usr/bin/env node
import "reflect-metadata";
import { INestApplicationContext, Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { AppModule } from "./app.module";
import { BridgeConfigError } from "./client/errors";
import { toError } from "./client/consumer/pipeline";
import {
  loadBridgeConfig,
  nestLogLevels,
  type BridgeConfig,
} from "./config/bridge.config";

const logger = new Logger("Bootstrap");

async function bootstrap(): Promise<void> {
  let config: BridgeConfig;
  try {
    config = loadBridgeConfig(process.env);
  } catch (error) {
    if (error instanceof BridgeConfigError) {
      logger.error(error.message);
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  let app: INestApplicationContext | undefined;
  const onFatal = (error: Error) => {
    logger.fatal(`Bridge stopped: ${error.message}`);
    process.exitCode = 1;
    app
      ?.close()
      .catch((err) =>
        logger.error(`Error while closing: ${toError(err).message}`),
      );
  };

  app = await NestFactory.createApplicationContext(
    AppModule.forRoot(config, onFatal),
    { logger: nestLogLevels(config.logLevel) },
  );
  app.enableShutdownHooks();
}

bootstrap().catch((error) => {
  const err = toError(error);
  logger.error(`Failed to start: ${err.message}`, err.stack);
  process.exit(1);
});
