import "reflect-metadata";
import * as dotenv from "dotenv";
dotenv.config();

import { NestFactory } from "@nestjs/core";
import type { INestApplication } from "@nestjs/common";
import type { NestExpressApplication } from "@nestjs/platform-express";
import { AppModule } from "@/app.module";
import { configureApp } from "@/app.setup";
import { FilteredLogger } from "@/common/logging/filtered-logger";
import { enabledLogLevels } from "@/common/types/logging";
import { AppConfigService, ENV } from "@/config";
import { errorMessage } from "@/common/utils/common.utils";

const logger = new FilteredLogger("Bootstrap", ENV.LOGGING.LOG_LEVEL);
let app: INestApplication | null = null;

async function bootstrap(): Promise<void> {
  const startedAt = Date.now();

  const nestApp = await NestFactory.create<NestExpressApplication>(AppModule, {
    logger: enabledLogLevels(logger.getLevel()),
  });
  app = nestApp;

  const config = nestApp.get(AppConfigService);
  const { port, apiPrefix, nodeEnv, debug } = config.application;

  configureApp(nestApp, config);
  setupGracefulShutdown(config.application.gracefulShutdownMs);

  if (!config.security.apiKey) {
    logger.warn("API_KEY is not set, API key authentication is disabled");
  }
  if (debug) {
    logger.warn(`DEBUG is enabled: detailed error messages are returned and docs are served at /${apiPrefix}/docs`);
  }

  await nestApp.listen(port, "0.0.0.0");
  logger.log(`Listening on port ${port} (${nodeEnv}) after ${Date.now() - startedAt}ms`);
}

function setupGracefulShutdown(timeoutMs: number): void {
  let isShuttingDown = false;

  for (const signal of ["SIGTERM", "SIGINT"] as const) {
    process.on(signal, () => {
      if (isShuttingDown) {
        logger.log(`Received ${signal} during shutdown, ignoring...`);
        return;
      }
      isShuttingDown = true;
      logger.log(`Received ${signal}, starting graceful shutdown...`);

      gracefulShutdown(timeoutMs).then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error(`Error during ${signal} shutdown: ${errorMessage(error)}`);
          process.exit(1);
        }
      );
    });
  }
}

async function gracefulShutdown(timeoutMs: number): Promise<void> {
  if (!app) {
    return;
  }

  const shutdownTimeout = setTimeout(() => {
    logger.error(`Shutdown timeout reached after ${timeoutMs}ms, forcing exit`);
    process.exit(1);
  }, timeoutMs);

  const startedAt = Date.now();
  try {
    await app.close();
    app = null;
    logger.log(`Graceful shutdown completed in ${Date.now() - startedAt}ms`);
  } finally {
    clearTimeout(shutdownTimeout);
  }
}

bootstrap().catch((error: unknown) => {
  logger.error("Application startup failed", error instanceof Error ? error.stack : errorMessage(error));
  process.exit(1);
});
