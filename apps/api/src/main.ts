/**
 * API Entry Point
 */

import "reflect-metadata"; // Must be first import for TSyringe
import "dotenv/config";

import { container } from "./di/Container";
import { TYPES } from "./di/types";
import { IConfig } from "./shared/config/IConfig";
import { ILogger } from "./infrastructure/logging/ILogger";
import { ICommentaryRepository } from "./domain/commentaries/repositories/ICommentaryRepository";
import { IngestManifestDirectoryUseCase } from "./application/ingestion/use-cases/IngestManifestDirectoryUseCase";
import { createApp } from "./presentation/http/createApp";
import { runStartupIngestion } from "./startupIngestion";

async function bootstrap() {
  // Get configuration and logger from DI container
  const config = container.resolve<IConfig>(TYPES.Config);
  const logger = container.resolve<ILogger>(TYPES.Logger);

  logger.info("Starting commentary API...", {
    store: config.commentaryStore,
  });

  await runStartupIngestion(
    config,
    container.resolve<ICommentaryRepository>(TYPES.CommentaryRepository),
    container.resolve<IngestManifestDirectoryUseCase>(
      TYPES.IngestManifestDirectoryUseCase,
    ),
    logger,
  );

  const app = createApp(config);

  app.listen(config.port, () => {
    logger.info("Commentary API started", {
      port: config.port,
      env: config.nodeEnv,
    });
  });
}

bootstrap().catch((error) => {
  console.error("Failed to start server:", error);
  process.exit(1);
});
