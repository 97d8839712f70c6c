import { DirectoryIngestionDto } from "./application/ingestion/dto/IngestionReportDto";
import { IngestManifestDirectoryUseCase } from "./application/ingestion/use-cases/IngestManifestDirectoryUseCase";
import { ICommentaryRepository } from "./domain/commentaries/repositories/ICommentaryRepository";
import { ILogger } from "./infrastructure/logging/ILogger";
import { IConfig } from "./shared/config/IConfig";

/**
 * Seed an empty store from MANIFEST_DIR
 *
 * Returns null when no directory is configured or the store already holds
 * entries.
 */
export async function runStartupIngestion(
  config: Pick<IConfig, "manifestDir">,
  repository: ICommentaryRepository,
  ingestDirectory: IngestManifestDirectoryUseCase,
  logger: ILogger,
): Promise<DirectoryIngestionDto | null> {
  if (!config.manifestDir) {
    return null;
  }

  const existing = await repository.countEntries();
  if (existing > 0) {
    logger.info("Entry store already populated, skipping startup ingestion", {
      entries: existing,
    });
    return null;
  }

  const result = await ingestDirectory.execute(config.manifestDir);

  logger.info("Startup ingestion finished", {
    directory: config.manifestDir,
    ingested: result.reports.length,
    failed: result.failures.length,
    inserted: result.reports.reduce((sum, report) => sum + report.inserted, 0),
  });

  return result;
}
