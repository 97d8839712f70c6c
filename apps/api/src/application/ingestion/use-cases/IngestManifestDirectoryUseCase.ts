import fs from "fs/promises";
import path from "path";
import { inject, injectable } from "tsyringe";
import { TYPES } from "../../../di/types";
import { ILogger } from "../../../infrastructure/logging/ILogger";
import { AppError } from "../../../shared/errors/AppError";
import { StructuralManifestError } from "../../../shared/errors/DomainError";
import { IUseCase } from "../../shared/interfaces/IUseCase";
import { DirectoryIngestionDto } from "../dto/IngestionReportDto";
import { IngestCommentaryUseCase } from "./IngestCommentaryUseCase";

/**
 * Ingest Manifest Directory Use Case
 *
 * Ingests every *.json manifest of a directory in file name order, one at a
 * time, replacing existing commentaries. A failing manifest is logged and
 * the rest still run.
 */
@injectable()
export class IngestManifestDirectoryUseCase
  implements IUseCase<string, DirectoryIngestionDto>
{
  constructor(
    @inject(TYPES.IngestCommentaryUseCase)
    private ingestCommentary: IngestCommentaryUseCase,
    @inject(TYPES.Logger) private logger: ILogger,
  ) {}

  async execute(directory: string): Promise<DirectoryIngestionDto> {
    const manifests = await this.listManifests(directory);
    const log = this.logger.child({ directory });
    const result: DirectoryIngestionDto = {
      directory,
      reports: [],
      failures: [],
    };

    log.info("Ingesting manifest directory", { manifests: manifests.length });

    for (const file of manifests) {
      try {
        const report = await this.ingestCommentary.execute({
          source: { kind: "file", path: file },
          replace: true,
        });
        result.reports.push(report);
      } catch (error) {
        const failure = error instanceof Error ? error : new Error(String(error));
        log.error("Manifest ingestion failed", failure, { file });
        result.failures.push({
          file,
          code: failure instanceof AppError ? failure.code : "INTERNAL_ERROR",
          error: failure.message,
        });
      }
    }

    return result;
  }

  private async listManifests(directory: string): Promise<string[]> {
    let names: string[];
    try {
      names = await fs.readdir(directory);
    } catch (error) {
      throw new StructuralManifestError(
        `Cannot read manifest directory ${directory}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    return names
      .filter((name) => name.toLowerCase().endsWith(".json"))
      .sort()
      .map((name) => path.join(directory, name));
  }
}
