import { inject, injectable } from "tsyringe";
import { TYPES } from "../../../di/types";
import { Commentary } from "../../../domain/commentaries/entities/Commentary";
import { ICommentaryRepository } from "../../../domain/commentaries/repositories/ICommentaryRepository";
import { resolveEntryBatch } from "../../../domain/ingestion/EntryBatch";
import { ReferenceResolver } from "../../../domain/references/ReferenceResolver";
import { ILogger } from "../../../infrastructure/logging/ILogger";
import {
  ManifestReader,
  ParsedManifest,
} from "../../../infrastructure/manifest/ManifestReader";
import {
  DuplicateEntityError,
  StructuralManifestError,
  ValidationError,
} from "../../../shared/errors/DomainError";
import { IUseCase } from "../../shared/interfaces/IUseCase";
import {
  IngestCommentaryRequest,
  IngestionReportDto,
} from "../dto/IngestionReportDto";

/**
 * Ingest Commentary Use Case
 *
 * Loads one manifest into the entry store. Structural problems abort before
 * anything is written; bad entries are reported and skipped.
 */
@injectable()
export class IngestCommentaryUseCase
  implements IUseCase<IngestCommentaryRequest, IngestionReportDto>
{
  constructor(
    @inject(TYPES.CommentaryRepository)
    private commentaryRepository: ICommentaryRepository,
    @inject(TYPES.ManifestReader) private manifestReader: ManifestReader,
    @inject(TYPES.ReferenceResolver) private resolver: ReferenceResolver,
    @inject(TYPES.Logger) private logger: ILogger,
  ) {}

  async execute(request: IngestCommentaryRequest): Promise<IngestionReportDto> {
    // 1. Manifest and metadata
    const manifest = await this.manifestReader.load(request.source);
    const commentary = this.createCommentary(manifest);

    this.logger.info("Ingesting commentary", {
      slug: commentary.slug,
      manifest: manifest.origin,
      replace: request.replace,
    });

    // 2. Refuse an existing slug before reading any entries
    if (
      !request.replace &&
      (await this.commentaryRepository.exists(commentary.slug))
    ) {
      this.logger.warn("Commentary already exists", { slug: commentary.slug });
      throw new DuplicateEntityError("Commentary", "slug", commentary.slug);
    }

    // 3. Resolve every record, keeping the failures
    const records = await this.manifestReader.records(manifest);
    const batch = resolveEntryBatch(records, this.resolver);

    for (const issue of batch.errors) {
      this.logger.debug("Skipped entry", {
        slug: commentary.slug,
        position: issue.position,
        code: issue.code,
        reason: issue.reason,
      });
    }

    // 4. Store the valid set
    const inserted = await this.commentaryRepository.bulkLoad(
      commentary,
      batch.entries,
      { replace: request.replace },
    );

    this.logger.info("Commentary ingested", {
      slug: commentary.slug,
      inserted,
      skipped: batch.errors.length,
    });

    return {
      slug: commentary.slug,
      inserted,
      skipped: batch.errors.length,
      errors: batch.errors.map((issue) => ({
        position: issue.position,
        rawEntry: issue.rawEntry,
        reason: issue.reason,
        code: issue.code,
      })),
    };
  }

  private createCommentary(manifest: ParsedManifest): Commentary {
    try {
      return Commentary.create(manifest.commentary);
    } catch (error) {
      if (error instanceof ValidationError) {
        throw new StructuralManifestError(
          `Invalid manifest ${manifest.origin}: ${error.message}`,
          [error.message],
        );
      }
      throw error;
    }
  }
}
