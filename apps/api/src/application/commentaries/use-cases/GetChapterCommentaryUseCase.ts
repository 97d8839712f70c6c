import { inject, injectable } from "tsyringe";
import { TYPES } from "../../../di/types";
import { ICommentaryRepository } from "../../../domain/commentaries/repositories/ICommentaryRepository";
import { ReferenceResolver } from "../../../domain/references/ReferenceResolver";
import { unwrap } from "../../../domain/references/Resolution";
import { ILogger } from "../../../infrastructure/logging/ILogger";
import { IUseCase } from "../../shared/interfaces/IUseCase";
import {
  ChapterCommentaryDto,
  toCommentaryDto,
  toEntryDto,
} from "../dto/CommentaryDto";
import { ChapterQueryDto } from "../dto/PassageQueryDto";
import { requireCommentary } from "./requireCommentary";

/**
 * Get Chapter Commentary Use Case
 *
 * All entries of one chapter. The chapter is checked first, then the
 * commentary, then the book.
 */
@injectable()
export class GetChapterCommentaryUseCase
  implements IUseCase<ChapterQueryDto, ChapterCommentaryDto>
{
  constructor(
    @inject(TYPES.CommentaryRepository)
    private commentaryRepository: ICommentaryRepository,
    @inject(TYPES.ReferenceResolver) private resolver: ReferenceResolver,
    @inject(TYPES.Logger) private logger: ILogger,
  ) {}

  async execute(query: ChapterQueryDto): Promise<ChapterCommentaryDto> {
    const chapter = unwrap(this.resolver.resolveChapter(query.chapter));
    const commentary = await requireCommentary(
      this.commentaryRepository,
      this.logger,
      query.commentary,
    );
    const book = unwrap(this.resolver.resolveBook(query.book));

    const entries = await this.commentaryRepository.queryChapter(
      commentary.slug,
      book.name,
      chapter,
    );

    this.logger.debug("Chapter commentary fetched", {
      commentary: commentary.slug,
      book: book.name,
      chapter,
      count: entries.length,
    });

    return {
      commentary: toCommentaryDto(commentary),
      book: book.name,
      chapter,
      count: entries.length,
      entries: entries.map(toEntryDto),
    };
  }
}
