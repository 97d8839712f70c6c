import { inject, injectable } from "tsyringe";
import { TYPES } from "../../../di/types";
import { ICommentaryRepository } from "../../../domain/commentaries/repositories/ICommentaryRepository";
import { ReferenceResolver } from "../../../domain/references/ReferenceResolver";
import { unwrap } from "../../../domain/references/Resolution";
import { ILogger } from "../../../infrastructure/logging/ILogger";
import { IUseCase } from "../../shared/interfaces/IUseCase";
import {
  VerseCommentaryDto,
  toCommentaryDto,
  toEntryDto,
} from "../dto/CommentaryDto";
import { VerseQueryDto } from "../dto/PassageQueryDto";
import { requireCommentary } from "./requireCommentary";

/**
 * Get Verse Commentary Use Case
 *
 * Entries whose verse range contains the requested verse, including
 * entries that start earlier in the chapter
 */
@injectable()
export class GetVerseCommentaryUseCase
  implements IUseCase<VerseQueryDto, VerseCommentaryDto>
{
  constructor(
    @inject(TYPES.CommentaryRepository)
    private commentaryRepository: ICommentaryRepository,
    @inject(TYPES.ReferenceResolver) private resolver: ReferenceResolver,
    @inject(TYPES.Logger) private logger: ILogger,
  ) {}

  async execute(query: VerseQueryDto): Promise<VerseCommentaryDto> {
    const chapter = unwrap(this.resolver.resolveChapter(query.chapter));
    const verse = unwrap(this.resolver.resolveVerse(query.verse));
    const commentary = await requireCommentary(
      this.commentaryRepository,
      this.logger,
      query.commentary,
    );
    const book = unwrap(this.resolver.resolveBook(query.book));

    const entries = await this.commentaryRepository.queryVerse(
      commentary.slug,
      book.name,
      chapter,
      verse,
    );

    this.logger.debug("Verse commentary fetched", {
      commentary: commentary.slug,
      book: book.name,
      chapter,
      verse,
      count: entries.length,
    });

    return {
      commentary: toCommentaryDto(commentary),
      book: book.name,
      chapter,
      verse,
      count: entries.length,
      entries: entries.map(toEntryDto),
    };
  }
}
