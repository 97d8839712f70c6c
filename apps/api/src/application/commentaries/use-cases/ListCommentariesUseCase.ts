import { inject, injectable } from "tsyringe";
import { TYPES } from "../../../di/types";
import { ICommentaryRepository } from "../../../domain/commentaries/repositories/ICommentaryRepository";
import { ILogger } from "../../../infrastructure/logging/ILogger";
import { IUseCase } from "../../shared/interfaces/IUseCase";
import { CommentaryDto, toCommentaryDto } from "../dto/CommentaryDto";

/**
 * List Commentaries Use Case
 *
 * Every stored commentary, ordered by name
 */
@injectable()
export class ListCommentariesUseCase
  implements IUseCase<void, CommentaryDto[]>
{
  constructor(
    @inject(TYPES.CommentaryRepository)
    private commentaryRepository: ICommentaryRepository,
    @inject(TYPES.Logger) private logger: ILogger,
  ) {}

  async execute(): Promise<CommentaryDto[]> {
    const commentaries = await this.commentaryRepository.listCommentaries();

    this.logger.debug("Listed commentaries", { count: commentaries.length });

    return commentaries.map(toCommentaryDto);
  }
}
