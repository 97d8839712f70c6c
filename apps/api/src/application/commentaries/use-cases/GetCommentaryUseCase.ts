import { inject, injectable } from "tsyringe";
import { TYPES } from "../../../di/types";
import { ICommentaryRepository } from "../../../domain/commentaries/repositories/ICommentaryRepository";
import { ILogger } from "../../../infrastructure/logging/ILogger";
import { IUseCase } from "../../shared/interfaces/IUseCase";
import { CommentaryDto, toCommentaryDto } from "../dto/CommentaryDto";
import { requireCommentary } from "./requireCommentary";

/**
 * Get Commentary Use Case
 *
 * Retrieves commentary metadata by slug, or by display name
 */
@injectable()
export class GetCommentaryUseCase implements IUseCase<string, CommentaryDto> {
  constructor(
    @inject(TYPES.CommentaryRepository)
    private commentaryRepository: ICommentaryRepository,
    @inject(TYPES.Logger) private logger: ILogger,
  ) {}

  async execute(slugOrName: string): Promise<CommentaryDto> {
    const commentary = await requireCommentary(
      this.commentaryRepository,
      this.logger,
      slugOrName,
    );

    return toCommentaryDto(commentary);
  }
}
