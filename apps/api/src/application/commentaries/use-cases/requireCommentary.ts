import { Commentary } from "../../../domain/commentaries/entities/Commentary";
import { ICommentaryRepository } from "../../../domain/commentaries/repositories/ICommentaryRepository";
import { ILogger } from "../../../infrastructure/logging/ILogger";
import { EntityNotFoundError } from "../../../shared/errors/DomainError";

/**
 * Look a commentary up by slug or name, or fail with EntityNotFoundError
 */
export async function requireCommentary(
  repository: ICommentaryRepository,
  logger: ILogger,
  slugOrName: string,
): Promise<Commentary> {
  const commentary = await repository.findCommentary(slugOrName);

  if (!commentary) {
    logger.warn("Commentary not found", { commentary: slugOrName });
    throw new EntityNotFoundError("Commentary", slugOrName);
  }

  return commentary;
}
