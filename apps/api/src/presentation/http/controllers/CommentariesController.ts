import { Request, Response, NextFunction } from "express";
import { inject, injectable } from "tsyringe";
import { TYPES } from "../../../di/types";
import { ListCommentariesUseCase } from "../../../application/commentaries/use-cases/ListCommentariesUseCase";
import { GetCommentaryUseCase } from "../../../application/commentaries/use-cases/GetCommentaryUseCase";
import { GetChapterCommentaryUseCase } from "../../../application/commentaries/use-cases/GetChapterCommentaryUseCase";
import { GetVerseCommentaryUseCase } from "../../../application/commentaries/use-cases/GetVerseCommentaryUseCase";
import {
  ChapterQueryDto,
  VerseQueryDto,
} from "../../../application/commentaries/dto/PassageQueryDto";

/**
 * Commentaries HTTP Controller
 *
 * Read-only access to commentary metadata and entries. Domain errors go
 * to the central error handler untouched.
 */
@injectable()
export class CommentariesController {
  constructor(
    @inject(TYPES.ListCommentariesUseCase)
    private listCommentariesUseCase: ListCommentariesUseCase,
    @inject(TYPES.GetCommentaryUseCase)
    private getCommentaryUseCase: GetCommentaryUseCase,
    @inject(TYPES.GetChapterCommentaryUseCase)
    private getChapterCommentaryUseCase: GetChapterCommentaryUseCase,
    @inject(TYPES.GetVerseCommentaryUseCase)
    private getVerseCommentaryUseCase: GetVerseCommentaryUseCase,
  ) {}

  /**
   * GET /commentaries
   */
  async list(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const commentaries = await this.listCommentariesUseCase.execute();
      res.status(200).json({ ok: true, commentaries });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /commentaries/:slug
   */
  async getBySlug(
    req: Request,
    res: Response,
    next: NextFunction,
  ): Promise<void> {
    try {
      const commentary = await this.getCommentaryUseCase.execute(
        req.params.slug,
      );
      res.status(200).json({ ok: true, commentary });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /commentaries/:slug/:book/:chapter
   */
  async getChapter(
    req: Request,
    res: Response,
    next: NextFunction,
  ): Promise<void> {
    try {
      const passage = await this.getChapterCommentaryUseCase.execute(
        ChapterQueryDto.fromRequest(req.params),
      );
      res.status(200).json({ ok: true, ...passage });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /commentaries/:slug/:book/:chapter/:verse
   */
  async getVerse(
    req: Request,
    res: Response,
    next: NextFunction,
  ): Promise<void> {
    try {
      const passage = await this.getVerseCommentaryUseCase.execute(
        VerseQueryDto.fromRequest(req.params),
      );
      res.status(200).json({ ok: true, ...passage });
    } catch (error) {
      next(error);
    }
  }
}
