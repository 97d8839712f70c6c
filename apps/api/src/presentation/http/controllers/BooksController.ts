import { Request, Response, NextFunction } from "express";
import { inject, injectable } from "tsyringe";
import { TYPES } from "../../../di/types";
import { ListBooksUseCase } from "../../../application/canon/use-cases/ListBooksUseCase";

/**
 * Books HTTP Controller
 */
@injectable()
export class BooksController {
  constructor(
    @inject(TYPES.ListBooksUseCase) private listBooksUseCase: ListBooksUseCase,
  ) {}

  /**
   * GET /books - canonical books with their accepted spellings
   */
  async list(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const books = await this.listBooksUseCase.execute();
      res.status(200).json({ ok: true, books });
    } catch (error) {
      next(error);
    }
  }
}
