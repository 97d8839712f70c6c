import { inject, injectable } from "tsyringe";
import { TYPES } from "../../../di/types";
import { BookListing, CanonTable } from "../../../domain/canon/CanonTable";
import { IUseCase } from "../../shared/interfaces/IUseCase";

/**
 * List Books Use Case
 */
@injectable()
export class ListBooksUseCase implements IUseCase<void, BookListing[]> {
  constructor(@inject(TYPES.CanonTable) private canon: CanonTable) {}

  async execute(): Promise<BookListing[]> {
    return this.canon.listBooks();
  }
}
