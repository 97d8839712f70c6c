import { describe, it, expect } from "@jest/globals";
import { ListBooksUseCase } from "../ListBooksUseCase";
import { CanonTable } from "../../../../domain/canon/CanonTable";

describe("ListBooksUseCase", () => {
  it("should list the canon with aliases", async () => {
    const useCase = new ListBooksUseCase(CanonTable.default());

    const books = await useCase.execute();

    expect(books).toHaveLength(66);
    expect(books[0]).toEqual({
      canonical: "Genesis",
      testament: "OT",
      position: 1,
      aliases: ["ge", "gen", "gn"],
    });
  });
});
