/**
 * Passage Query DTOs
 *
 * Raw path segments of a passage lookup. Nothing is parsed here; the use
 * cases resolve each segment and decide the order of validation.
 */
export class ChapterQueryDto {
  constructor(
    public readonly commentary: string,
    public readonly book: string,
    public readonly chapter: string,
  ) {}

  static fromRequest(params: Record<string, string>): ChapterQueryDto {
    return new ChapterQueryDto(params.slug, params.book, params.chapter);
  }
}

export class VerseQueryDto extends ChapterQueryDto {
  constructor(
    commentary: string,
    book: string,
    chapter: string,
    public readonly verse: string,
  ) {
    super(commentary, book, chapter);
  }

  static fromRequest(params: Record<string, string>): VerseQueryDto {
    return new VerseQueryDto(
      params.slug,
      params.book,
      params.chapter,
      params.verse,
    );
  }
}
