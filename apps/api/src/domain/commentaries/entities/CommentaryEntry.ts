import { VerseRange } from "../../references/ReferenceResolver";

/**
 * One stored commentary excerpt
 *
 * `book` is always a canonical book name.
 */
export interface CommentaryEntry {
  readonly commentarySlug: string;
  readonly book: string;
  readonly chapter: number;
  readonly range: VerseRange;
  readonly text: string;
}

/**
 * An entry validated by ingestion but not yet tied to a stored commentary
 */
export type NewCommentaryEntry = Omit<CommentaryEntry, "commentarySlug">;

/**
 * Store ordering: verse_start ascending, then narrowest range first
 */
export function compareEntries(
  a: Pick<CommentaryEntry, "range">,
  b: Pick<CommentaryEntry, "range">,
): number {
  return a.range.start - b.range.start || a.range.end - b.range.end;
}
