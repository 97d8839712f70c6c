import { Commentary } from "../../../domain/commentaries/entities/Commentary";
import { CommentaryEntry } from "../../../domain/commentaries/entities/CommentaryEntry";

/**
 * Commentary Data Transfer Objects
 *
 * Response shapes for the commentary query routes
 */
export interface CommentaryDto {
  slug: string;
  name: string;
  description: string | null;
  source: string | null;
  license: string | null;
  language: string | null;
}

export interface EntryDto {
  verse_start: number;
  verse_end: number;
  text: string;
}

export interface ChapterCommentaryDto {
  commentary: CommentaryDto;
  book: string;
  chapter: number;
  count: number;
  entries: EntryDto[];
}

export interface VerseCommentaryDto extends ChapterCommentaryDto {
  verse: number;
}

export function toCommentaryDto(commentary: Commentary): CommentaryDto {
  return commentary.toJSON();
}

export function toEntryDto(entry: CommentaryEntry): EntryDto {
  return {
    verse_start: entry.range.start,
    verse_end: entry.range.end,
    text: entry.text,
  };
}
