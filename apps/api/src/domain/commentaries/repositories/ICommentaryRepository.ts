import { Commentary } from "../entities/Commentary";
import {
  CommentaryEntry,
  NewCommentaryEntry,
} from "../entities/CommentaryEntry";

export interface BulkLoadOptions {
  /**
   * Swap out any existing commentary with the same slug. Without it an
   * existing slug is a conflict and nothing is written.
   */
  replace: boolean;
}

/**
 * Commentary Repository Interface
 *
 * The entry store. Implementations can be database-backed (Supabase)
 * or an in-process index.
 */
export interface ICommentaryRepository {
  /**
   * All commentaries ordered by name
   */
  listCommentaries(): Promise<Commentary[]>;

  /**
   * Find a commentary by slug, falling back to its display name
   */
  findCommentary(slugOrName: string): Promise<Commentary | null>;

  /**
   * Check if a commentary with this exact slug (any case) exists
   */
  exists(slug: string): Promise<boolean>;

  /**
   * Store a commentary and its entries, returning the number inserted
   *
   * @throws DuplicateEntityError when the slug exists and replace is off
   */
  bulkLoad(
    commentary: Commentary,
    entries: readonly NewCommentaryEntry[],
    options: BulkLoadOptions,
  ): Promise<number>;

  /**
   * Every entry of one chapter, in store order
   */
  queryChapter(
    slug: string,
    book: string,
    chapter: number,
  ): Promise<CommentaryEntry[]>;

  /**
   * Entries of one chapter whose range contains the verse, in store order
   */
  queryVerse(
    slug: string,
    book: string,
    chapter: number,
    verse: number,
  ): Promise<CommentaryEntry[]>;

  /**
   * Number of stored entries, overall or for one commentary
   */
  countEntries(slug?: string): Promise<number>;
}
