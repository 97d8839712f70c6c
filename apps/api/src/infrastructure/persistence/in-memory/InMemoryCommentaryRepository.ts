import {
  BulkLoadOptions,
  ICommentaryRepository,
} from "../../../domain/commentaries/repositories/ICommentaryRepository";
import { Commentary } from "../../../domain/commentaries/entities/Commentary";
import {
  CommentaryEntry,
  NewCommentaryEntry,
} from "../../../domain/commentaries/entities/CommentaryEntry";
import { DuplicateEntityError } from "../../../shared/errors/DomainError";
import { EntryIndex } from "./EntryIndex";

interface StoredCommentary {
  commentary: Commentary;
  index: EntryIndex;
}

/**
 * In-memory implementation of ICommentaryRepository
 *
 * Serves the whole store from process memory. Used by default and in tests.
 */
export class InMemoryCommentaryRepository implements ICommentaryRepository {
  private commentaries: Map<string, StoredCommentary> = new Map();

  async listCommentaries(): Promise<Commentary[]> {
    return Array.from(this.commentaries.values())
      .map((stored) => stored.commentary)
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  async findCommentary(slugOrName: string): Promise<Commentary | null> {
    const bySlug = this.commentaries.get(slugOrName.trim().toLowerCase());
    if (bySlug) {
      return bySlug.commentary;
    }

    for (const stored of this.commentaries.values()) {
      if (stored.commentary.matches(slugOrName)) {
        return stored.commentary;
      }
    }
    return null;
  }

  async exists(slug: string): Promise<boolean> {
    return this.commentaries.has(slug.trim().toLowerCase());
  }

  async bulkLoad(
    commentary: Commentary,
    entries: readonly NewCommentaryEntry[],
    options: BulkLoadOptions,
  ): Promise<number> {
    const key = commentary.slug.toLowerCase();

    if (!options.replace && this.commentaries.has(key)) {
      throw new DuplicateEntityError("Commentary", "slug", commentary.slug);
    }

    // Build the full index before touching the map so readers never see
    // a half-loaded commentary
    const index = EntryIndex.build(commentary.slug, entries);
    this.commentaries.set(key, { commentary, index });

    return index.size;
  }

  async queryChapter(
    slug: string,
    book: string,
    chapter: number,
  ): Promise<CommentaryEntry[]> {
    return this.indexFor(slug).chapter(book, chapter);
  }

  async queryVerse(
    slug: string,
    book: string,
    chapter: number,
    verse: number,
  ): Promise<CommentaryEntry[]> {
    return this.indexFor(slug).verse(book, chapter, verse);
  }

  async countEntries(slug?: string): Promise<number> {
    if (slug !== undefined) {
      return this.indexFor(slug).size;
    }

    let total = 0;
    for (const stored of this.commentaries.values()) {
      total += stored.index.size;
    }
    return total;
  }

  private indexFor(slug: string): EntryIndex {
    return (
      this.commentaries.get(slug.trim().toLowerCase())?.index ??
      EntryIndex.empty()
    );
  }

  // Test helper methods
  clear(): void {
    this.commentaries.clear();
  }

  count(): number {
    return this.commentaries.size;
  }
}
