import {
  CommentaryEntry,
  NewCommentaryEntry,
  compareEntries,
} from "../../../domain/commentaries/entities/CommentaryEntry";

function chapterKey(book: string, chapter: number): string {
  return `${book}|${chapter}`;
}

/**
 * Index of position just past the last entry with range.start <= verse
 */
function upperBound(entries: readonly CommentaryEntry[], verse: number): number {
  let low = 0;
  let high = entries.length;

  while (low < high) {
    const mid = (low + high) >>> 1;
    if (entries[mid].range.start <= verse) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }

  return low;
}

/**
 * Range index over one commentary's entries
 *
 * Entries are grouped by (book, chapter) and each group is sorted once by
 * start then end. Immutable after build.
 */
export class EntryIndex {
  private constructor(
    private readonly chapters: ReadonlyMap<string, readonly CommentaryEntry[]>,
    public readonly size: number,
  ) {}

  static build(
    commentarySlug: string,
    entries: readonly NewCommentaryEntry[],
  ): EntryIndex {
    const groups = new Map<string, CommentaryEntry[]>();

    for (const entry of entries) {
      const stored: CommentaryEntry = Object.freeze({
        commentarySlug,
        book: entry.book,
        chapter: entry.chapter,
        range: Object.freeze({ start: entry.range.start, end: entry.range.end }),
        text: entry.text,
      });

      const key = chapterKey(entry.book, entry.chapter);
      const group = groups.get(key);
      if (group) {
        group.push(stored);
      } else {
        groups.set(key, [stored]);
      }
    }

    for (const group of groups.values()) {
      group.sort(compareEntries);
    }

    return new EntryIndex(groups, entries.length);
  }

  static empty(): EntryIndex {
    return new EntryIndex(new Map(), 0);
  }

  chapter(book: string, chapter: number): CommentaryEntry[] {
    return [...(this.chapters.get(chapterKey(book, chapter)) ?? [])];
  }

  /**
   * Entries whose range contains the verse
   *
   * Nothing past the upper bound can start at or before the verse, so only
   * that prefix is checked for range.end >= verse.
   */
  verse(book: string, chapter: number, verse: number): CommentaryEntry[] {
    const group = this.chapters.get(chapterKey(book, chapter));
    if (!group) {
      return [];
    }

    const limit = upperBound(group, verse);
    const matches: CommentaryEntry[] = [];
    for (let i = 0; i < limit; i++) {
      if (group[i].range.end >= verse) {
        matches.push(group[i]);
      }
    }
    return matches;
  }
}
