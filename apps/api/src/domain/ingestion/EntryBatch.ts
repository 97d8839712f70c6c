import { NewCommentaryEntry } from "../commentaries/entities/CommentaryEntry";
import { ReferenceResolver } from "../references/ReferenceResolver";

/**
 * A raw record as read from a manifest: either a parsed JSON value, or a
 * line of an entries file that could not be parsed
 */
export type SourceRecord =
  | { kind: "value"; position: number; value: unknown }
  | { kind: "unparsable"; position: number; text: string; reason: string };

/**
 * One record that could not be ingested
 */
export interface IngestionIssue {
  /** 1-based index in `entries`, or line number in an entries file */
  position: number;
  rawEntry: unknown;
  code: string;
  reason: string;
}

export interface EntryBatch {
  entries: NewCommentaryEntry[];
  errors: IngestionIssue[];
}

type Checked<T> = { ok: true; value: T } | { ok: false; issue: IngestionIssue };

function isRecordObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function checkRecord(
  record: SourceRecord,
  resolver: ReferenceResolver,
): Checked<NewCommentaryEntry> {
  const { position } = record;

  if (record.kind === "unparsable") {
    return {
      ok: false,
      issue: {
        position,
        rawEntry: record.text,
        code: "MALFORMED_RECORD",
        reason: `Invalid JSON line: ${record.reason}`,
      },
    };
  }

  const raw = record.value;
  const reject = (code: string, reason: string): Checked<NewCommentaryEntry> => ({
    ok: false,
    issue: { position, rawEntry: raw, code, reason },
  });

  if (!isRecordObject(raw)) {
    return reject("MALFORMED_RECORD", "entry must be a JSON object");
  }

  const book = resolver.resolveBook(raw.book);
  if (!book.ok) return reject(book.error.code, book.error.message);

  const chapter = resolver.resolveChapter(raw.chapter);
  if (!chapter.ok) return reject(chapter.error.code, chapter.error.message);

  const range = resolver.resolveRange({
    verse: raw.verse,
    verse_start: raw.verse_start,
    verse_end: raw.verse_end,
  });
  if (!range.ok) return reject(range.error.code, range.error.message);

  const text = typeof raw.text === "string" ? raw.text.trim() : "";
  if (!text) {
    return reject("MISSING_TEXT", "entry.text is required");
  }

  return {
    ok: true,
    value: {
      book: book.value.name,
      chapter: chapter.value,
      range: range.value,
      text,
    },
  };
}

/**
 * Resolve a batch of raw records
 *
 * Bad records are collected alongside the good ones; one failure never
 * stops the rest of the batch.
 */
export function resolveEntryBatch(
  records: Iterable<SourceRecord>,
  resolver: ReferenceResolver,
): EntryBatch {
  const batch: EntryBatch = { entries: [], errors: [] };

  for (const record of records) {
    const checked = checkRecord(record, resolver);
    if (checked.ok) {
      batch.entries.push(checked.value);
    } else {
      batch.errors.push(checked.issue);
    }
  }

  return batch;
}
