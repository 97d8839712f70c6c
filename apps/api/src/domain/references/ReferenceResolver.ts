import { inject, injectable } from "tsyringe";
import { TYPES } from "../../di/types";
import { CanonTable, CanonicalBook } from "../canon/CanonTable";
import {
  InvalidRangeError,
  MalformedVerseExpressionError,
  MissingVerseError,
  OutOfRangeError,
  UnknownBookError,
} from "../../shared/errors/ReferenceError";
import { Resolution, failed, resolved } from "./Resolution";

/**
 * Inclusive verse range within one chapter
 */
export interface VerseRange {
  readonly start: number;
  readonly end: number;
}

/**
 * Verse fields as they arrive from a manifest record or request
 */
export interface VerseSpec {
  verse?: unknown;
  verse_start?: unknown;
  verse_end?: unknown;
}

const INTEGER_PATTERN = /^[+-]?\d+$/;

function describeRaw(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  return JSON.stringify(value) ?? String(value);
}

function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null;
}

/**
 * Parse a strictly positive integer from a number or numeric string
 */
export function parsePositiveInteger(
  value: unknown,
  field: string,
): Resolution<number> {
  let parsed: number;

  if (typeof value === "number") {
    parsed = value;
  } else if (typeof value === "string" && INTEGER_PATTERN.test(value.trim())) {
    parsed = Number(value.trim());
  } else {
    return failed(new MalformedVerseExpressionError(field, describeRaw(value)));
  }

  if (!Number.isSafeInteger(parsed)) {
    return failed(new MalformedVerseExpressionError(field, describeRaw(value)));
  }

  if (parsed <= 0) {
    return failed(new OutOfRangeError(field, describeRaw(value)));
  }

  return resolved(parsed);
}

function orderedRange(
  start: number,
  end: number,
  raw?: string,
): Resolution<VerseRange> {
  if (end < start) {
    return failed(new InvalidRangeError(start, end, raw));
  }
  return resolved({ start, end });
}

/**
 * Reference Resolver
 *
 * Turns raw book, chapter and verse input into canonical values.
 * Stateless apart from the shared canon table.
 */
@injectable()
export class ReferenceResolver {
  constructor(@inject(TYPES.CanonTable) private readonly canon: CanonTable) {}

  resolveBook(raw: unknown): Resolution<CanonicalBook> {
    if (typeof raw !== "string") {
      return failed(new UnknownBookError(isPresent(raw) ? describeRaw(raw) : ""));
    }
    return this.canon.canonicalize(raw);
  }

  resolveChapter(raw: unknown): Resolution<number> {
    return parsePositiveInteger(raw, "chapter");
  }

  resolveVerse(raw: unknown): Resolution<number> {
    return parsePositiveInteger(raw, "verse");
  }

  /**
   * Resolve a verse range
   *
   * Precedence: verse_start/verse_end, then a "start-end" verse string,
   * then a single verse.
   */
  resolveRange(spec: VerseSpec): Resolution<VerseRange> {
    if (isPresent(spec.verse_start)) {
      const start = parsePositiveInteger(spec.verse_start, "verse_start");
      if (!start.ok) return start;

      if (!isPresent(spec.verse_end)) {
        return resolved({ start: start.value, end: start.value });
      }

      const end = parsePositiveInteger(spec.verse_end, "verse_end");
      if (!end.ok) return end;

      return orderedRange(start.value, end.value);
    }

    if (isPresent(spec.verse_end)) {
      return failed(
        new MissingVerseError("verse_start is required when verse_end is given"),
      );
    }

    const verse = spec.verse;
    if (!isPresent(verse)) {
      return failed(new MissingVerseError());
    }

    if (typeof verse === "string" && verse.includes("-")) {
      return this.resolveRangeExpression(verse);
    }

    const single = parsePositiveInteger(verse, "verse");
    if (!single.ok) return single;

    return resolved({ start: single.value, end: single.value });
  }

  private resolveRangeExpression(expression: string): Resolution<VerseRange> {
    const separator = expression.indexOf("-");
    const bounds = [
      parsePositiveInteger(expression.slice(0, separator), "verse"),
      parsePositiveInteger(expression.slice(separator + 1), "verse"),
    ];

    const values: number[] = [];
    for (const bound of bounds) {
      if (!bound.ok) {
        // Report the whole expression, not the half that failed
        return bound.error instanceof MalformedVerseExpressionError
          ? failed(new MalformedVerseExpressionError("verse", expression))
          : bound;
      }
      values.push(bound.value);
    }

    return orderedRange(values[0], values[1], expression);
  }
}
