import { AppErrorJSON } from "./AppError";
import { ValidationError } from "./DomainError";

/**
 * Scripture reference errors
 *
 * Produced by the canon table and the reference resolver. Each one keeps the
 * raw input that could not be resolved.
 */

export type ReferenceErrorKind =
  | "UNKNOWN_BOOK"
  | "MALFORMED_VERSE_EXPRESSION"
  | "INVALID_RANGE"
  | "OUT_OF_RANGE"
  | "MISSING_VERSE";

export abstract class ReferenceResolutionError extends ValidationError {
  constructor(
    message: string,
    kind: ReferenceErrorKind,
    field: string,
    public readonly raw?: string,
  ) {
    super(message, field, kind);
  }

  toJSON(): AppErrorJSON {
    return {
      ...super.toJSON(),
      raw: this.raw,
    };
  }
}

export class UnknownBookError extends ReferenceResolutionError {
  constructor(raw: string) {
    super(
      raw.trim() === "" ? "Book name is required" : `Unknown book: ${raw}`,
      "UNKNOWN_BOOK",
      "book",
      raw,
    );
    this.name = "UnknownBookError";
  }
}

export class MalformedVerseExpressionError extends ReferenceResolutionError {
  constructor(field: string, raw: string) {
    super(`Invalid ${field}: ${raw}`, "MALFORMED_VERSE_EXPRESSION", field, raw);
    this.name = "MalformedVerseExpressionError";
  }
}

export class InvalidRangeError extends ReferenceResolutionError {
  constructor(
    public readonly start: number,
    public readonly end: number,
    raw?: string,
  ) {
    super(
      `verse_end (${end}) must be >= verse_start (${start})`,
      "INVALID_RANGE",
      "verse",
      raw,
    );
    this.name = "InvalidRangeError";
  }
}

export class OutOfRangeError extends ReferenceResolutionError {
  constructor(field: string, raw: string) {
    super(`${field} must be positive, got ${raw}`, "OUT_OF_RANGE", field, raw);
    this.name = "OutOfRangeError";
  }
}

export class MissingVerseError extends ReferenceResolutionError {
  constructor(message = "Missing verse or verse_start/verse_end") {
    super(message, "MISSING_VERSE", "verse");
    this.name = "MissingVerseError";
  }
}
