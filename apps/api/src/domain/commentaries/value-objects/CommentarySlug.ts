import { ValidationError } from "../../../shared/errors/DomainError";

/**
 * CommentarySlug Value Object
 *
 * URL-safe identifier of a commentary (RFC 3986 unreserved characters)
 */
export class CommentarySlug {
  private static readonly MAX_LENGTH = 100;
  private static readonly PATTERN = /^[A-Za-z0-9._~-]+$/;

  private constructor(private readonly value: string) {
    this.validate();
  }

  static create(slug: string): CommentarySlug {
    return new CommentarySlug(slug.trim());
  }

  private validate(): void {
    if (this.value.length === 0) {
      throw new ValidationError("commentary.slug is required", "slug");
    }

    if (this.value.length > CommentarySlug.MAX_LENGTH) {
      throw new ValidationError(
        `commentary.slug must be ${CommentarySlug.MAX_LENGTH} characters or less`,
        "slug",
      );
    }

    if (!CommentarySlug.PATTERN.test(this.value)) {
      throw new ValidationError(
        "commentary.slug may only contain letters, digits, '.', '_', '~' and '-'",
        "slug",
      );
    }
  }

  getValue(): string {
    return this.value;
  }

  /**
   * Slugs compare case-insensitively
   */
  equals(other: CommentarySlug): boolean {
    return this.value.toLowerCase() === other.value.toLowerCase();
  }

  toString(): string {
    return this.value;
  }
}
