import { CommentarySlug } from "../value-objects/CommentarySlug";
import { ValidationError } from "../../../shared/errors/DomainError";

export interface CommentaryProps {
  slug: string;
  name: string;
  description?: string | null;
  source?: string | null;
  license?: string | null;
  language?: string | null;
}

export interface CommentaryJSON {
  slug: string;
  name: string;
  description: string | null;
  source: string | null;
  license: string | null;
  language: string | null;
}

/**
 * Commentary Aggregate Root
 *
 * Metadata for one commentary work. Replaced wholesale on re-ingestion,
 * never edited in place.
 */
export class Commentary {
  private constructor(
    private readonly _slug: CommentarySlug,
    public readonly name: string,
    public readonly description: string | null,
    public readonly source: string | null,
    public readonly license: string | null,
    public readonly language: string | null,
  ) {}

  static create(props: CommentaryProps): Commentary {
    const name = props.name.trim();
    if (!name) {
      throw new ValidationError("commentary.name is required", "name");
    }

    return new Commentary(
      CommentarySlug.create(props.slug),
      name,
      props.description ?? null,
      props.source ?? null,
      props.license ?? null,
      props.language ?? null,
    );
  }

  get slug(): string {
    return this._slug.getValue();
  }

  /**
   * Case-insensitive match on slug or display name
   */
  matches(slugOrName: string): boolean {
    const needle = slugOrName.trim().toLowerCase();
    return (
      this.slug.toLowerCase() === needle || this.name.toLowerCase() === needle
    );
  }

  toJSON(): CommentaryJSON {
    return {
      slug: this.slug,
      name: this.name,
      description: this.description,
      source: this.source,
      license: this.license,
      language: this.language,
    };
  }
}
