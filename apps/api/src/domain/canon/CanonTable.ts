import { z } from "zod";
import canonData from "./canon.json";
import { UnknownBookError } from "../../shared/errors/ReferenceError";
import { Resolution, failed, resolved } from "../references/Resolution";

/**
 * Canon Table
 *
 * The 66 books of the Protestant canon in Scripture order, with every
 * accepted spelling folded onto a single lookup key. Built once per process
 * and read-only afterwards.
 */

export type Testament = "OT" | "NT";

export interface CanonicalBook {
  readonly name: string;
  readonly testament: Testament;
  /** 1-based position in canonical order */
  readonly position: number;
  readonly aliases: readonly string[];
}

export interface BookListing {
  canonical: string;
  testament: Testament;
  position: number;
  aliases: string[];
}

const bookDefinitionSchema = z.object({
  name: z.string().min(1),
  testament: z.enum(["OT", "NT"]),
  aliases: z.array(z.string().min(1)),
});

const canonSchema = z.object({
  books: z.array(bookDefinitionSchema).length(66),
});

export type BookDefinition = z.infer<typeof bookDefinitionSchema>;

// Longest spellings first so "iii" is tried before "ii" and "i".
// Roman numerals need a separator, otherwise "isa" would read as "1 sa".
const ORDINAL_PREFIXES: ReadonlyArray<{ pattern: RegExp; ordinal: string }> = [
  { pattern: /^(?:third|3rd|3)[\s.-]*/, ordinal: "3" },
  { pattern: /^(?:second|2nd|2)[\s.-]*/, ordinal: "2" },
  { pattern: /^(?:first|1st|1)[\s.-]*/, ordinal: "1" },
  { pattern: /^iii[\s.-]+/, ordinal: "3" },
  { pattern: /^ii[\s.-]+/, ordinal: "2" },
  { pattern: /^i[\s.-]+/, ordinal: "1" },
];

/**
 * Reduce a book spelling to its lookup key
 *
 * "I Samuel", "1st sam.", "First  Samuel" and "1Samuel" all share the
 * ordinal "1"; the remainder keeps only letters and digits.
 */
export function normalizeBookKey(raw: string): string {
  let value = raw.trim().replace(/\s+/g, " ").toLowerCase();
  let ordinal = "";

  for (const prefix of ORDINAL_PREFIXES) {
    const match = prefix.pattern.exec(value);
    if (match) {
      ordinal = prefix.ordinal;
      value = value.slice(match[0].length);
      break;
    }
  }

  return ordinal + value.replace(/[^a-z0-9]/g, "");
}

export class CanonTable {
  private static defaultTable: CanonTable | null = null;

  private readonly books: readonly CanonicalBook[];
  private readonly aliasIndex: ReadonlyMap<string, CanonicalBook>;

  constructor(definitions: readonly BookDefinition[]) {
    const index = new Map<string, CanonicalBook>();

    this.books = definitions.map((definition, i) => {
      const book: CanonicalBook = Object.freeze({
        name: definition.name,
        testament: definition.testament,
        position: i + 1,
        aliases: Object.freeze([...new Set(definition.aliases)].sort()),
      });

      for (const spelling of [definition.name, ...definition.aliases]) {
        const key = normalizeBookKey(spelling);
        const existing = index.get(key);
        if (existing && existing.name !== book.name) {
          throw new Error(
            `Alias '${spelling}' of ${book.name} collides with ${existing.name}`,
          );
        }
        index.set(key, book);
      }

      return book;
    });

    this.aliasIndex = index;
  }

  /**
   * The process-wide table loaded from canon.json
   */
  static default(): CanonTable {
    if (!CanonTable.defaultTable) {
      const { books } = canonSchema.parse(canonData);
      CanonTable.defaultTable = new CanonTable(books);
    }
    return CanonTable.defaultTable;
  }

  canonicalize(raw: string): Resolution<CanonicalBook> {
    const book = this.aliasIndex.get(normalizeBookKey(raw));
    return book ? resolved(book) : failed(new UnknownBookError(raw));
  }

  listCanonicalBooks(): string[] {
    return this.books.map((book) => book.name);
  }

  listBooks(): BookListing[] {
    return this.books.map((book) => ({
      canonical: book.name,
      testament: book.testament,
      position: book.position,
      aliases: [...book.aliases],
    }));
  }

  get size(): number {
    return this.books.length;
  }
}
