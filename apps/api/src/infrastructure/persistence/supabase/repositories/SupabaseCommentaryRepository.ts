import { SupabaseClient as SupabaseClientType } from "@supabase/supabase-js";
import { injectable, inject } from "tsyringe";
import { z } from "zod";
import {
  BulkLoadOptions,
  ICommentaryRepository,
} from "../../../../domain/commentaries/repositories/ICommentaryRepository";
import { Commentary } from "../../../../domain/commentaries/entities/Commentary";
import {
  CommentaryEntry,
  NewCommentaryEntry,
} from "../../../../domain/commentaries/entities/CommentaryEntry";
import { DuplicateEntityError } from "../../../../shared/errors/DomainError";
import { SupabaseClient } from "../SupabaseClient";
import { ILogger } from "../../../logging/ILogger";
import { TYPES } from "../../../../di/types";
import { QueryError, QueryResult, withRetry } from "../withRetry";

const COMMENTARY_COLUMNS = "slug, name, description, source, license, language";
const ENTRY_COLUMNS = "commentary_slug, book, chapter, verse_start, verse_end, text";

const UNIQUE_VIOLATION = "23505";

// PostgREST caps a response at its max-rows setting (1000 on Supabase)
export const ENTRY_PAGE_SIZE = 1000;

const dbCommentarySchema = z.object({
  slug: z.string(),
  name: z.string(),
  description: z.string().nullable(),
  source: z.string().nullable(),
  license: z.string().nullable(),
  language: z.string().nullable(),
});

const dbEntrySchema = z.object({
  commentary_slug: z.string(),
  book: z.string(),
  chapter: z.number().int(),
  verse_start: z.number().int(),
  verse_end: z.number().int(),
  text: z.string(),
});

type DbCommentary = z.infer<typeof dbCommentarySchema>;
type DbEntry = z.infer<typeof dbEntrySchema>;

/**
 * Escape LIKE wildcards so ilike behaves as a case-insensitive equality
 */
function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

/**
 * Supabase implementation of the commentary repository
 *
 * Reads go through PostgREST filters backed by the
 * (commentary_slug, book, chapter, verse_start, verse_end) index. Writes go
 * through the load_commentary function so delete and insert share one
 * transaction.
 */
@injectable()
export class SupabaseCommentaryRepository implements ICommentaryRepository {
  private client: SupabaseClientType;

  constructor(
    @inject(TYPES.SupabaseClient) supabaseClient: SupabaseClient,
    @inject(TYPES.Logger) private logger: ILogger,
  ) {
    this.client = supabaseClient.getClient();
  }

  async listCommentaries(): Promise<Commentary[]> {
    this.logger.debug("Listing commentaries");

    const data = await withRetry(
      async () =>
        await this.client
          .from("commentaries")
          .select(COMMENTARY_COLUMNS)
          .order("name", { ascending: true }),
      this.logger,
    );

    return dbCommentarySchema
      .array()
      .parse(data)
      .map((row) => this.toDomain(row));
  }

  async findCommentary(slugOrName: string): Promise<Commentary | null> {
    this.logger.debug("Finding commentary", { slugOrName });

    const needle = escapeLikePattern(slugOrName.trim());
    for (const column of ["slug", "name"]) {
      const data = await withRetry(
        async () =>
          await this.client
            .from("commentaries")
            .select(COMMENTARY_COLUMNS)
            .ilike(column, needle)
            .limit(1),
        this.logger,
      );

      const [row] = dbCommentarySchema.array().parse(data);
      if (row) {
        return this.toDomain(row);
      }
    }

    this.logger.debug("Commentary not found", { slugOrName });
    return null;
  }

  async exists(slug: string): Promise<boolean> {
    const data = await withRetry(
      async () =>
        await this.client
          .from("commentaries")
          .select("slug")
          .ilike("slug", escapeLikePattern(slug.trim()))
          .limit(1),
      this.logger,
    );

    return Array.isArray(data) && data.length > 0;
  }

  async bulkLoad(
    commentary: Commentary,
    entries: readonly NewCommentaryEntry[],
    options: BulkLoadOptions,
  ): Promise<number> {
    if (!options.replace && (await this.exists(commentary.slug))) {
      throw new DuplicateEntityError("Commentary", "slug", commentary.slug);
    }

    this.logger.info("Loading commentary", {
      slug: commentary.slug,
      entries: entries.length,
      replace: options.replace,
    });

    try {
      const inserted = await withRetry(
        async () =>
          await this.client.rpc("load_commentary", {
            p_commentary: commentary.toJSON(),
            p_entries: entries.map((entry) => this.toDatabase(entry)),
            p_replace: options.replace,
          }),
        this.logger,
      );

      const count = z.number().int().parse(inserted);
      this.logger.info("Commentary loaded successfully", {
        slug: commentary.slug,
        inserted: count,
      });
      return count;
    } catch (error) {
      // A concurrent load can still win the race after the exists() check
      if (error instanceof QueryError && error.code === UNIQUE_VIOLATION) {
        throw new DuplicateEntityError("Commentary", "slug", commentary.slug);
      }
      throw error;
    }
  }

  async queryChapter(
    slug: string,
    book: string,
    chapter: number,
  ): Promise<CommentaryEntry[]> {
    return this.pagedEntries(
      async (from, to) =>
        await this.client
          .from("entries")
          .select(ENTRY_COLUMNS)
          .eq("commentary_slug", slug)
          .eq("book", book)
          .eq("chapter", chapter)
          .order("verse_start", { ascending: true })
          .order("verse_end", { ascending: true })
          .order("id", { ascending: true })
          .range(from, to),
    );
  }

  async queryVerse(
    slug: string,
    book: string,
    chapter: number,
    verse: number,
  ): Promise<CommentaryEntry[]> {
    return this.pagedEntries(
      async (from, to) =>
        await this.client
          .from("entries")
          .select(ENTRY_COLUMNS)
          .eq("commentary_slug", slug)
          .eq("book", book)
          .eq("chapter", chapter)
          .lte("verse_start", verse)
          .gte("verse_end", verse)
          .order("verse_start", { ascending: true })
          .order("verse_end", { ascending: true })
          .order("id", { ascending: true })
          .range(from, to),
    );
  }

  async countEntries(slug?: string): Promise<number> {
    let query = this.client
      .from("entries")
      .select("id", { count: "exact", head: true });
    if (slug !== undefined) {
      query = query.eq("commentary_slug", slug);
    }

    const { count, error } = await query;
    if (error) {
      this.logger.error("Error counting entries", undefined, {
        slug,
        code: error.code,
        message: error.message,
      });
      throw new QueryError(error.message, error.code, error.details, error.hint);
    }

    return count ?? 0;
  }

  /**
   * Convert database model to domain entity
   */
  private toDomain(row: DbCommentary): Commentary {
    return Commentary.create(row);
  }

  /**
   * Fetch page after page until one comes back short
   */
  private async pagedEntries(
    page: (from: number, to: number) => Promise<QueryResult<unknown>>,
  ): Promise<CommentaryEntry[]> {
    const entries: CommentaryEntry[] = [];

    for (let from = 0; ; from += ENTRY_PAGE_SIZE) {
      const data = await withRetry(
        () => page(from, from + ENTRY_PAGE_SIZE - 1),
        this.logger,
      );
      const rows = this.toEntries(data);
      entries.push(...rows);

      if (rows.length < ENTRY_PAGE_SIZE) {
        return entries;
      }
    }
  }

  private toEntries(data: unknown): CommentaryEntry[] {
    return dbEntrySchema
      .array()
      .parse(data)
      .map((row: DbEntry) => ({
        commentarySlug: row.commentary_slug,
        book: row.book,
        chapter: row.chapter,
        range: { start: row.verse_start, end: row.verse_end },
        text: row.text,
      }));
  }

  /**
   * Convert an entry to the JSON shape load_commentary unpacks
   */
  private toDatabase(entry: NewCommentaryEntry): Omit<DbEntry, "commentary_slug"> {
    return {
      book: entry.book,
      chapter: entry.chapter,
      verse_start: entry.range.start,
      verse_end: entry.range.end,
      text: entry.text,
    };
  }
}
