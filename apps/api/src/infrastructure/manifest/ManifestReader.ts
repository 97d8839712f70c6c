import fs from "fs/promises";
import type { FileHandle } from "fs/promises";
import path from "path";
import readline from "readline";
import { injectable } from "tsyringe";
import { z } from "zod";
import { CommentaryProps } from "../../domain/commentaries/entities/Commentary";
import { SourceRecord } from "../../domain/ingestion/EntryBatch";
import { StructuralManifestError } from "../../shared/errors/DomainError";

const optionalText = z.string().nullish();

const commentaryMetadataSchema = z.object({
  slug: z.string().trim().min(1, "must not be empty"),
  name: z.string().trim().min(1, "must not be empty"),
  description: optionalText,
  source: optionalText,
  license: optionalText,
  language: optionalText,
});

export const manifestSchema = z
  .object({
    commentary: commentaryMetadataSchema,
    entries: z.array(z.unknown()).optional(),
    entries_file: z.string().trim().min(1, "must not be empty").optional(),
  })
  .superRefine((manifest, ctx) => {
    if (manifest.entries !== undefined && manifest.entries_file !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "Use either entries or entries_file, not both",
      });
    }
    if (manifest.entries === undefined && manifest.entries_file === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "Missing entries or entries_file",
      });
    }
  });

/**
 * Where a manifest comes from: a JSON file on disk, or an already-parsed
 * document whose entries_file resolves against baseDir
 */
export type ManifestSource =
  | { kind: "file"; path: string }
  | { kind: "document"; document: unknown; baseDir: string };

export interface ParsedManifest {
  origin: string;
  baseDir: string;
  commentary: CommentaryProps;
  entries?: unknown[];
  entriesFile?: string;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function formatIssue(issue: z.ZodIssue): string {
  return issue.path.length > 0
    ? `${issue.path.join(".")}: ${issue.message}`
    : issue.message;
}

/**
 * Manifest Reader
 *
 * Reads commentary manifests and their entries. Anything wrong with the
 * manifest itself is a StructuralManifestError; individual entry lines
 * that fail to parse are handed on as unparsable records.
 */
@injectable()
export class ManifestReader {
  async load(source: ManifestSource): Promise<ParsedManifest> {
    const { document, baseDir, origin } =
      source.kind === "file"
        ? await this.readDocument(source.path)
        : { document: source.document, baseDir: source.baseDir, origin: "<inline>" };

    if (typeof document !== "object" || document === null || Array.isArray(document)) {
      throw new StructuralManifestError(
        `Invalid manifest ${origin}: top-level JSON must be an object`,
      );
    }

    const parsed = manifestSchema.safeParse(document);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(formatIssue);
      throw new StructuralManifestError(
        `Invalid manifest ${origin}: ${issues.join("; ")}`,
        issues,
      );
    }

    return {
      origin,
      baseDir,
      commentary: parsed.data.commentary,
      entries: parsed.data.entries,
      entriesFile: parsed.data.entries_file,
    };
  }

  /**
   * Raw entry records of a loaded manifest, in source order
   */
  async records(manifest: ParsedManifest): Promise<SourceRecord[]> {
    if (manifest.entries) {
      return manifest.entries.map((value, index): SourceRecord => ({
        kind: "value",
        position: index + 1,
        value,
      }));
    }

    if (manifest.entriesFile) {
      return this.readEntriesFile(
        path.resolve(manifest.baseDir, manifest.entriesFile),
      );
    }

    return [];
  }

  private async readDocument(
    manifestPath: string,
  ): Promise<{ document: unknown; baseDir: string; origin: string }> {
    const absolute = path.resolve(manifestPath);

    let content: string;
    try {
      content = await fs.readFile(absolute, "utf-8");
    } catch (error) {
      throw new StructuralManifestError(
        `Cannot read manifest ${absolute}: ${describeError(error)}`,
      );
    }

    try {
      return {
        document: JSON.parse(content),
        baseDir: path.dirname(absolute),
        origin: absolute,
      };
    } catch (error) {
      throw new StructuralManifestError(
        `Manifest ${absolute} is not valid JSON: ${describeError(error)}`,
      );
    }
  }

  /**
   * One record per non-blank NDJSON line, numbered by line
   *
   * The file is streamed a line at a time.
   */
  private async readEntriesFile(filePath: string): Promise<SourceRecord[]> {
    let handle: FileHandle;
    try {
      handle = await fs.open(filePath, "r");
    } catch (error) {
      throw new StructuralManifestError(
        `Cannot read entries file ${filePath}: ${describeError(error)}`,
      );
    }

    const lines = readline.createInterface({
      input: handle.createReadStream({ encoding: "utf-8" }),
      crlfDelay: Infinity,
    });

    const records: SourceRecord[] = [];
    let position = 0;
    try {
      for await (const line of lines) {
        position++;
        const text = line.trim();
        if (!text) {
          continue;
        }

        try {
          records.push({ kind: "value", position, value: JSON.parse(text) });
        } catch (error) {
          records.push({
            kind: "unparsable",
            position,
            text,
            reason: describeError(error),
          });
        }
      }
    } finally {
      lines.close();
      await handle.close();
    }

    return records;
  }
}
