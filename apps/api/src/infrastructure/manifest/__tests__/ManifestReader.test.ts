import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import fs from "fs";
import os from "os";
import path from "path";
import { ManifestReader } from "../ManifestReader";
import { StructuralManifestError } from "../../../shared/errors/DomainError";

async function structuralIssues(promise: Promise<unknown>): Promise<string[]> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof StructuralManifestError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error("Expected a StructuralManifestError");
}

describe("ManifestReader", () => {
  const reader = new ManifestReader();
  let workDir: string;

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), "manifest-reader-"));
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  function writeFile(name: string, content: string): string {
    const filePath = path.join(workDir, name);
    fs.writeFileSync(filePath, content, "utf-8");
    return filePath;
  }

  describe("load", () => {
    it("should load an inline document", async () => {
      const manifest = await reader.load({
        kind: "document",
        document: {
          commentary: { slug: " jfb ", name: "JFB", license: "Public Domain" },
          entries: [{ book: "John", chapter: 3, verse: 16, text: "T" }],
        },
        baseDir: workDir,
      });

      expect(manifest.origin).toBe("<inline>");
      expect(manifest.baseDir).toBe(workDir);
      expect(manifest.commentary).toEqual({
        slug: "jfb",
        name: "JFB",
        license: "Public Domain",
      });
      expect(manifest.entries).toHaveLength(1);
      expect(manifest.entriesFile).toBeUndefined();
    });

    it("should load a manifest file relative to its directory", async () => {
      const manifestPath = writeFile(
        "gill.json",
        JSON.stringify({
          commentary: { slug: "gill", name: "Gill" },
          entries_file: "gill.ndjson",
        }),
      );

      const manifest = await reader.load({ kind: "file", path: manifestPath });

      expect(manifest.origin).toBe(manifestPath);
      expect(manifest.baseDir).toBe(workDir);
      expect(manifest.entriesFile).toBe("gill.ndjson");
    });

    it("should reject a manifest with both entry sources", async () => {
      const issues = await structuralIssues(
        reader.load({
          kind: "document",
          document: {
            commentary: { slug: "jfb", name: "JFB" },
            entries: [],
            entries_file: "jfb.ndjson",
          },
          baseDir: workDir,
        }),
      );

      expect(issues).toEqual(["Use either entries or entries_file, not both"]);
    });

    it("should reject a manifest with no entry source", async () => {
      await expect(
        reader.load({
          kind: "document",
          document: { commentary: { slug: "jfb", name: "JFB" } },
          baseDir: workDir,
        }),
      ).rejects.toThrow(
        "Invalid manifest <inline>: Missing entries or entries_file",
      );
    });

    it("should reject a missing slug", async () => {
      const issues = await structuralIssues(
        reader.load({
          kind: "document",
          document: { commentary: { name: "No Slug" }, entries: [] },
          baseDir: workDir,
        }),
      );

      expect(issues).toEqual(["commentary.slug: Required"]);
    });

    it("should reject a blank name", async () => {
      const issues = await structuralIssues(
        reader.load({
          kind: "document",
          document: { commentary: { slug: "jfb", name: "  " }, entries: [] },
          baseDir: workDir,
        }),
      );

      expect(issues).toEqual(["commentary.name: must not be empty"]);
    });

    it("should reject entries that are not a list", async () => {
      const issues = await structuralIssues(
        reader.load({
          kind: "document",
          document: { commentary: { slug: "jfb", name: "JFB" }, entries: "all" },
          baseDir: workDir,
        }),
      );

      expect(issues).toEqual(["entries: Expected array, received string"]);
    });

    it("should reject a top-level value that is not an object", async () => {
      await expect(
        reader.load({ kind: "document", document: [], baseDir: workDir }),
      ).rejects.toThrow(
        "Invalid manifest <inline>: top-level JSON must be an object",
      );
    });

    it("should reject a manifest file that does not exist", async () => {
      const missing = path.join(workDir, "missing.json");

      await expect(
        reader.load({ kind: "file", path: missing }),
      ).rejects.toThrow(`Cannot read manifest ${missing}`);
    });

    it("should reject a manifest file that is not JSON", async () => {
      const manifestPath = writeFile("broken.json", "{ commentary: ");

      await expect(
        reader.load({ kind: "file", path: manifestPath }),
      ).rejects.toThrow(StructuralManifestError);
    });
  });

  describe("records", () => {
    it("should number inline entries from 1", async () => {
      const manifest = await reader.load({
        kind: "document",
        document: {
          commentary: { slug: "jfb", name: "JFB" },
          entries: [{ book: "John" }, "second"],
        },
        baseDir: workDir,
      });

      expect(await reader.records(manifest)).toEqual([
        { kind: "value", position: 1, value: { book: "John" } },
        { kind: "value", position: 2, value: "second" },
      ]);
    });

    it("should read NDJSON lines, skipping blanks and keeping bad lines", async () => {
      writeFile(
        "jfb.ndjson",
        [
          '{"book":"John","chapter":3,"verse":16,"text":"T"}',
          "",
          "{not json",
          '  {"book":"Romans","chapter":8,"verse":"1-3","text":"T2"}  ',
          "",
        ].join("\r\n"),
      );
      const manifest = await reader.load({
        kind: "document",
        document: {
          commentary: { slug: "jfb", name: "JFB" },
          entries_file: "jfb.ndjson",
        },
        baseDir: workDir,
      });

      const records = await reader.records(manifest);

      expect(records).toHaveLength(3);
      expect(records[0]).toEqual({
        kind: "value",
        position: 1,
        value: { book: "John", chapter: 3, verse: 16, text: "T" },
      });
      expect(records[1]).toMatchObject({
        kind: "unparsable",
        position: 3,
        text: "{not json",
      });
      expect(records[2]).toEqual({
        kind: "value",
        position: 4,
        value: { book: "Romans", chapter: 8, verse: "1-3", text: "T2" },
      });
    });

    it("should number lines across a file larger than one read chunk", async () => {
      const lines = Array.from(
        { length: 3000 },
        (_, index) =>
          `{"book":"Psalms","chapter":119,"verse":${index + 1},"text":"note ${index + 1}"}`,
      );
      writeFile("psalms.ndjson", lines.join("\n") + "\n");
      const manifest = await reader.load({
        kind: "document",
        document: {
          commentary: { slug: "psalms", name: "Psalms Notes" },
          entries_file: "psalms.ndjson",
        },
        baseDir: workDir,
      });

      const records = await reader.records(manifest);

      expect(records).toHaveLength(3000);
      expect(records[2999]).toEqual({
        kind: "value",
        position: 3000,
        value: { book: "Psalms", chapter: 119, verse: 3000, text: "note 3000" },
      });
    });

    it("should fail structurally when the entries file is missing", async () => {
      const manifest = await reader.load({
        kind: "document",
        document: {
          commentary: { slug: "jfb", name: "JFB" },
          entries_file: "nowhere.ndjson",
        },
        baseDir: workDir,
      });

      await expect(reader.records(manifest)).rejects.toThrow(
        `Cannot read entries file ${path.join(workDir, "nowhere.ndjson")}`,
      );
    });
  });
});
