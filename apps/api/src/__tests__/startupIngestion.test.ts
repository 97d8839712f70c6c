import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import fs from "fs";
import os from "os";
import path from "path";
import { runStartupIngestion } from "../startupIngestion";
import { IngestCommentaryUseCase } from "../application/ingestion/use-cases/IngestCommentaryUseCase";
import { IngestManifestDirectoryUseCase } from "../application/ingestion/use-cases/IngestManifestDirectoryUseCase";
import { InMemoryCommentaryRepository } from "../infrastructure/persistence/in-memory/InMemoryCommentaryRepository";
import { ManifestReader } from "../infrastructure/manifest/ManifestReader";
import { MockLogger } from "../infrastructure/logging/__tests__/MockLogger";
import { CanonTable } from "../domain/canon/CanonTable";
import { ReferenceResolver } from "../domain/references/ReferenceResolver";
import { Commentary } from "../domain/commentaries/entities/Commentary";

describe("runStartupIngestion", () => {
  let repository: InMemoryCommentaryRepository;
  let logger: MockLogger;
  let ingestDirectory: IngestManifestDirectoryUseCase;
  let manifestDir: string;

  beforeEach(() => {
    manifestDir = fs.mkdtempSync(path.join(os.tmpdir(), "startup-"));
    fs.writeFileSync(
      path.join(manifestDir, "jfb.json"),
      JSON.stringify({
        commentary: { slug: "jfb", name: "JFB" },
        entries: [{ book: "John", chapter: 3, verse: 16, text: "T" }],
      }),
      "utf-8",
    );

    repository = new InMemoryCommentaryRepository();
    logger = new MockLogger();
    ingestDirectory = new IngestManifestDirectoryUseCase(
      new IngestCommentaryUseCase(
        repository,
        new ManifestReader(),
        new ReferenceResolver(CanonTable.default()),
        logger,
      ),
      logger,
    );
  });

  afterEach(() => {
    fs.rmSync(manifestDir, { recursive: true, force: true });
  });

  it("should do nothing without a manifest directory", async () => {
    const result = await runStartupIngestion(
      { manifestDir: undefined },
      repository,
      ingestDirectory,
      logger,
    );

    expect(result).toBeNull();
    expect(await repository.countEntries()).toBe(0);
  });

  it("should seed an empty store", async () => {
    const result = await runStartupIngestion(
      { manifestDir },
      repository,
      ingestDirectory,
      logger,
    );

    expect(result?.reports.map((report) => report.slug)).toEqual(["jfb"]);
    expect(await repository.countEntries()).toBe(1);
    expect(logger.infoCalls[logger.infoCalls.length - 1].context).toEqual({
      directory: manifestDir,
      ingested: 1,
      failed: 0,
      inserted: 1,
    });
  });

  it("should skip a store that already has entries", async () => {
    await repository.bulkLoad(
      Commentary.create({ slug: "gill", name: "Gill" }),
      [{ book: "John", chapter: 1, range: { start: 1, end: 1 }, text: "G" }],
      { replace: false },
    );

    const result = await runStartupIngestion(
      { manifestDir },
      repository,
      ingestDirectory,
      logger,
    );

    expect(result).toBeNull();
    expect(await repository.exists("jfb")).toBe(false);
  });
});
