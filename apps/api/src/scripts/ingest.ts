#!/usr/bin/env node
/**
 * Commentary ingestion CLI
 *
 *   ingest <manifest.json> [--replace]
 *   count [slug]
 */

import "reflect-metadata";
import "dotenv/config";

import { container } from "../di/Container";
import { TYPES } from "../di/types";
import { IngestCommentaryUseCase } from "../application/ingestion/use-cases/IngestCommentaryUseCase";
import { ICommentaryRepository } from "../domain/commentaries/repositories/ICommentaryRepository";
import { runCli } from "../cli/runCli";

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2), {
    ingest: container.resolve<IngestCommentaryUseCase>(
      TYPES.IngestCommentaryUseCase,
    ),
    repository: container.resolve<ICommentaryRepository>(
      TYPES.CommentaryRepository,
    ),
    stdout: (line) => console.log(line),
    stderr: (line) => console.error(line),
  });
}

main().catch((error) => {
  console.error("Ingest failed:", error);
  process.exit(1);
});
