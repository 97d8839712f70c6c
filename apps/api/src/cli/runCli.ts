import { IngestCommentaryRequest, IngestionReportDto } from "../application/ingestion/dto/IngestionReportDto";
import { ICommentaryRepository } from "../domain/commentaries/repositories/ICommentaryRepository";
import {
  DuplicateEntityError,
  StructuralManifestError,
} from "../shared/errors/DomainError";

export const USAGE = [
  "Usage:",
  "  ingest <manifest.json> [--replace]   ingest one commentary manifest",
  "  count [slug]                         number of stored entries",
].join("\n");

export const EXIT_OK = 0;
export const EXIT_INGEST_FAILED = 1;
export const EXIT_USAGE = 2;

export interface CliDependencies {
  ingest: {
    execute(request: IngestCommentaryRequest): Promise<IngestionReportDto>;
  };
  repository: Pick<ICommentaryRepository, "countEntries">;
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

/**
 * Run one CLI command and return the process exit code
 */
export async function runCli(
  argv: readonly string[],
  deps: CliDependencies,
): Promise<number> {
  const [command, ...args] = argv;

  switch (command) {
    case "ingest":
      return ingestCommand(args, deps);
    case "count": {
      const total = await deps.repository.countEntries(args[0]);
      deps.stdout(String(total));
      return EXIT_OK;
    }
    default:
      deps.stderr(USAGE);
      return EXIT_USAGE;
  }
}

async function ingestCommand(
  args: readonly string[],
  deps: CliDependencies,
): Promise<number> {
  const replace = args.includes("--replace");
  const unknownFlags = args.filter(
    (arg) => arg.startsWith("--") && arg !== "--replace",
  );
  const paths = args.filter((arg) => !arg.startsWith("--"));

  if (unknownFlags.length > 0 || paths.length !== 1) {
    deps.stderr(USAGE);
    return EXIT_USAGE;
  }

  try {
    const report = await deps.ingest.execute({
      source: { kind: "file", path: paths[0] },
      replace,
    });
    deps.stdout(JSON.stringify(report, null, 2));
    return EXIT_OK;
  } catch (error) {
    if (
      error instanceof StructuralManifestError ||
      error instanceof DuplicateEntityError
    ) {
      deps.stderr(`Ingest failed: ${error.message}`);
      return EXIT_INGEST_FAILED;
    }
    throw error;
  }
}
