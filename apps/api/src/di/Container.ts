import "reflect-metadata";
import { container, instanceCachingFactory } from "tsyringe";
import { TYPES } from "./types";

// Configuration
import { IConfig } from "../shared/config/IConfig";
import { EnvConfig } from "../shared/config/EnvConfig";

// Logging
import { ILogger } from "../infrastructure/logging/ILogger";
import { PinoLogger } from "../infrastructure/logging/PinoLogger";

// Scripture references
import { CanonTable } from "../domain/canon/CanonTable";
import { ReferenceResolver } from "../domain/references/ReferenceResolver";

// Persistence
import { SupabaseClient } from "../infrastructure/persistence/supabase/SupabaseClient";
import { ICommentaryRepository } from "../domain/commentaries/repositories/ICommentaryRepository";
import { SupabaseCommentaryRepository } from "../infrastructure/persistence/supabase/repositories/SupabaseCommentaryRepository";
import { InMemoryCommentaryRepository } from "../infrastructure/persistence/in-memory/InMemoryCommentaryRepository";

// Ingestion
import { ManifestReader } from "../infrastructure/manifest/ManifestReader";

// Use Cases
import { ListBooksUseCase } from "../application/canon/use-cases/ListBooksUseCase";
import { ListCommentariesUseCase } from "../application/commentaries/use-cases/ListCommentariesUseCase";
import { GetCommentaryUseCase } from "../application/commentaries/use-cases/GetCommentaryUseCase";
import { GetChapterCommentaryUseCase } from "../application/commentaries/use-cases/GetChapterCommentaryUseCase";
import { GetVerseCommentaryUseCase } from "../application/commentaries/use-cases/GetVerseCommentaryUseCase";
import { IngestCommentaryUseCase } from "../application/ingestion/use-cases/IngestCommentaryUseCase";
import { IngestManifestDirectoryUseCase } from "../application/ingestion/use-cases/IngestManifestDirectoryUseCase";

/**
 * Dependency Injection Container Configuration
 *
 * Registers all dependencies and their implementations
 */
export class DIContainer {
  static initialize(): void {
    // Configuration (read from process.env on first use)
    container.register<IConfig>(TYPES.Config, {
      useFactory: instanceCachingFactory(() => new EnvConfig()),
    });

    // Logging
    container.registerSingleton<ILogger>(TYPES.Logger, PinoLogger);

    // Scripture references
    container.register<CanonTable>(TYPES.CanonTable, {
      useFactory: () => CanonTable.default(),
    });
    container.registerSingleton<ReferenceResolver>(
      TYPES.ReferenceResolver,
      ReferenceResolver,
    );

    // Database
    container.registerSingleton<SupabaseClient>(
      TYPES.SupabaseClient,
      SupabaseClient,
    );

    // Repositories: COMMENTARY_STORE picks the entry store
    container.register<ICommentaryRepository>(TYPES.CommentaryRepository, {
      useFactory: instanceCachingFactory<ICommentaryRepository>((c) =>
        c.resolve<IConfig>(TYPES.Config).commentaryStore === "supabase"
          ? c.resolve(SupabaseCommentaryRepository)
          : new InMemoryCommentaryRepository(),
      ),
    });

    // Ingestion
    container.registerSingleton<ManifestReader>(
      TYPES.ManifestReader,
      ManifestReader,
    );

    // Use Cases
    container.register(TYPES.ListBooksUseCase, {
      useClass: ListBooksUseCase,
    });
    container.register(TYPES.ListCommentariesUseCase, {
      useClass: ListCommentariesUseCase,
    });
    container.register(TYPES.GetCommentaryUseCase, {
      useClass: GetCommentaryUseCase,
    });
    container.register(TYPES.GetChapterCommentaryUseCase, {
      useClass: GetChapterCommentaryUseCase,
    });
    container.register(TYPES.GetVerseCommentaryUseCase, {
      useClass: GetVerseCommentaryUseCase,
    });
    container.register(TYPES.IngestCommentaryUseCase, {
      useClass: IngestCommentaryUseCase,
    });
    container.register(TYPES.IngestManifestDirectoryUseCase, {
      useClass: IngestManifestDirectoryUseCase,
    });
  }
}

// Initialize container on module load
DIContainer.initialize();

export { container };
