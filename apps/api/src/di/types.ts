/**
 * Dependency Injection Types/Tokens
 *
 * All injectable dependencies are registered here using symbols
 * to avoid string-based injection which is error-prone
 */

export const TYPES = {
  // Configuration
  Config: Symbol.for("Config"),

  // Logging
  Logger: Symbol.for("Logger"),

  // Database
  SupabaseClient: Symbol.for("SupabaseClient"),

  // Scripture references
  CanonTable: Symbol.for("CanonTable"),
  ReferenceResolver: Symbol.for("ReferenceResolver"),

  // Repositories
  CommentaryRepository: Symbol.for("CommentaryRepository"),

  // Ingestion
  ManifestReader: Symbol.for("ManifestReader"),

  // Use Cases
  ListBooksUseCase: Symbol.for("ListBooksUseCase"),
  ListCommentariesUseCase: Symbol.for("ListCommentariesUseCase"),
  GetCommentaryUseCase: Symbol.for("GetCommentaryUseCase"),
  GetChapterCommentaryUseCase: Symbol.for("GetChapterCommentaryUseCase"),
  GetVerseCommentaryUseCase: Symbol.for("GetVerseCommentaryUseCase"),
  IngestCommentaryUseCase: Symbol.for("IngestCommentaryUseCase"),
  IngestManifestDirectoryUseCase: Symbol.for("IngestManifestDirectoryUseCase"),
} as const;
