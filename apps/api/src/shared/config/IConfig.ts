/**
 * Configuration interface
 *
 * Defines all configuration values needed by the application.
 * Implementations can come from environment variables, files, or config services.
 */

export type CommentaryStoreDriver = "memory" | "supabase";

export interface IConfig {
  // Server
  readonly port: number;
  readonly nodeEnv: string;
  readonly logLevel: string;
  readonly corsOrigins: string[];

  // Storage
  readonly commentaryStore: CommentaryStoreDriver;
  readonly supabaseUrl: string;
  readonly supabaseServiceKey: string;

  // Ingestion
  readonly manifestDir: string | undefined;

  // Features
  readonly enableRateLimiting: boolean;

  // Validation
  validate(): void;
}
