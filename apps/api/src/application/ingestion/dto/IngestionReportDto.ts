import { ManifestSource } from "../../../infrastructure/manifest/ManifestReader";

export interface IngestCommentaryRequest {
  source: ManifestSource;
  replace: boolean;
}

export interface IngestionErrorDto {
  position: number;
  rawEntry: unknown;
  reason: string;
  code: string;
}

/**
 * Outcome of ingesting one manifest. `skipped` always equals
 * `errors.length`.
 */
export interface IngestionReportDto {
  slug: string;
  inserted: number;
  skipped: number;
  errors: IngestionErrorDto[];
}

export interface ManifestFailureDto {
  file: string;
  code: string;
  error: string;
}

export interface DirectoryIngestionDto {
  directory: string;
  reports: IngestionReportDto[];
  failures: ManifestFailureDto[];
}
