import { AppError, AppErrorJSON } from "./AppError";

/**
 * Domain-level errors
 *
 * These represent violations of commentary and ingestion rules
 */

export class ValidationError extends AppError {
  constructor(
    message: string,
    public readonly field?: string,
    code = "VALIDATION_ERROR",
  ) {
    super(message, code);
    this.name = "ValidationError";
  }

  toJSON(): AppErrorJSON {
    return {
      ...super.toJSON(),
      field: this.field,
    };
  }
}

export class EntityNotFoundError extends AppError {
  constructor(
    public readonly entityName: string,
    public readonly id: string,
  ) {
    super(`${entityName} '${id}' not found`, "ENTITY_NOT_FOUND");
    this.name = "EntityNotFoundError";
  }
}

export class DuplicateEntityError extends AppError {
  constructor(entityName: string, field: string, value: string) {
    super(
      `${entityName} with ${field}='${value}' already exists`,
      "DUPLICATE_ENTITY",
    );
    this.name = "DuplicateEntityError";
  }
}

/**
 * Raised when a manifest cannot be ingested at all: unreadable file,
 * malformed document, or missing commentary metadata. Nothing is written.
 */
export class StructuralManifestError extends AppError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message, "STRUCTURAL_MANIFEST_ERROR");
    this.name = "StructuralManifestError";
  }

  toJSON(): AppErrorJSON {
    return {
      ...super.toJSON(),
      issues: this.issues,
    };
  }
}
