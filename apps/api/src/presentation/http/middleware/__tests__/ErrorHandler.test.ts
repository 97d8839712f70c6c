import "reflect-metadata";
import { describe, it, expect, beforeEach } from "@jest/globals";
import express, { Express } from "express";
import request from "supertest";
import { errorHandler } from "../ErrorHandler";
import { container } from "../../../../di/Container";
import { TYPES } from "../../../../di/types";
import { ILogger } from "../../../../infrastructure/logging/ILogger";
import { MockLogger } from "../../../../infrastructure/logging/__tests__/MockLogger";
import {
  DuplicateEntityError,
  StructuralManifestError,
  ValidationError,
} from "../../../../shared/errors/DomainError";
import { NotFoundError } from "../../../../shared/errors/HttpError";
import { UnknownBookError } from "../../../../shared/errors/ReferenceError";

function appThrowing(error: Error): Express {
  const app = express();
  app.get("/boom", (_req, _res, next) => next(error));
  app.use(errorHandler);
  return app;
}

describe("errorHandler", () => {
  let logger: MockLogger;

  beforeEach(() => {
    logger = new MockLogger();
    container.registerInstance<ILogger>(TYPES.Logger, logger);
  });

  it("should answer a reference error with its field and raw input", async () => {
    const response = await request(appThrowing(new UnknownBookError("Hezekiah")))
      .get("/boom")
      .expect(400);

    expect(response.body).toEqual({
      error: "Unknown book: Hezekiah",
      code: "UNKNOWN_BOOK",
      field: "book",
      raw: "Hezekiah",
    });
    expect(logger.warnCalls).toEqual([
      {
        message: "Unknown book: Hezekiah",
        context: { path: "/boom", method: "GET", code: "UNKNOWN_BOOK" },
      },
    ]);
  });

  it("should answer a validation error with its field", async () => {
    const response = await request(
      appThrowing(new ValidationError("Chapter must be a number", "chapter")),
    )
      .get("/boom")
      .expect(400);

    expect(response.body).toEqual({
      error: "Chapter must be a number",
      code: "VALIDATION_ERROR",
      field: "chapter",
    });
  });

  it("should answer a manifest error with its issues", async () => {
    const error = new StructuralManifestError(
      "Invalid manifest <inline>: entries: Required",
      ["entries: Required"],
    );

    const response = await request(appThrowing(error)).get("/boom").expect(400);

    expect(response.body).toEqual({
      error: "Invalid manifest <inline>: entries: Required",
      code: "STRUCTURAL_MANIFEST_ERROR",
      issues: ["entries: Required"],
    });
  });

  it("should answer a duplicate with 409", async () => {
    const response = await request(
      appThrowing(new DuplicateEntityError("Commentary", "slug", "jfb")),
    )
      .get("/boom")
      .expect(409);

    expect(response.body).toEqual({
      error: "Commentary with slug='jfb' already exists",
      code: "DUPLICATE_ENTITY",
    });
  });

  it("should use the status code of an HTTP error", async () => {
    const response = await request(
      appThrowing(new NotFoundError("Route GET /nowhere")),
    )
      .get("/boom")
      .expect(404);

    expect(response.body.error).toBe("Route GET /nowhere not found");
    expect(response.body.code).toBe("NOT_FOUND");
  });

  it("should answer an unknown error with 500 and log it", async () => {
    const response = await request(appThrowing(new Error("socket closed")))
      .get("/boom")
      .expect(500);

    expect(response.body.code).toBe("INTERNAL_ERROR");
    expect(response.body.error).toBe("socket closed");
    expect(logger.errorCalls).toHaveLength(1);
    expect(logger.errorCalls[0].message).toBe("Error handler caught error");
  });
});
