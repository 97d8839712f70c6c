import { Request, Response, NextFunction } from "express";
import { AppError } from "../../../shared/errors/AppError";
import { HttpError } from "../../../shared/errors/HttpError";
import {
  ValidationError,
  EntityNotFoundError,
  DuplicateEntityError,
  StructuralManifestError,
} from "../../../shared/errors/DomainError";
import { container } from "../../../di/Container";
import { ILogger } from "../../../infrastructure/logging/ILogger";
import { TYPES } from "../../../di/types";

function statusFor(err: AppError): number {
  if (err instanceof HttpError) {
    return err.statusCode;
  }
  if (err instanceof ValidationError || err instanceof StructuralManifestError) {
    return 400;
  }
  if (err instanceof EntityNotFoundError) {
    return 404;
  }
  if (err instanceof DuplicateEntityError) {
    return 409;
  }
  return 500;
}

/**
 * Response body from the error's own serialization
 *
 * Only the fields a subclass adds for the caller are kept: the field that
 * failed validation, the raw input of a reference error and the issues of a
 * manifest error. Undefined ones drop out of the JSON.
 */
function errorBody(err: AppError): Record<string, unknown> {
  const { message, code, field, raw, issues } = err.toJSON();
  return { error: message, code, field, raw, issues };
}

/**
 * Centralized Error Handler Middleware
 *
 * Maps domain errors to HTTP errors and sends appropriate responses
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction,
): void {
  const logger = container.resolve<ILogger>(TYPES.Logger);
  const exposeStack = process.env.NODE_ENV !== "production";
  const requestContext = { path: req.path, method: req.method };

  if (err instanceof AppError && err.isOperational) {
    logger.warn(err.message, { ...requestContext, code: err.code });
  } else {
    logger.error("Error handler caught error", err, requestContext);
  }

  if (err instanceof AppError) {
    res.status(statusFor(err)).json({
      ...errorBody(err),
      ...(exposeStack && err instanceof HttpError && { stack: err.stack }),
    });
    return;
  }

  // Unknown error
  res.status(500).json({
    error: exposeStack ? err.message : "Internal server error",
    code: "INTERNAL_ERROR",
    ...(exposeStack && { stack: err.stack }),
  });
}
