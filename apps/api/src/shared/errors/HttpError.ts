import { AppError } from "./AppError";

/**
 * HTTP-level errors
 *
 * These map to HTTP status codes
 */

export class HttpError extends AppError {
  constructor(
    message: string,
    public readonly statusCode: number,
    code: string,
  ) {
    super(message, code);
    this.name = "HttpError";
  }
}

export class NotFoundError extends HttpError {
  constructor(resource: string) {
    super(`${resource} not found`, 404, "NOT_FOUND");
    this.name = "NotFoundError";
  }
}
