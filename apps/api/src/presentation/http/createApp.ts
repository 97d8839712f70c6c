import express, { Express } from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import { IConfig } from "../../shared/config/IConfig";
import { NotFoundError } from "../../shared/errors/HttpError";
import { createBooksRouter } from "./routes/books.routes";
import { createCommentariesRouter } from "./routes/commentaries.routes";
import { apiLimiter } from "./middleware/rateLimit";
import { errorHandler } from "./middleware/ErrorHandler";

export const SERVICE_NAME = "commentary-api";
export const SERVICE_VERSION = "1.0.0";

/**
 * Build the HTTP application from the registered container
 */
export function createApp(config: IConfig): Express {
  const app = express();

  // Security middleware
  app.use(helmet());

  // CORS
  app.use(
    cors({
      origin: config.corsOrigins.includes("*") ? "*" : config.corsOrigins,
    }),
  );

  // Logging
  if (config.nodeEnv !== "test") {
    app.use(morgan(config.nodeEnv === "production" ? "combined" : "dev"));
  }

  // Body parsing
  app.use(express.json());

  if (config.enableRateLimiting) {
    app.use(apiLimiter);
  }

  // Health check
  app.get("/health", (_req, res) => {
    res.json({
      ok: true,
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
    });
  });

  app.use("/books", createBooksRouter());
  app.use("/commentaries", createCommentariesRouter());

  // 404 handler
  app.use((req, _res, next) => {
    next(new NotFoundError(`Route ${req.method} ${req.path}`));
  });

  // Centralized error handler (must be last)
  app.use(errorHandler);

  return app;
}
