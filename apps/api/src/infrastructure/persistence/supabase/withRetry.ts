import type { PostgrestError } from "@supabase/supabase-js";
import { ILogger } from "../../logging/ILogger";

/**
 * Database Error Types
 */
export class DatabaseError extends Error {
  constructor(
    message: string,
    public code?: string,
    public details?: string,
    public hint?: string,
  ) {
    super(message);
    this.name = "DatabaseError";
  }
}

export class ConnectionError extends DatabaseError {
  constructor(message: string, details?: string) {
    super(message, "CONNECTION_ERROR", details);
    this.name = "ConnectionError";
  }
}

export class QueryError extends DatabaseError {
  constructor(message: string, code?: string, details?: string, hint?: string) {
    super(message, code, details, hint);
    this.name = "QueryError";
  }
}

/**
 * Error fields PostgREST reports alongside a failed query
 */
export type PostgrestErrorFields = Pick<
  PostgrestError,
  "code" | "message" | "details" | "hint"
>;

export interface QueryResult<T> {
  data: T | null;
  error: PostgrestErrorFields | null;
}

/**
 * Retry configuration options
 */
export interface RetryOptions {
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  retryableErrors?: string[];
}

const DEFAULT_RETRY_OPTIONS: Required<RetryOptions> = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 10000,
  backoffMultiplier: 2,
  retryableErrors: [
    "PGRST301", // Connection error
    "PGRST302", // Connection timeout
    "57P03", // Cannot connect now
    "08006", // Connection failure
    "08001", // Unable to connect
    "08003", // Connection does not exist
    "08004", // Connection rejected
    "53300", // Too many connections
  ],
};

function isRetryableError(
  error: PostgrestErrorFields | Error,
  retryableErrors: string[],
): boolean {
  if ("code" in error && typeof error.code === "string" && error.code) {
    return retryableErrors.includes(error.code);
  }

  // Network errors are retryable
  return (
    error.message.includes("fetch failed") ||
    error.message.includes("ECONNREFUSED")
  );
}

/**
 * Exponential backoff delay with +/-12.5% jitter
 */
function calculateDelay(
  attempt: number,
  initialDelay: number,
  maxDelay: number,
  multiplier: number,
): number {
  const exponentialDelay = initialDelay * Math.pow(multiplier, attempt);
  const cappedDelay = Math.min(exponentialDelay, maxDelay);
  const jitter = cappedDelay * 0.25 * (Math.random() - 0.5);
  return Math.floor(cappedDelay + jitter);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute database operation with automatic retry logic
 *
 * @example
 * ```typescript
 * const rows = await withRetry(
 *   async () => await client.from("commentaries").select("*"),
 *   logger,
 * );
 * ```
 */
export async function withRetry<T>(
  operation: () => Promise<QueryResult<T>>,
  logger: ILogger,
  options: RetryOptions = {},
): Promise<T> {
  const config = { ...DEFAULT_RETRY_OPTIONS, ...options };
  let lastError: Error | PostgrestErrorFields | null = null;

  for (let attempt = 0; attempt < config.maxRetries; attempt++) {
    const isLastAttempt = attempt === config.maxRetries - 1;
    let result: QueryResult<T>;

    try {
      result = await operation();
    } catch (error) {
      // Thrown rather than returned: network issues and the like
      if (!(error instanceof Error)) {
        throw error;
      }
      if (!isRetryableError(error, config.retryableErrors)) {
        throw error;
      }

      lastError = error;
      logger.warn("[DB] Network/connection error, will retry", {
        message: error.message,
        attempt: attempt + 1,
      });
      if (!isLastAttempt) {
        await sleep(
          calculateDelay(
            attempt,
            config.initialDelayMs,
            config.maxDelayMs,
            config.backoffMultiplier,
          ),
        );
      }
      continue;
    }

    const { data, error } = result;

    if (error) {
      if (!isRetryableError(error, config.retryableErrors)) {
        logger.error("[DB] Non-retryable error encountered", undefined, {
          code: error.code,
          message: error.message,
          attempt: attempt + 1,
        });
        throw new QueryError(
          error.message,
          error.code,
          error.details,
          error.hint,
        );
      }

      lastError = error;
      logger.warn("[DB] Retryable error, will retry", {
        code: error.code,
        attempt: attempt + 1,
        maxRetries: config.maxRetries,
      });

      if (!isLastAttempt) {
        const delay = calculateDelay(
          attempt,
          config.initialDelayMs,
          config.maxDelayMs,
          config.backoffMultiplier,
        );
        logger.debug(`[DB Retry] Waiting ${delay}ms before retry`);
        await sleep(delay);
      }
      continue;
    }

    if (data === null) {
      throw new QueryError("No data returned and no error reported");
    }

    if (attempt > 0) {
      logger.info("[DB] Operation succeeded after retry", {
        attempt: attempt + 1,
      });
    }
    return data;
  }

  logger.error("[DB] Max retries exceeded", undefined, {
    lastError: lastError?.message,
    maxRetries: config.maxRetries,
  });
  throw new ConnectionError(
    `Database operation failed after ${config.maxRetries} attempts`,
    lastError?.message,
  );
}
