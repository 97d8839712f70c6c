import { CommentaryStoreDriver, IConfig } from "./IConfig";

const STORE_DRIVERS: readonly CommentaryStoreDriver[] = ["memory", "supabase"];

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

function parseStoreDriver(value: string | undefined): CommentaryStoreDriver {
  const driver = (value || "memory").trim().toLowerCase();
  const match = STORE_DRIVERS.find((candidate) => candidate === driver);
  if (!match) {
    throw new Error(
      `Invalid COMMENTARY_STORE: ${value} (expected ${STORE_DRIVERS.join(" or ")})`,
    );
  }
  return match;
}

function parseList(value: string | undefined, fallback: string[]): string[] {
  if (!value) {
    return fallback;
  }
  return value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

/**
 * Environment-based configuration implementation
 *
 * Reads configuration from process.env and validates on startup. Registered
 * through a factory so tests can hand in their own environment.
 */
export class EnvConfig implements IConfig {
  readonly port: number;
  readonly nodeEnv: string;
  readonly logLevel: string;
  readonly corsOrigins: string[];

  readonly commentaryStore: CommentaryStoreDriver;
  readonly supabaseUrl: string;
  readonly supabaseServiceKey: string;

  readonly manifestDir: string | undefined;

  readonly enableRateLimiting: boolean;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.port = parseInt(env.PORT || "3001", 10);
    this.nodeEnv = env.NODE_ENV || "development";
    this.logLevel = (env.LOG_LEVEL || "info").toLowerCase();
    this.corsOrigins = parseList(env.CORS_ORIGINS, ["*"]);

    this.commentaryStore = parseStoreDriver(env.COMMENTARY_STORE);
    this.supabaseUrl = env.SUPABASE_URL || "";
    this.supabaseServiceKey = env.SUPABASE_SERVICE_ROLE_KEY || "";

    this.manifestDir = env.MANIFEST_DIR || undefined;

    this.enableRateLimiting = env.ENABLE_RATE_LIMITING !== "false";

    this.validate();
  }

  validate(): void {
    if (this.commentaryStore === "supabase") {
      const required = [
        { name: "SUPABASE_URL", value: this.supabaseUrl },
        // load_commentary writes past row level security
        { name: "SUPABASE_SERVICE_ROLE_KEY", value: this.supabaseServiceKey },
      ];

      const missing = required.filter((r) => !r.value);

      if (missing.length > 0) {
        throw new Error(
          `Missing required environment variables: ${missing.map((m) => m.name).join(", ")}`,
        );
      }
    }

    if (!Number.isInteger(this.port) || this.port < 1 || this.port > 65535) {
      throw new Error(`Invalid PORT: ${this.port}`);
    }

    if (!LOG_LEVELS.includes(this.logLevel)) {
      throw new Error(`Invalid LOG_LEVEL: ${this.logLevel}`);
    }
  }
}
