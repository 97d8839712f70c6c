import {
  createClient,
  SupabaseClient as SupabaseClientType,
} from "@supabase/supabase-js";
import { injectable, inject } from "tsyringe";
import { IConfig } from "../../../shared/config/IConfig";
import { TYPES } from "../../../di/types";

/**
 * Supabase Client Wrapper
 *
 * Connects with the service role key, since ingestion writes through
 * load_commentary
 */
@injectable()
export class SupabaseClient {
  private client: SupabaseClientType;

  constructor(@inject(TYPES.Config) config: IConfig) {
    this.client = createClient(config.supabaseUrl, config.supabaseServiceKey, {
      auth: {
        persistSession: false, // Server-side doesn't need session persistence
        autoRefreshToken: false,
      },
      db: {
        schema: "public",
      },
      global: {
        headers: {
          "X-Client-Info": "commentary-api",
        },
      },
    });
  }

  getClient(): SupabaseClientType {
    return this.client;
  }
}
