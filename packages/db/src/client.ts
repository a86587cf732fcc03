import {
  createClient,
  type SupabaseClient,
  type SupabaseClientOptions,
} from "@supabase/supabase-js";
import { createEnvReader, type EnvReader } from "../../core/src/config/env.ts";
import { assertRequiredEnv, DB_ERROR_CODES, DbError } from "./errors.ts";

export type DbClient = SupabaseClient;

export type DbCreateClientImpl = (
  supabaseUrl: string,
  supabaseKey: string,
  options: SupabaseClientOptions<"public">,
) => DbClient;

export type CreateDbClientParams = {
  read?: EnvReader;
  createClientImpl?: DbCreateClientImpl;
  clientOptions?: SupabaseClientOptions<"public">;
};

/** Service-role client; the population source reads across all profiles. */
export function createServiceRoleDbClient(params: CreateDbClientParams = {}): DbClient {
  const read = params.read ?? createEnvReader();
  const supabaseUrl = assertRequiredEnv("SUPABASE_URL", read("SUPABASE_URL"));
  const serviceRoleKey = assertRequiredEnv(
    "SUPABASE_SERVICE_ROLE_KEY",
    read("SUPABASE_SERVICE_ROLE_KEY"),
  );

  try {
    new URL(supabaseUrl);
  } catch (error) {
    throw new DbError(DB_ERROR_CODES.INVALID_ENV, "SUPABASE_URL must be an absolute URL.", {
      context: { variable: "SUPABASE_URL" },
      cause: error,
    });
  }

  const createClientImpl: DbCreateClientImpl = params.createClientImpl ??
    ((url, key, options) => createClient(url, key, options));
  try {
    return createClientImpl(supabaseUrl, serviceRoleKey, {
      auth: {
        persistSession: false,
        autoRefreshToken: false,
        detectSessionInUrl: false,
      },
      ...params.clientOptions,
    });
  } catch (error) {
    throw DbError.fromUnknown({
      code: DB_ERROR_CODES.CLIENT_INIT_FAILED,
      message: "Unable to create Supabase client.",
      error,
    });
  }
}
