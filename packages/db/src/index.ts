export { DB_ERROR_CODES, DbError, sanitizeForError, assertRequiredEnv, type DbErrorCode } from "./errors.ts";
export {
  createServiceRoleDbClient,
  type CreateDbClientParams,
  type DbClient,
  type DbCreateClientImpl,
} from "./client.ts";
export {
  createSupabaseProfileSource,
  loadProfilePopulation,
  mapProfileRow,
} from "./queries/profile-population.ts";
