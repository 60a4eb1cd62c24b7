// Database package exports: storage sinks for canonical voter records

// Export clients
export { createAdminClient, supabaseConfigFromEnv } from './client'
export type { SupabaseConnectionConfig } from './client'

// Export table layout helpers
export {
  VOTER_COLUMNS,
  ADDRESS_COLUMNS,
  VoterRowSchema,
  defaultTableName,
  isValidTableName,
  assertValidTableName
} from './schema'
export type { VoterRow } from './schema'

// Export sinks
export { SqliteStorageSink, DEFAULT_CROWDED_THRESHOLD } from './sinks/SqliteStorageSink'
export type { SqliteStorageSinkOptions } from './sinks/SqliteStorageSink'
export { SupabaseStorageSink, DEFAULT_PAGE_SIZE } from './sinks/SupabaseStorageSink'
export type { SupabaseStorageSinkOptions } from './sinks/SupabaseStorageSink'
