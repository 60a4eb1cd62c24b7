// Supabase client configuration for voter imports
// The import writes with the service role, so RLS does not filter inserts

import { createClient } from '@supabase/supabase-js'
import type { SupabaseClient } from '@supabase/supabase-js'

export interface SupabaseConnectionConfig {
  url: string
  serviceRoleKey: string
}

// Read connection settings from the environment
export const supabaseConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): SupabaseConnectionConfig => {
  const url = env.SUPABASE_URL
  const serviceRoleKey = env.SUPABASE_SERVICE_ROLE_KEY

  if (!url) {
    throw new Error('Missing env var: SUPABASE_URL')
  }

  if (!serviceRoleKey) {
    throw new Error('Missing env var: SUPABASE_SERVICE_ROLE_KEY')
  }

  return { url, serviceRoleKey }
}

// Admin client for server-side imports
export const createAdminClient = (config: SupabaseConnectionConfig): SupabaseClient => {
  return createClient(config.url, config.serviceRoleKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
    db: {
      schema: 'public',
    },
    global: {
      headers: {
        'X-Client-Info': 'rollcall-voter-ingest'
      }
    }
  })
}
