import { createClient, type SupabaseClient } from '@supabase/supabase-js'
import type { PipelineConfig } from '@/lib/config'

/**
 * Server-side Supabase client using the service role key
 */
export function createServiceClient(config: Pick<PipelineConfig, 'supabaseUrl' | 'supabaseServiceKey'>): SupabaseClient {
  if (!config.supabaseUrl || !config.supabaseServiceKey) {
    throw new Error('Supabase is not configured. Set NEXT_PUBLIC_SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY.')
  }

  return createClient(config.supabaseUrl, config.supabaseServiceKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  })
}
