import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { CarbonTrackerConfig } from './config';
import { ConfigurationError } from './errors';

export function createSupabaseClient(config: CarbonTrackerConfig): SupabaseClient {
  if (!config.supabaseUrl || !config.supabaseAnonKey) {
    throw new ConfigurationError('Missing Supabase environment variables');
  }

  return createClient(config.supabaseUrl, config.supabaseAnonKey, {
    auth: { persistSession: false },
  });
}
