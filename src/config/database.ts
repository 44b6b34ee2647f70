import { createClient, SupabaseClient, type SupabaseClientOptions } from '@supabase/supabase-js';
import type { AppConfig } from './env';

const supabaseOptions: SupabaseClientOptions<'public'> = {
  auth: {
    autoRefreshToken: false,
    persistSession: false,
  },
  db: {
    schema: 'public',
  },
  global: {
    headers: {
      'x-client-info': 'smartnotes-backend',
    },
  },
};

export function createSupabaseClient(config: AppConfig): SupabaseClient {
  return createClient(config.supabase.url, config.supabase.serviceRoleKey, supabaseOptions);
}

/**
 * Client for end-user password sign-in. Sessions are issued against the
 * anon key so the service-role client never holds a user session.
 */
export function createSupabaseAnonClient(config: AppConfig): SupabaseClient {
  return createClient(config.supabase.url, config.supabase.anonKey, supabaseOptions);
}
