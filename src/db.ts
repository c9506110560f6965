/**
 * Supabase client factory.
 * Server-side only: uses the service-role key and never persists a session.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';

export function createSupabaseClient(
  url: string,
  serviceRoleKey: string,
  fetchFn?: typeof fetch
): SupabaseClient {
  return createClient(url, serviceRoleKey, {
    auth: { persistSession: false, autoRefreshToken: false },
    ...(fetchFn ? { global: { fetch: fetchFn } } : {}),
  });
}
