// Supabase client for the read-only API endpoints
import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type { Database } from '../types/database';

export type RouterSupabase = SupabaseClient<Database>;

let client: RouterSupabase | null = null;

/** Created on first call, so handlers that never read need no Supabase keys */
export function getSupabase(): RouterSupabase {
  if (client) return client;

  const url = process.env.SUPABASE_URL?.trim();
  const serviceKey = process.env.SUPABASE_SERVICE_ROLE_KEY?.trim();
  if (!url || !serviceKey) {
    throw new Error('Supabase reads need SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY');
  }

  client = createClient<Database>(url, serviceKey, {
    auth: { autoRefreshToken: false, persistSession: false },
  });
  return client;
}
