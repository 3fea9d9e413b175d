import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { getConfig } from '../config';

let supabaseInstance: SupabaseClient | null = null;

export function getSupabaseClient(): SupabaseClient {
  if (!supabaseInstance) {
    const { supabaseUrl, supabaseKey } = getConfig();

    if (!supabaseUrl || !supabaseKey) {
      throw new Error('Missing Supabase credentials (SUPABASE_URL, SUPABASE_ANON_KEY)');
    }

    supabaseInstance = createClient(supabaseUrl, supabaseKey, {
      auth: { persistSession: false, autoRefreshToken: false },
    });
  }

  return supabaseInstance;
}

/** Drop the cached client so the next call rereads configuration */
export function resetSupabaseClient(): void {
  supabaseInstance = null;
}
