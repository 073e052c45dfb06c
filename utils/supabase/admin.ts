import { createClient as createSb, type SupabaseClient } from '@supabase/supabase-js';
import { getEnv } from '@/utils/env';

// Server-side client using the service role; created once per process and reused by every request
let adminClient: SupabaseClient | null = null;

export function createAdminClient(): SupabaseClient {
  if (adminClient) return adminClient;
  const { NEXT_PUBLIC_SUPABASE_URL: url, SUPABASE_SERVICE_ROLE_KEY: serviceKey } = getEnv();
  adminClient = createSb(url, serviceKey, { auth: { persistSession: false } });
  return adminClient;
}
