import { createAdminClient } from '@/utils/supabase/admin';
import { SupabaseStore } from './supabase';
import type { DataStore } from './types';

export type { DataStore } from './types';

let store: DataStore | null = null;

/** The process-wide store, built on first use from the Supabase admin client. */
export function getStore(): DataStore {
  if (!store) store = new SupabaseStore(createAdminClient());
  return store;
}
