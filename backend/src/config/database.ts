import { createClient, type SupabaseClient } from '@supabase/supabase-js';

export type StorageDriver = 'memory' | 'supabase';

export interface DatabaseConfig {
  driver: StorageDriver;
  supabaseUrl: string | null;
  supabaseServiceRoleKey: string | null;
}

export function loadDatabaseConfig(): DatabaseConfig {
  const driver = (process.env.STORAGE_DRIVER || 'memory').trim().toLowerCase();
  if (driver !== 'memory' && driver !== 'supabase') {
    throw new Error(`Invalid STORAGE_DRIVER value "${driver}". Must be "memory" or "supabase".`);
  }

  return {
    driver,
    supabaseUrl: process.env.SUPABASE_URL || null,
    supabaseServiceRoleKey: process.env.SUPABASE_SERVICE_ROLE_KEY || null,
  };
}

/**
 * Server-side Supabase client. Only needed when the supabase driver is used.
 */
export function createDatabaseClient(config: DatabaseConfig): SupabaseClient {
  if (!config.supabaseUrl || !config.supabaseServiceRoleKey) {
    throw new Error('SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required for the supabase storage driver');
  }

  return createClient(config.supabaseUrl, config.supabaseServiceRoleKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
}
