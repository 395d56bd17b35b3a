/**
 * Postwatch — Supabase Client
 *
 * Service-role client for the archive table. Created on first use so that
 * deployments without Supabase never touch it.
 */

import { createClient, SupabaseClient } from '@supabase/supabase-js';

// ============================================================
// CLIENT
// ============================================================

let adminClient: SupabaseClient | null = null;

/**
 * Admin client for background writes. Bypasses Row Level Security.
 */
export function getAdminClient(url: string, serviceRoleKey: string): SupabaseClient {
  if (!adminClient) {
    adminClient = createClient(url, serviceRoleKey, {
      auth: {
        autoRefreshToken: false,
        persistSession: false,
      },
    });
  }
  return adminClient;
}

// ============================================================
// UTILITY FUNCTIONS
// ============================================================

/**
 * Handle Supabase errors consistently
 */
export function handleSupabaseError(error: unknown): Error {
  if (error && typeof error === 'object' && 'message' in error) {
    const code = 'code' in error && error.code ? ` (code: ${String(error.code)})` : '';
    return new Error(`Supabase error: ${String(error.message)}${code}`);
  }
  return new Error('Unknown Supabase error');
}

// ============================================================
// DATABASE TYPES
// ============================================================

export interface ArchiveEventRow {
  kind: string;
  item_id: string;
  account_handle: string;
  payload: Record<string, unknown>;
  recorded_at: string;
}
