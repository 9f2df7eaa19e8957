import { createClient, SupabaseClient } from '@supabase/supabase-js';
import logger from '../utils/logger';
import { LedgerConfig } from '../config';

// Validate URL format to prevent crash
const isValidUrl = (url: string): boolean => {
    try {
        new URL(url);
        return true;
    } catch {
        return false;
    }
};

/**
 * Supabase client for snapshot persistence, or null when the environment
 * does not configure one (the keeper then keeps snapshots in memory).
 */
export function createSupabaseClient(config: Pick<LedgerConfig, 'supabaseUrl' | 'supabaseKey'>): SupabaseClient | null {
    const { supabaseUrl, supabaseKey } = config;
    if (!supabaseUrl || !supabaseKey) {
        logger.warn('[DB] SUPABASE_URL or SUPABASE_SERVICE_ROLE_KEY missing, snapshots stay in memory');
        return null;
    }
    if (!isValidUrl(supabaseUrl)) {
        logger.error(`[DB] SUPABASE_URL is not a valid URL: ${supabaseUrl}`);
        return null;
    }
    return createClient(supabaseUrl, supabaseKey, { auth: { persistSession: false } });
}
