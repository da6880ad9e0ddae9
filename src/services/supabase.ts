import { createClient, SupabaseClient } from '@supabase/supabase-js';
import config from '../config';
import logger from '../utils/logger';
import { HttpError } from '../middleware/error.middleware';

let client: SupabaseClient | undefined;

export interface SupabaseCredentials {
  url: string;
  serviceKey: string;
}

export function createSupabaseClient(credentials: SupabaseCredentials, fetchImpl?: typeof fetch): SupabaseClient {
  if (!credentials.url || !credentials.serviceKey) {
    throw new HttpError(500, 'Missing Supabase credentials');
  }

  return createClient(credentials.url, credentials.serviceKey, {
    auth: { persistSession: false, autoRefreshToken: false },
    ...(fetchImpl && { global: { fetch: fetchImpl } }),
  });
}

/**
 * Клиент создаётся при первом запросе: без ключей падает только эндпоинт, а не весь сервер.
 */
export function getSupabaseClient(credentials: SupabaseCredentials = config.supabase): SupabaseClient {
  if (client) return client;

  client = createSupabaseClient(credentials);
  logger.info('Supabase client initialized');
  return client;
}
