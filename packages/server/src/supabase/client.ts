/**
 * Supabase Client Configuration
 *
 * Initializes the service role client the node table writes through.
 * @module @strata/server/supabase/client
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { ValidationError, type ConfigEnv, type ValidationErrorDetail } from '@strata/shared';

/**
 * Environment variable names for Supabase configuration
 */
const ENV_SUPABASE_URL = 'SUPABASE_URL';
const ENV_SUPABASE_SERVICE_ROLE_KEY = 'SUPABASE_SERVICE_ROLE_KEY';

/**
 * Default local Supabase URL (for development)
 */
const LOCAL_SUPABASE_URL = 'http://127.0.0.1:54321';

export interface SupabaseConfig {
  url: string;
  serviceRoleKey: string;
}

/**
 * Client construction options
 */
export interface SupabaseClientOptions {
  /** Replaces the global fetch, e.g. with an in-process fake */
  fetch?: typeof fetch;
}

/**
 * Retrieves the Supabase configuration from environment variables.
 * The URL falls back to the local development stack; the key has no default.
 */
export function getSupabaseConfig(env: ConfigEnv = process.env): SupabaseConfig {
  return {
    url: env[ENV_SUPABASE_URL] ?? LOCAL_SUPABASE_URL,
    serviceRoleKey: env[ENV_SUPABASE_SERVICE_ROLE_KEY] ?? '',
  };
}

/**
 * Validates that a usable Supabase configuration is present
 * @throws {ValidationError}
 */
export function validateSupabaseConfig(config: SupabaseConfig): void {
  const errors: ValidationErrorDetail[] = [];

  if (config.url.trim().length === 0) {
    errors.push({ field: ENV_SUPABASE_URL, message: `Missing required environment variable: ${ENV_SUPABASE_URL}` });
  } else if (!URL.canParse(config.url)) {
    errors.push({ field: ENV_SUPABASE_URL, message: `${ENV_SUPABASE_URL} is not a valid URL` });
  }

  if (config.serviceRoleKey.trim().length === 0) {
    errors.push({
      field: ENV_SUPABASE_SERVICE_ROLE_KEY,
      message: `Missing required environment variable: ${ENV_SUPABASE_SERVICE_ROLE_KEY}`,
    });
  }

  if (errors.length > 0) {
    throw ValidationError.multiple(errors);
  }
}

/**
 * Creates a Supabase client with the service role key
 * Use for administrative operations that bypass RLS
 *
 * WARNING: Only use server-side, never expose to clients
 */
export function createSupabaseServiceClient(
  config: SupabaseConfig = getSupabaseConfig(),
  options: SupabaseClientOptions = {},
): SupabaseClient {
  validateSupabaseConfig(config);
  return createClient(config.url, config.serviceRoleKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false, // Server-side, no localStorage
      detectSessionInUrl: false,
    },
    global: options.fetch ? { fetch: options.fetch } : undefined,
  });
}

let _supabaseServiceClient: SupabaseClient | null = null;

/**
 * Gets or creates the Supabase service role client
 */
export function getSupabaseServiceClient(): SupabaseClient {
  if (!_supabaseServiceClient) {
    _supabaseServiceClient = createSupabaseServiceClient();
  }
  return _supabaseServiceClient;
}

/**
 * Resets the singleton client (useful for testing)
 */
export function resetSupabaseClients(): void {
  _supabaseServiceClient = null;
}
