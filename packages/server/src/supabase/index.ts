/**
 * Supabase module
 * @module @strata/server/supabase
 */

export {
  createSupabaseServiceClient,
  getSupabaseConfig,
  getSupabaseServiceClient,
  resetSupabaseClients,
  validateSupabaseConfig,
} from './client.js';

export type { SupabaseClientOptions, SupabaseConfig } from './client.js';

export {
  DATANODES_TABLE,
  SupabaseNodeTable,
  createSupabaseNodeTable,
  parseStoredDetails,
} from './node-table.js';

export type { SupabaseNodeTableOptions } from './node-table.js';
