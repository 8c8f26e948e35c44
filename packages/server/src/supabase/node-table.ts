/**
 * Node table backed by Supabase
 *
 * Stores datanode details as JSON in the `datanodes` table.
 * @module @strata/server/supabase/node-table
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type {
  DatanodeDetails,
  DatanodePort,
  NodeTable,
  NodeTableEntry,
  NodeTableIterator,
  PersistenceOperation,
} from '@strata/shared';
import {
  PersistenceError,
  createServiceLogger,
  isOperationalState,
  isPlainObject,
  isPortName,
} from '@strata/shared';
import { getSupabaseServiceClient } from './client.js';

const logger = createServiceLogger({
  level: 'debug',
  service: 'strata-membership',
}, { component: 'supabase-node-table' });

export const DATANODES_TABLE = 'datanodes';

const DEFAULT_PAGE_SIZE = 500;

/**
 * Error shape PostgREST responses carry
 */
interface StoreError {
  message: string;
}

export interface SupabaseNodeTableOptions {
  client?: SupabaseClient;
  /** Rows fetched per request while iterating (default: 500) */
  pageSize?: number;
  tableName?: string;
}

function storeFailure(operation: PersistenceOperation, key: string | undefined, error: StoreError): PersistenceError {
  return PersistenceError.wrap(operation, key, new Error(error.message));
}

function parsePorts(value: unknown): DatanodePort[] | undefined {
  if (!Array.isArray(value)) {
    return undefined;
  }

  const ports: DatanodePort[] = [];
  for (const entry of value) {
    if (!isPlainObject(entry)) {
      return undefined;
    }
    const { name, value: port } = entry;
    if (!isPortName(name) || typeof port !== 'number') {
      return undefined;
    }
    ports.push({ name, value: port });
  }
  return ports;
}

/**
 * Read stored details back into shape; undefined when the JSON does not fit
 */
export function parseStoredDetails(value: unknown): DatanodeDetails | undefined {
  if (!isPlainObject(value)) {
    return undefined;
  }

  const {
    uuid,
    hostName,
    ipAddress,
    networkLocation,
    persistedOpState,
    persistedOpStateExpiryEpochSec,
    version,
    setupTime,
    revision,
  } = value;
  const ports = parsePorts(value.ports);

  if (
    typeof uuid !== 'string' ||
    typeof hostName !== 'string' ||
    typeof ipAddress !== 'string' ||
    typeof networkLocation !== 'string' ||
    !isOperationalState(persistedOpState) ||
    typeof persistedOpStateExpiryEpochSec !== 'number' ||
    typeof version !== 'string' ||
    typeof setupTime !== 'number' ||
    typeof revision !== 'string' ||
    !ports
  ) {
    return undefined;
  }

  return {
    uuid,
    hostName,
    ipAddress,
    ports,
    networkLocation,
    persistedOpState,
    persistedOpStateExpiryEpochSec,
    version,
    setupTime,
    revision,
  };
}

/**
 * NodeTable over a Supabase table of `{ id, details, updated_at }` rows
 */
export class SupabaseNodeTable implements NodeTable {
  private client: SupabaseClient;
  private readonly pageSize: number;
  private readonly tableName: string;

  constructor(options: SupabaseNodeTableOptions = {}) {
    this.client = options.client ?? getSupabaseServiceClient();
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.tableName = options.tableName ?? DATANODES_TABLE;

    if (!Number.isInteger(this.pageSize) || this.pageSize < 1) {
      throw new RangeError(`pageSize must be a positive integer, got ${this.pageSize}`);
    }
  }

  async get(id: string): Promise<DatanodeDetails | undefined> {
    const { data, error } = await this.client
      .from(this.tableName)
      .select('id, details')
      .eq('id', id)
      .maybeSingle();

    if (error) {
      throw storeFailure('get', id, error);
    }
    if (!data) {
      return undefined;
    }

    return this.toEntry(data, 'get').details;
  }

  async put(id: string, details: DatanodeDetails): Promise<void> {
    const { error } = await this.client
      .from(this.tableName)
      .upsert(
        { id, details, updated_at: new Date().toISOString() },
        { onConflict: 'id' },
      );

    if (error) {
      throw storeFailure('put', id, error);
    }
  }

  async delete(id: string): Promise<void> {
    const { error } = await this.client
      .from(this.tableName)
      .delete()
      .eq('id', id);

    if (error) {
      throw storeFailure('delete', id, error);
    }
  }

  /**
   * Page through the table in id order, `pageSize` rows per request
   */
  iterate(): NodeTableIterator {
    let offset = 0;
    let buffer: NodeTableEntry[] = [];
    let exhausted = false;
    let closed = false;

    const fetchPage = async (): Promise<void> => {
      const { data, error } = await this.client
        .from(this.tableName)
        .select('id, details')
        .order('id', { ascending: true })
        .range(offset, offset + this.pageSize - 1);

      if (error) {
        throw storeFailure('iterate', undefined, error);
      }

      const rows: unknown[] = data ?? [];
      buffer = rows.map(row => this.toEntry(row, 'iterate'));
      offset += rows.length;
      exhausted = rows.length < this.pageSize;
      logger.debug('Fetched node table page', { table: this.tableName, rows: rows.length, offset });
    };

    return {
      next: async () => {
        if (closed) {
          throw new PersistenceError('Iterator is closed', 'iterate');
        }
        if (buffer.length === 0 && !exhausted) {
          await fetchPage();
        }
        return buffer.shift();
      },
      close: async () => {
        closed = true;
        buffer = [];
      },
    };
  }

  private toEntry(row: unknown, operation: PersistenceOperation): NodeTableEntry {
    if (isPlainObject(row)) {
      const { id, details } = row;
      const parsed = parseStoredDetails(details);
      if (typeof id === 'string' && parsed) {
        return { id, details: parsed };
      }
      if (typeof id === 'string') {
        throw new PersistenceError(`Malformed row in ${this.tableName} for ${id}`, operation, id);
      }
    }
    throw new PersistenceError(`Malformed row in ${this.tableName}`, operation);
  }
}

/**
 * Create a Supabase node table
 */
export function createSupabaseNodeTable(options?: SupabaseNodeTableOptions): SupabaseNodeTable {
  return new SupabaseNodeTable(options);
}
