/**
 * Supabase storage sink
 * Writes voter rows through PostgREST. Tables must already exist with a UNIQUE
 * constraint on (state_code, voter_id); Postgres reports violations as 23505.
 */

import type { PostgrestError, SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { CanonicalRecord, ImportScope, SinkInsertResult, StorageSink } from '@rollcall/types';
import { createError, getErrorMessage, logger as defaultLogger, toError } from '@rollcall/data-ingestion';
import type { Logger } from '@rollcall/data-ingestion';
import { VoterRowSchema, assertValidTableName } from '../schema';

export const DEFAULT_PAGE_SIZE = 1000;

const UNIQUE_VIOLATION = '23505';
const UNDEFINED_TABLE_CODES = new Set(['42P01', 'PGRST205']);
// Connection loss, serialization failure, too many connections
const TRANSIENT_CODES = new Set(['08000', '08001', '08003', '08006', '40001', '40P01', '53300', '57P01']);

const VoterIdPageSchema = z.array(z.object({ voter_id: z.string() }));

export interface SupabaseStorageSinkOptions {
  pageSize?: number;
  logger?: Logger;
}

function isTransient(error: PostgrestError, status: number): boolean {
  return status === 0 || status >= 500 || TRANSIENT_CODES.has(error.code);
}

export class SupabaseStorageSink implements StorageSink {
  private readonly client: SupabaseClient;
  private readonly pageSize: number;
  private readonly logger: Logger;

  constructor(client: SupabaseClient, options: SupabaseStorageSinkOptions = {}) {
    this.client = client;
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.logger = options.logger ?? defaultLogger.child('supabase-sink');
  }

  async exists(scope: ImportScope): Promise<boolean> {
    const table = assertValidTableName(scope.table);
    const { error } = await this.client
      .from(table)
      .select('voter_id', { count: 'exact', head: true });

    if (!error) return true;
    if (UNDEFINED_TABLE_CODES.has(error.code)) return false;
    throw createError(`Failed to check table ${table}: ${error.message}`, error);
  }

  async existingVoterIds(scope: ImportScope): Promise<Set<string>> {
    const table = assertValidTableName(scope.table);
    const ids = new Set<string>();

    for (let from = 0; ; from += this.pageSize) {
      const { data, error } = await this.client
        .from(table)
        .select('voter_id')
        .eq('state_code', scope.state_code)
        .order('voter_id', { ascending: true })
        .range(from, from + this.pageSize - 1);

      if (error) {
        if (UNDEFINED_TABLE_CODES.has(error.code)) return ids;
        throw createError(`Failed to read voter ids from ${table}: ${error.message}`, error);
      }

      const page = VoterIdPageSchema.parse(data ?? []);
      for (const row of page) {
        ids.add(row.voter_id);
      }
      if (page.length < this.pageSize) break;
    }

    this.logger.debug('Loaded existing voter ids', { table, count: ids.size });
    return ids;
  }

  async insert(scope: ImportScope, record: CanonicalRecord): Promise<SinkInsertResult> {
    try {
      const table = assertValidTableName(scope.table);
      const payload = VoterRowSchema.parse(record);
      const { error, status } = await this.client.from(table).insert(payload);

      if (!error) return { status: 'inserted' };
      if (error.code === UNIQUE_VIOLATION) return { status: 'duplicate' };

      return {
        status: 'error',
        error: createError(`Insert into ${table} failed: ${error.message}`, error),
        transient: isTransient(error, status)
      };
    } catch (error) {
      this.logger.debug('Insert threw', { voterId: record.voter_id, error: getErrorMessage(error) });
      return { status: 'error', error: toError(error), transient: false };
    }
  }
}

export default SupabaseStorageSink;
