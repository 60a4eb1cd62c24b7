/**
 * SQLite storage sink
 * Tables are created on first insert and may hold several states. The UNIQUE
 * constraint on (state_code, voter_id) settles races between concurrent writers.
 */

import Database from 'better-sqlite3';
import type { CanonicalRecord, CrowdedAddress, ImportScope, SinkInsertResult, StorageSink } from '@rollcall/types';
import { logger as defaultLogger, toError } from '@rollcall/data-ingestion';
import type { Logger } from '@rollcall/data-ingestion';
import { ADDRESS_COLUMNS, VOTER_COLUMNS, assertValidTableName, isValidTableName } from '../schema';

export const DEFAULT_CROWDED_THRESHOLD = 10;

const TRANSIENT_CODES = new Set(['SQLITE_BUSY', 'SQLITE_LOCKED']);

interface AddressGroupRow {
  street_number: string;
  street_name: string;
  unit: string;
  city: string;
  zip: string;
  voter_count: number;
  voter_ids: string;
}

type InsertStatement = Database.Statement<[Record<string, string>]>;

export interface SqliteStorageSinkOptions {
  logger?: Logger;
  busyTimeoutMs?: number;
}

export class SqliteStorageSink implements StorageSink {
  private readonly db: Database.Database;
  private readonly logger: Logger;
  private readonly insertStatements = new Map<string, InsertStatement>();

  constructor(dbPathOrDatabase: string | Database.Database, options: SqliteStorageSinkOptions = {}) {
    this.db = typeof dbPathOrDatabase === 'string' ? new Database(dbPathOrDatabase) : dbPathOrDatabase;
    this.logger = options.logger ?? defaultLogger.child('sqlite-sink');

    this.db.pragma('journal_mode = WAL');
    this.db.pragma(`busy_timeout = ${options.busyTimeoutMs ?? 5000}`);
  }

  async exists(scope: ImportScope): Promise<boolean> {
    return isValidTableName(scope.table) && this.tableExists(scope.table);
  }

  // Ids committed for the scope's state only
  async existingVoterIds(scope: ImportScope): Promise<Set<string>> {
    const table = assertValidTableName(scope.table);
    const ids = new Set<string>();
    if (!this.tableExists(table)) return ids;

    const statement = this.db.prepare<[string], { voter_id: string }>(
      `SELECT voter_id FROM "${table}" WHERE state_code = ?`
    );
    for (const row of statement.iterate(scope.state_code)) {
      ids.add(row.voter_id);
    }
    return ids;
  }

  async insert(scope: ImportScope, record: CanonicalRecord): Promise<SinkInsertResult> {
    try {
      const statement = this.insertStatementFor(assertValidTableName(scope.table));
      statement.run(this.toParams(record));
      return { status: 'inserted' };
    } catch (error) {
      if (error instanceof Database.SqliteError) {
        if (error.code === 'SQLITE_CONSTRAINT_UNIQUE') {
          return { status: 'duplicate' };
        }
        return { status: 'error', error, transient: TRANSIENT_CODES.has(error.code) };
      }
      return { status: 'error', error: toError(error), transient: false };
    }
  }

  /**
   * Addresses shared by at least `threshold` voters, most crowded first
   */
  addressesWithManyVoters(scope: ImportScope, threshold: number = DEFAULT_CROWDED_THRESHOLD): CrowdedAddress[] {
    const table = assertValidTableName(scope.table);
    const columns = ADDRESS_COLUMNS.join(', ');

    const rows = this.db.prepare<[string, number], AddressGroupRow>(`
      SELECT ${columns}, COUNT(*) AS voter_count, GROUP_CONCAT(voter_id, char(31)) AS voter_ids
      FROM "${table}"
      WHERE state_code = ? AND street_name != ''
      GROUP BY ${columns}
      HAVING COUNT(*) >= ?
      ORDER BY voter_count DESC, street_name, street_number, unit
    `).all(scope.state_code, threshold);

    return rows.map(row => ({
      street_number: row.street_number,
      street_name: row.street_name,
      unit: row.unit,
      city: row.city,
      zip: row.zip,
      voter_count: row.voter_count,
      voter_ids: row.voter_ids.split(String.fromCharCode(31)).sort()
    }));
  }

  close(): void {
    this.db.close();
  }

  private tableExists(table: string): boolean {
    const row = this.db
      .prepare<[string], { name: string }>(`SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?`)
      .get(table);
    return row !== undefined;
  }

  private insertStatementFor(table: string): InsertStatement {
    const cached = this.insertStatements.get(table);
    if (cached) return cached;

    this.ensureTable(table);
    const statement = this.db.prepare<Record<string, string>>(
      `INSERT INTO "${table}" (${VOTER_COLUMNS.join(', ')}) VALUES (${VOTER_COLUMNS.map(column => `@${column}`).join(', ')})`
    );
    this.insertStatements.set(table, statement);
    return statement;
  }

  private ensureTable(table: string): void {
    const columns = VOTER_COLUMNS
      .filter(column => column !== 'voter_id')
      .map(column => `${column} TEXT NOT NULL DEFAULT ''`)
      .join(',\n        ');

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS "${table}" (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        voter_id TEXT NOT NULL,
        ${columns},
        imported_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
        UNIQUE (state_code, voter_id)
      );
      CREATE INDEX IF NOT EXISTS "${table}_address_idx" ON "${table}" (${ADDRESS_COLUMNS.join(', ')});
    `);

    this.logger.debug('Ensured voter table', { table });
  }

  private toParams(record: CanonicalRecord): Record<string, string> {
    const params: Record<string, string> = {};
    for (const column of VOTER_COLUMNS) {
      params[column] = record[column];
    }
    return params;
  }
}

export default SqliteStorageSink;
