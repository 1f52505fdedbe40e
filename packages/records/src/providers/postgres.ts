import type { CallRecord } from '@callcoach/analytics';
import { createLogger } from '@callcoach/logger';
import { RecordSourceError, errorMessage } from '../errors.js';
import { RECORD_COLUMNS, normaliseRow } from '../normalize.js';
import type { RawRow, RecordSource } from '../types.js';

const logger = createLogger('records:postgres');

/** The slice of a pg Pool this source needs */
export interface QueryablePool {
  query(text: string): Promise<{ rows: RawRow[] }>;
  end(): Promise<void>;
}

export interface PostgresRecordSourceOptions {
  connectionString?: string;
  /** Table or `schema.table` holding the call rows */
  table?: string;
  /** Pre-built pool; skips the lazy pg import */
  pool?: QueryablePool;
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z_][A-Za-z0-9_]*)?$/;

const quoteIdentifier = (name: string): string =>
  name
    .split('.')
    .map((part) => `"${part}"`)
    .join('.');

/** Call records from a Postgres table with the export's column names */
export class PostgresRecordSource implements RecordSource {
  readonly name = 'postgres';
  private pool: QueryablePool | null;
  private connectionString?: string;
  private sql: string;

  constructor(options: PostgresRecordSourceOptions) {
    const table = options.table ?? 'call_records';
    if (!IDENTIFIER.test(table)) {
      throw new RecordSourceError('INVALID_CONFIG', `Invalid table name: ${table}`);
    }
    if (!options.pool && !options.connectionString) {
      throw new RecordSourceError('INVALID_CONFIG', 'PostgresRecordSource needs a connectionString or a pool');
    }
    this.pool = options.pool ?? null;
    this.connectionString = options.connectionString;
    this.sql = `SELECT ${RECORD_COLUMNS.join(', ')} FROM ${quoteIdentifier(table)} ORDER BY date`;
  }

  // lazy pg pool
  private async getPool(): Promise<QueryablePool> {
    try {
      if (!this.pool) {
        const { default: pg } = await import('pg');
        this.pool = new pg.Pool({ connectionString: this.connectionString, max: 2 });
      }
      return this.pool;
    } catch (err: unknown) {
      this.pool = null;
      throw new RecordSourceError('QUERY_FAILED', `Could not load pg: ${errorMessage(err)}`, { cause: err });
    }
  }

  async load(): Promise<CallRecord[]> {
    const pool = await this.getPool();
    try {
      const result = await pool.query(this.sql);
      const records = result.rows.map(normaliseRow);
      logger.debug('Loaded call records', { source: this.name, count: records.length });
      return records;
    } catch (err: unknown) {
      throw new RecordSourceError('QUERY_FAILED', `Query failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  async close(): Promise<void> {
    if (!this.pool) return;
    await this.pool.end();
    this.pool = null;
  }
}
