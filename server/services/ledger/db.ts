import { readFile } from 'node:fs/promises';
import { Pool } from 'pg';
import { createLogger } from '../../../services/logger.js';

const log = createLogger('Database');

export interface QueryResultLike {
  rows: unknown[];
  rowCount: number | null;
}

/**
 * The slice of a pg Pool the ledger uses. Tests hand in a fake.
 */
export interface Queryable {
  query(sql: string, params?: unknown[]): Promise<QueryResultLike>;
}

export interface Database extends Queryable {
  close(): Promise<void>;
}

export function createPgDatabase(connectionString: string): Database {
  const pool = new Pool({ connectionString });

  pool.on('error', (err) => {
    log.error('Idle Postgres client error', err);
  });

  return {
    async query(sql, params = []) {
      const result = await pool.query(sql, params);
      return { rows: result.rows, rowCount: result.rowCount };
    },
    async close() {
      await pool.end();
    },
  };
}

const SCHEMA_URL = new URL('./schema.sql', import.meta.url);

export async function ensureSchema(db: Queryable): Promise<void> {
  const sql = await readFile(SCHEMA_URL, 'utf8');
  await db.query(sql);
  log.info('Ledger schema ensured');
}
