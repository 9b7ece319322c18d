import { Pool } from 'pg';
import { DbConfig } from './config';
import logger from './logger';

export type SqlRow = Record<string, unknown>;

export interface SqlClient {
  query(text: string, params?: unknown[]): Promise<{ rows: SqlRow[] }>;
}

export function createPool(db: DbConfig): Pool {
  const pool = new Pool({
    host: db.host,
    port: db.port,
    user: db.user,
    password: db.password,
    database: db.database,
  });
  // errors on idle clients surface here, not on a query
  pool.on('error', (err) => {
    logger.error({ err }, '[db] idle client error');
  });
  return pool;
}

async function withTimeout<T>(work: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error('DB query timed out')), timeoutMs);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export function createSqlClient(pool: Pool, queryTimeoutMs: number): SqlClient {
  return {
    async query(text, params) {
      try {
        const result = await withTimeout(pool.query(text, params), queryTimeoutMs);
        return { rows: result.rows };
      } catch (err) {
        logger.error({ err }, '[db] query failed');
        throw err;
      }
    },
  };
}
