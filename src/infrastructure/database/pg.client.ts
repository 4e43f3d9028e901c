import pg from 'pg';
import type { Pool, QueryResult, QueryResultRow } from 'pg';

import { config } from '@config/env.config.js';

import { logger } from '@utils/logger.js';

let pool: Pool | null = null;

export function getPostgresPool(): Pool {
  if (!pool) {
    pool = new pg.Pool({ connectionString: config.DATABASE_URL, max: 10 });
    pool.on('error', (err: Error) => {
      logger.error('[pg] idle client error', { message: err.message });
    });
  }
  return pool;
}

export async function postgresQuery<T extends QueryResultRow>(
  text: string,
  params: unknown[] = [],
): Promise<QueryResult<T>> {
  return getPostgresPool().query<T>(text, params);
}

export async function closePostgresPool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
