import pg from 'pg';
import type { Pool as PgPool } from 'pg';
import { CONFIG } from '../config';
import { formatError } from '../utils/formatError';
import { logger } from '../utils/logger';

const { Pool } = pg;

export const APPLICATION_NAME = 'gridcycle';

/** The part of a pg pool the repositories use; pg-mem pools satisfy it too. */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: Record<string, unknown>[] }>;
}

let pool: PgPool | null = null;

export function getPool(): PgPool {
  if (!pool) {
    const created = new Pool({ connectionString: CONFIG.PG_URL, application_name: APPLICATION_NAME });
    // idle clients report dropped connections here
    created.on('error', (error) => {
      logger.error('pg_pool_idle_error', { event: 'pg_pool_idle_error', error: formatError(error) });
    });
    pool = created;
  }
  return pool;
}

export async function closePool() {
  if (pool) {
    const current = pool;
    pool = null;
    await current.end();
  }
}
