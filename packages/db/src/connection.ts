import { Pool, PoolClient, PoolConfig, QueryResult, QueryResultRow } from 'pg';

const SLOW_QUERY_MS = 100;

let pool: Pool | null = null;

function poolConfig(): PoolConfig {
  return {
    connectionString: process.env.DATABASE_URL,
    max: process.env.NODE_ENV === 'production' ? 20 : 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  };
}

export function getPool(): Pool {
  if (!pool) {
    pool = new Pool(poolConfig());
    pool.on('error', (err) => {
      console.error('Unexpected error on idle client', err);
    });
  }
  return pool;
}

export type Queryable = Pool | PoolClient;

/**
 * Runs a statement on the shared pool, or on `db` when given (e.g. a client inside a
 * transaction), and warns when it is slow.
 */
export async function query<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[],
  db: Queryable = getPool()
): Promise<QueryResult<T>> {
  const start = Date.now();
  const res = await db.query<T>(text, params);
  const duration = Date.now() - start;

  if (duration > SLOW_QUERY_MS) {
    console.warn('Slow query detected', { text, duration, rows: res.rowCount });
  }

  return res;
}

export async function close(): Promise<void> {
  const current = pool;
  pool = null;
  if (current) {
    await current.end();
  }
}
