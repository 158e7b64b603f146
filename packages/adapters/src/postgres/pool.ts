import pg from 'pg';

const { Pool } = pg;

export type DbPool = pg.Pool;
export type DbClient = pg.PoolClient;

export interface PoolOptions {
  connectionString: string;
  applicationName: string;
  /** Default budgets for every pooled connection, actor or not. */
  statementTimeoutMs: number;
  lockTimeoutMs: number;
}

export function createPool(opts: PoolOptions): pg.Pool {
  const pool = new Pool({
    connectionString: opts.connectionString,
    // one connection per actor plus one for fixture work
    max: 8,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000,
    application_name: opts.applicationName,
    statement_timeout: opts.statementTimeoutMs,
    lock_timeout: opts.lockTimeoutMs,
  });
  pool.on('error', (err) => {
    console.error('[pg-pool] unexpected error on idle client', err);
  });
  return pool;
}

/** Run a callback inside a transaction; rolls back on error. */
export async function withTransaction<T>(
  pool: DbPool,
  fn: (client: DbClient) => Promise<T>,
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  } finally {
    client.release();
  }
}
