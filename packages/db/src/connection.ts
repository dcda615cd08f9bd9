import { Pool, PoolClient, PoolConfig, QueryResult, QueryResultRow } from 'pg';

const SLOW_QUERY_MS = 100;

/** Structural subset of a pino logger; the db package does not pick a logger itself. */
export interface DbLogger {
  warn(context: Record<string, unknown>, message: string): void;
  error(context: Record<string, unknown>, message: string): void;
}

export interface CreatePoolOptions {
  connectionString: string;
  max?: number;
  idleTimeoutMillis?: number;
  connectionTimeoutMillis?: number;
  logger?: DbLogger;
}

export type Queryable = Pool | PoolClient;

export function createPool(options: CreatePoolOptions): Pool {
  const poolConfig: PoolConfig = {
    connectionString: options.connectionString,
    max: options.max ?? (process.env.NODE_ENV === 'production' ? 20 : 10),
    idleTimeoutMillis: options.idleTimeoutMillis ?? 30000,
    connectionTimeoutMillis: options.connectionTimeoutMillis ?? 5000,
  };

  const pool = new Pool(poolConfig);

  pool.on('error', (err) => {
    if (options.logger) {
      options.logger.error({ error: err.message }, 'Unexpected error on idle client');
    } else {
      process.stderr.write(`Unexpected error on idle client: ${err.message}\n`);
    }
  });

  return pool;
}

export async function timedQuery<T extends QueryResultRow = QueryResultRow>(
  db: Queryable,
  text: string,
  params?: unknown[],
  logger?: DbLogger
): Promise<QueryResult<T>> {
  const start = Date.now();
  const res = await db.query<T>(text, params);
  const duration = Date.now() - start;

  if (duration > SLOW_QUERY_MS && logger) {
    logger.warn({ text, duration, rows: res.rowCount }, 'Slow query detected');
  }

  return res;
}

export async function checkConnection(pool: Pool): Promise<void> {
  const client = await pool.connect();
  client.release();
}

/**
 * Runs `work` inside BEGIN/COMMIT on a dedicated client, rolling back on any error.
 */
export async function withTransaction<T>(
  pool: Pool,
  work: (client: PoolClient) => Promise<T>
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}
