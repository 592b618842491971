/**
 * Database Connection Pool Module
 *
 * Provides PostgreSQL connection pooling optimized for AWS Lambda execution.
 * The pool is reused across warm invocations; each request borrows a single
 * client through `withClient`, which hands it to repositories as an explicit
 * store handle and always returns it to the pool.
 */

import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import { loadEnvironmentConfig } from './environment';
import { getDatabaseCredentials } from './secrets';
import { logDatabase } from '../utils/logger';

// Global pool instance for Lambda warm starts
let pool: Pool | null = null;

/**
 * Minimal query capability shared by pool clients and test doubles
 */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: unknown[]
  ): Promise<QueryResult<R>>;
}

/**
 * Database connection pool configuration
 */
interface PoolConfig {
  min: number;
  max: number;
  idleTimeoutMillis: number;
  connectionTimeoutMillis: number;
}

/**
 * Default pool configuration optimized for Lambda
 */
const DEFAULT_POOL_CONFIG: PoolConfig = {
  min: 0,
  max: 5,
  idleTimeoutMillis: 30000, // 30 seconds
  connectionTimeoutMillis: 5000, // 5 seconds
};

/**
 * Get or create the database connection pool
 * Reuses pool across Lambda invocations for performance
 */
export async function getPool(): Promise<Pool> {
  if (!pool) {
    const config = loadEnvironmentConfig();
    const credentials = await getDatabaseCredentials(config);

    pool = new Pool({
      host: config.dbHost,
      port: config.dbPort,
      database: config.dbName,
      user: credentials.username,
      password: credentials.password,
      min: DEFAULT_POOL_CONFIG.min,
      max: DEFAULT_POOL_CONFIG.max,
      idleTimeoutMillis: DEFAULT_POOL_CONFIG.idleTimeoutMillis,
      connectionTimeoutMillis: DEFAULT_POOL_CONFIG.connectionTimeoutMillis,
      ssl: config.dbSsl ? { rejectUnauthorized: false } : undefined,
    });

    pool.on('error', (err) => {
      logDatabase({
        errorMessage: err.message,
        query: 'Pool error',
        operation: 'POOL_ERROR',
      });
    });
  }

  return pool;
}

/**
 * Wrap a checked-out client in the Queryable interface
 */
function asQueryable(client: PoolClient): Queryable {
  return {
    query: <R extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]) =>
      client.query<R>(text, params),
  };
}

/**
 * Execute a parameterized query directly on the pool
 *
 * @param text - SQL query with $1, $2, etc. placeholders
 * @param params - Array of parameter values
 */
export async function query<R extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<QueryResult<R>> {
  const activePool = await getPool();
  return activePool.query<R>(text, params);
}

/**
 * Run a callback with a request-scoped client
 *
 * The client is released on every exit path, including when the callback
 * throws. Statements issued through it autocommit individually.
 */
export async function withClient<T>(
  callback: (db: Queryable) => Promise<T>
): Promise<T> {
  const activePool = await getPool();
  const client = await activePool.connect();

  try {
    return await callback(asQueryable(client));
  } finally {
    client.release();
  }
}

/**
 * Close the database pool
 * Should be called during Lambda shutdown or testing cleanup
 */
export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}

/**
 * Reset pool instance (for testing only)
 * @internal
 */
export function resetPool(): void {
  pool = null;
}
