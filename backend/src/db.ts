import { Pool, type PoolClient, type QueryResult, type QueryResultRow } from 'pg';
import type { DbConfig } from './config.js';

export type Queryable = Pick<PoolClient, 'query'>;

export async function query<T extends QueryResultRow = QueryResultRow>(
  client: Queryable,
  text: string,
  params?: unknown[]
): Promise<QueryResult<T>> {
  return client.query<T>(text, params);
}

export async function withTransaction<T>(client: Queryable, fn: () => Promise<T>): Promise<T> {
  await client.query('begin');
  try {
    const result = await fn();
    await client.query('commit');
    return result;
  } catch (error) {
    await client.query('rollback');
    throw error;
  }
}

/**
 * Opens a single connection for the duration of `fn`. The client is released
 * and the pool ended on every exit path.
 */
export async function withConnection<T>(config: DbConfig, fn: (client: PoolClient) => Promise<T>): Promise<T> {
  const pool = new Pool({
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    database: config.database,
    max: 1,
  });
  try {
    const client = await pool.connect();
    try {
      return await fn(client);
    } finally {
      client.release();
    }
  } finally {
    await pool.end();
  }
}
