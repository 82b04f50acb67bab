import pg from 'pg';
import type { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import type { ConnectionOptions } from 'node:tls';
import type { BackendConfig, SslMode } from './ingest/types.js';

/** TLS options for pg. Only the `verify-*` modes check the certificate; `verify-ca` skips the host name. */
export function sslOptions(mode: SslMode | false): ConnectionOptions | undefined {
  switch (mode) {
    case false:
      return undefined;
    case 'require':
    case 'no-verify':
      return { rejectUnauthorized: false };
    case 'verify-ca':
      return { rejectUnauthorized: true, checkServerIdentity: () => undefined };
    case 'verify-full':
      return { rejectUnauthorized: true };
  }
}

export function createPool(config: BackendConfig, max = 4): Pool {
  const { host, port, user, password, database, ssl } = config.connection;
  return new pg.Pool({
    host,
    port,
    user,
    password,
    database,
    ssl: sslOptions(ssl),
    max,
    connectionTimeoutMillis: 10_000,
  });
}

export async function query<T extends QueryResultRow = QueryResultRow>(
  pool: Pool,
  text: string,
  params?: unknown[],
  client?: PoolClient
): Promise<QueryResult<T>> {
  if (client) {
    return client.query<T>(text, params);
  }
  return pool.query<T>(text, params);
}

export async function withTransaction<T>(pool: Pool, fn: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('begin');
    const result = await fn(client);
    await client.query('commit');
    return result;
  } catch (error) {
    await client.query('rollback');
    throw error;
  } finally {
    client.release();
  }
}

export function quoteIdent(identifier: string): string {
  return `"${identifier.replace(/"/g, '""')}"`;
}
