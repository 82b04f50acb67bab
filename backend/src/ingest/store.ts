import type { Pool } from 'pg';
import { createPool, query, quoteIdent, withTransaction } from '../db.js';
import { ConnectionError } from '../errors.js';
import { logger } from '../logger.js';
import { describeBackend } from './environment.js';
import type { BackendConfig, LoadValue } from './types.js';

export type TableRef = {
  schemaName: string;
  table: string;
};

/** Restricts counts to the rows written by one run. */
export type RowScope = {
  column: string;
  value: string;
};

/**
 * What the loader and verifier need from a storage backend. The pg
 * implementation below is the only production one; tests use an
 * in-memory fake.
 */
export interface IngestStore {
  readonly target: string;
  /** Column names of the table, empty when it does not exist. */
  listColumns(table: TableRef): Promise<string[]>;
  countRows(table: TableRef, scope?: RowScope): Promise<number>;
  countNonNull(table: TableRef, columns: readonly string[], scope?: RowScope): Promise<Record<string, number>>;
  clearTable(table: TableRef): Promise<number>;
  /** Writes every row or none of them. */
  insertBatch(table: TableRef, columns: readonly string[], rows: readonly LoadValue[][]): Promise<void>;
  close(): Promise<void>;
}

export type StoreOpener = (config: BackendConfig) => Promise<IngestStore>;

// postgres caps a single statement at 65535 bind parameters
const MAX_PARAMETERS = 65_535;

export function tableName(table: TableRef): string {
  return `${quoteIdent(table.schemaName)}.${quoteIdent(table.table)}`;
}

function scopeClause(scope: RowScope | undefined, params: unknown[]): string {
  if (!scope) return '';
  params.push(scope.value);
  return ` where ${quoteIdent(scope.column)} = $${params.length}`;
}

export function buildInsert(table: TableRef, columns: readonly string[], rows: readonly LoadValue[][]) {
  const params: LoadValue[] = [];
  const tuples = rows.map((row) => {
    const placeholders = columns.map((_, index) => {
      params.push(row[index] ?? null);
      return `$${params.length}`;
    });
    return `(${placeholders.join(', ')})`;
  });
  const text = `insert into ${tableName(table)} (${columns.map(quoteIdent).join(', ')}) values ${tuples.join(', ')}`;
  return { text, params };
}

class PgIngestStore implements IngestStore {
  constructor(
    private readonly pool: Pool,
    readonly target: string
  ) {}

  async listColumns(table: TableRef): Promise<string[]> {
    const result = await query<{ column_name: string }>(
      this.pool,
      `select column_name
         from information_schema.columns
        where table_schema = $1 and table_name = $2
        order by ordinal_position`,
      [table.schemaName, table.table]
    );
    return result.rows.map((row) => row.column_name);
  }

  async countRows(table: TableRef, scope?: RowScope): Promise<number> {
    const params: unknown[] = [];
    const where = scopeClause(scope, params);
    const result = await query<{ count: string }>(
      this.pool,
      `select count(*) as count from ${tableName(table)}${where}`,
      params
    );
    return Number(result.rows[0]?.count ?? 0);
  }

  async countNonNull(table: TableRef, columns: readonly string[], scope?: RowScope): Promise<Record<string, number>> {
    if (!columns.length) return {};
    const params: unknown[] = [];
    const where = scopeClause(scope, params);
    const selects = columns.map((column, index) => `count(${quoteIdent(column)}) as c${index}`);
    const result = await query<Record<string, string>>(
      this.pool,
      `select ${selects.join(', ')} from ${tableName(table)}${where}`,
      params
    );
    const row = result.rows[0] ?? {};
    const counts: Record<string, number> = {};
    columns.forEach((column, index) => {
      counts[column] = Number(row[`c${index}`] ?? 0);
    });
    return counts;
  }

  async clearTable(table: TableRef): Promise<number> {
    return withTransaction(this.pool, async (client) => {
      const result = await query(this.pool, `delete from ${tableName(table)}`, [], client);
      return result.rowCount ?? 0;
    });
  }

  async insertBatch(table: TableRef, columns: readonly string[], rows: readonly LoadValue[][]): Promise<void> {
    if (!rows.length) return;
    const rowsPerStatement = Math.max(1, Math.floor(MAX_PARAMETERS / Math.max(columns.length, 1)));
    await withTransaction(this.pool, async (client) => {
      for (let start = 0; start < rows.length; start += rowsPerStatement) {
        const { text, params } = buildInsert(table, columns, rows.slice(start, start + rowsPerStatement));
        await query(this.pool, text, params, client);
      }
    });
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

/** Opens a pool against the resolved backend and proves it answers. */
export async function openIngestStore(config: BackendConfig): Promise<IngestStore> {
  const target = describeBackend(config);
  const pool = createPool(config);
  pool.on('error', (error) => {
    logger.error({ err: error, target }, 'idle database client failed');
  });

  try {
    await pool.query('select 1');
  } catch (error) {
    await pool.end().catch((endError: unknown) => {
      logger.warn({ err: endError, target }, 'failed to close pool after connection error');
    });
    throw new ConnectionError(target, error);
  }
  return new PgIngestStore(pool, target);
}
