import { PartialLoadError, SchemaMismatchError } from '../errors.js';
import { logger } from '../logger.js';
import type { IngestStore, TableRef } from './store.js';
import type { LoadValue, ReconciledRow, TargetSchema } from './types.js';

export type Preflight = {
  columns: string[];
  /** True when the run-isolation column exists and rows can be tagged with the run id. */
  isolated: boolean;
};

/**
 * Checks the destination before any row is sent: every target column must
 * exist. Extra destination columns are fine.
 */
export async function preflight(
  store: IngestStore,
  schema: TargetSchema,
  table: TableRef,
  isolationColumn?: string
): Promise<Preflight> {
  const existing = new Set(await store.listColumns(table));
  const missing = schema.fields.map((field) => field.column).filter((column) => !existing.has(column));
  if (missing.length) {
    throw new SchemaMismatchError(`${table.schemaName}.${table.table}`, missing);
  }

  const columns = schema.fields.map((field) => field.column);
  const isolated = isolationColumn !== undefined && existing.has(isolationColumn) && !columns.includes(isolationColumn);
  return { columns: isolated && isolationColumn ? [...columns, isolationColumn] : columns, isolated };
}

export type LoadOptions = {
  table: TableRef;
  columns: readonly string[];
  batchSize: number;
  /** Appended to every row when the run is isolated. */
  runTag?: string;
  onBatchCommitted?: (batch: readonly ReconciledRow[], batchIndex: number) => void;
};

export type LoadTally = {
  rowsLoaded: number;
  batchesCommitted: number;
};

/**
 * Streams rows into the store in batches of `batchSize`, one transaction per
 * batch. The first failing batch ends the load; batches committed before it
 * stay committed and are reported through the thrown PartialLoadError.
 */
export async function loadRows(
  store: IngestStore,
  rows: Iterable<ReconciledRow>,
  options: LoadOptions
): Promise<LoadTally> {
  const tally: LoadTally = { rowsLoaded: 0, batchesCommitted: 0 };
  let batch: ReconciledRow[] = [];

  const flush = async () => {
    const current = batch;
    batch = [];
    const batchIndex = tally.batchesCommitted + 1;
    const values: LoadValue[][] = current.map((row) =>
      options.runTag === undefined ? row.values : [...row.values, options.runTag]
    );

    try {
      await store.insertBatch(options.table, options.columns, values);
    } catch (error) {
      const firstRow = current[0]?.line ?? 0;
      const lastRow = current[current.length - 1]?.line ?? firstRow;
      logger.error({ err: error, batchIndex, firstRow, lastRow, rowsLoaded: tally.rowsLoaded }, 'batch failed');
      throw new PartialLoadError(
        { batchIndex, firstRow, lastRow, batchesCommitted: tally.batchesCommitted, rowsLoaded: tally.rowsLoaded },
        error
      );
    }

    tally.rowsLoaded += current.length;
    tally.batchesCommitted = batchIndex;
    logger.debug({ batchIndex, rows: current.length, rowsLoaded: tally.rowsLoaded }, 'batch committed');
    options.onBatchCommitted?.(current, batchIndex);
  };

  for (const row of rows) {
    batch.push(row);
    if (batch.length >= options.batchSize) {
      await flush();
    }
  }
  if (batch.length) {
    await flush();
  }
  return tally;
}
