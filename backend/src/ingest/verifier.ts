import { logger } from '../logger.js';
import type { IngestStore, RowScope, TableRef } from './store.js';
import type { Verification } from './types.js';

export type SampledField = {
  field: string;
  column: string;
  /** Non-null values the loader committed for this field. */
  expected: number;
};

export type VerifyInput = {
  table: TableRef;
  rowsLoaded: number;
  /** Set when every row carries the run id; counts are then exact. */
  scope?: RowScope;
  /** Table row count before the run, minus anything the run cleared. */
  baseline?: number;
  sampledFields: readonly SampledField[];
};

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Reads back what the run wrote and compares it with what the loader
 * committed. Never throws: a failed query or a mismatch becomes a
 * discrepancy on the report.
 */
export async function verifyLoad(store: IngestStore, input: VerifyInput): Promise<Verification> {
  const discrepancies: string[] = [];
  const scope = input.scope ? 'run' : 'table';
  let observedRows: number | null = null;

  try {
    const counted = await store.countRows(input.table, input.scope);
    observedRows = input.scope ? counted : counted - (input.baseline ?? 0);
    if (observedRows !== input.rowsLoaded) {
      discrepancies.push(
        scope === 'run'
          ? `expected ${input.rowsLoaded} rows for this run, found ${observedRows}`
          : `table grew by ${observedRows} rows, expected ${input.rowsLoaded}; other writers may share the table`
      );
    }
  } catch (error) {
    logger.warn({ err: error }, 'row count verification failed');
    discrepancies.push(`row count query failed: ${describe(error)}`);
  }

  const sampledFields: Verification['sampledFields'] = input.sampledFields.map((sample) => ({
    field: sample.field,
    expected: sample.expected,
    observed: null,
  }));

  // non-null counts only mean something when they can be restricted to this run
  if (input.scope && sampledFields.length) {
    try {
      const counts = await store.countNonNull(
        input.table,
        input.sampledFields.map((sample) => sample.column),
        input.scope
      );
      input.sampledFields.forEach((sample, index) => {
        const observed = counts[sample.column] ?? 0;
        const entry = sampledFields[index];
        if (entry) entry.observed = observed;
        if (observed !== sample.expected) {
          discrepancies.push(`${sample.field}: expected ${sample.expected} non-null values, found ${observed}`);
        }
      });
    } catch (error) {
      logger.warn({ err: error }, 'sample field verification failed');
      discrepancies.push(`sample field query failed: ${describe(error)}`);
    }
  }

  return { scope, expectedRows: input.rowsLoaded, observedRows, sampledFields, discrepancies };
}
