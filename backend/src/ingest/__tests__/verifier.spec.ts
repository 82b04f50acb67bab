import { describe, it, expect } from 'vitest';
import { verifyLoad } from '../verifier.js';
import { MemoryStore, RESEARCH_TABLE } from './helpers.js';

const scope = { column: 'ingest_run_id', value: 'run-1' };

function seededStore(options: { failCounts?: boolean } = {}) {
  const store = new MemoryStore(['Title', 'Year', 'ingest_run_id'], options);
  store.rows.push(
    { Title: 'older load', Year: 2001, ingest_run_id: 'run-0' },
    { Title: 'a', Year: 2019, ingest_run_id: 'run-1' },
    { Title: null, Year: 2020, ingest_run_id: 'run-1' }
  );
  return store;
}

describe('verifyLoad', () => {
  it('counts rows and sampled fields inside the run scope', async () => {
    const verification = await verifyLoad(seededStore(), {
      table: RESEARCH_TABLE,
      rowsLoaded: 2,
      scope,
      sampledFields: [
        { field: 'Title', column: 'Title', expected: 1 },
        { field: 'Year', column: 'Year', expected: 2 },
      ],
    });

    expect(verification).toEqual({
      scope: 'run',
      expectedRows: 2,
      observedRows: 2,
      sampledFields: [
        { field: 'Title', expected: 1, observed: 1 },
        { field: 'Year', expected: 2, observed: 2 },
      ],
      discrepancies: [],
    });
  });

  it('reports count and sample mismatches as discrepancies', async () => {
    const verification = await verifyLoad(seededStore(), {
      table: RESEARCH_TABLE,
      rowsLoaded: 3,
      scope,
      sampledFields: [{ field: 'Title', column: 'Title', expected: 2 }],
    });

    expect(verification.discrepancies).toEqual([
      'expected 3 rows for this run, found 2',
      'Title: expected 2 non-null values, found 1',
    ]);
  });

  it('compares the table delta against the baseline without a run scope', async () => {
    const verification = await verifyLoad(seededStore(), {
      table: RESEARCH_TABLE,
      rowsLoaded: 2,
      baseline: 1,
      sampledFields: [{ field: 'Title', column: 'Title', expected: 1 }],
    });

    expect(verification).toEqual({
      scope: 'table',
      expectedRows: 2,
      observedRows: 2,
      sampledFields: [{ field: 'Title', expected: 1, observed: null }],
      discrepancies: [],
    });
  });

  it('flags growth from other writers in table scope', async () => {
    const verification = await verifyLoad(seededStore(), { table: RESEARCH_TABLE, rowsLoaded: 1, baseline: 1, sampledFields: [] });

    expect(verification.discrepancies).toEqual([
      'table grew by 2 rows, expected 1; other writers may share the table',
    ]);
  });

  it('turns failed queries into discrepancies', async () => {
    const verification = await verifyLoad(seededStore({ failCounts: true }), {
      table: RESEARCH_TABLE,
      rowsLoaded: 2,
      scope,
      sampledFields: [{ field: 'Title', column: 'Title', expected: 1 }],
    });

    expect(verification.observedRows).toBeNull();
    expect(verification.discrepancies).toEqual([
      'row count query failed: count failed',
      'sample field query failed: count failed',
    ]);
  });
});
