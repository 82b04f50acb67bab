import { describe, it, expect } from 'vitest';
import { ConnectionError } from '../../errors.js';
import { buildInsert, openIngestStore, tableName } from '../store.js';
import type { BackendConfig } from '../types.js';

describe('tableName', () => {
  it('quotes both parts and escapes embedded quotes', () => {
    expect(tableName({ schemaName: 'public', table: 'research"data' })).toBe('"public"."research""data"');
  });
});

describe('buildInsert', () => {
  it('numbers placeholders row by row', () => {
    const { text, params } = buildInsert({ schemaName: 'public', table: 'research_data' }, ['Title', 'Year'], [
      ['a', 2019],
      [null, 2020],
    ]);

    expect(text).toBe('insert into "public"."research_data" ("Title", "Year") values ($1, $2), ($3, $4)');
    expect(params).toEqual(['a', 2019, null, 2020]);
  });

  it('pads short rows with null', () => {
    const { params } = buildInsert({ schemaName: 'public', table: 't' }, ['a', 'b'], [['x']]);

    expect(params).toEqual(['x', null]);
  });
});

describe('openIngestStore', () => {
  it('wraps a refused connection in ConnectionError naming the target', async () => {
    const config: BackendConfig = {
      kind: 'explicit-env',
      connection: { host: '127.0.0.1', port: 1, user: 'frp', password: 'test-secret', database: 'frpdb', ssl: false },
    };

    const error = await openIngestStore(config).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ConnectionError);
    if (error instanceof ConnectionError) {
      expect(error.details).toMatchObject({ target: 'frp@127.0.0.1:1/frpdb' });
      expect(error.message).toMatch(/^could not connect to frp@127\.0\.0\.1:1\/frpdb: /);
    }
  }, 15_000);
});
