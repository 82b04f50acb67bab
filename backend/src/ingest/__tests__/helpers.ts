import { defineTargetSchema } from '../target-schema.js';
import type { IngestStore, RowScope, TableRef } from '../store.js';
import type { CellValue, LoadValue, SheetTable, SourceRow, TargetSchema } from '../types.js';

export const RESEARCH_TABLE: TableRef = { schemaName: 'public', table: 'research_data' };

/** f0 is required, f1..f(n-1) nullable. */
export function smallSchema(size = 5): TargetSchema {
  return defineTargetSchema({
    fields: Array.from({ length: size }, (_, index) => ({ name: `f${index}`, nullable: index !== 0 })),
  });
}

export function sheet(header: string[], rows: CellValue[][], headerRow = 0): SheetTable {
  const sourceRows: SourceRow[] = rows.map((cells, index) => ({ line: headerRow + index + 2, cells }));
  return { sheetName: 'Sheet1', headerRow, header, rows: sourceRows };
}

type MemoryStoreOptions = {
  table?: TableRef;
  /** 1-based insertBatch call that throws. */
  failOnBatch?: number;
  failCounts?: boolean;
};

/** In-process stand-in for the pg store. */
export class MemoryStore implements IngestStore {
  readonly target = 'memory://test';
  readonly rows: Array<Record<string, LoadValue>> = [];
  readonly table: TableRef;
  insertCalls = 0;
  closed = false;
  private readonly failOnBatch?: number;
  private readonly failCounts: boolean;

  constructor(
    readonly columns: string[],
    options: MemoryStoreOptions = {}
  ) {
    this.table = options.table ?? RESEARCH_TABLE;
    this.failOnBatch = options.failOnBatch;
    this.failCounts = options.failCounts ?? false;
  }

  private matches(table: TableRef): boolean {
    return table.schemaName === this.table.schemaName && table.table === this.table.table;
  }

  private scoped(scope?: RowScope) {
    return scope ? this.rows.filter((row) => row[scope.column] === scope.value) : this.rows;
  }

  async listColumns(table: TableRef): Promise<string[]> {
    return this.matches(table) ? [...this.columns] : [];
  }

  async countRows(_table: TableRef, scope?: RowScope): Promise<number> {
    if (this.failCounts) throw new Error('count failed');
    return this.scoped(scope).length;
  }

  async countNonNull(_table: TableRef, columns: readonly string[], scope?: RowScope): Promise<Record<string, number>> {
    if (this.failCounts) throw new Error('count failed');
    const rows = this.scoped(scope);
    const counts: Record<string, number> = {};
    for (const column of columns) {
      counts[column] = rows.filter((row) => row[column] !== null && row[column] !== undefined).length;
    }
    return counts;
  }

  async clearTable(): Promise<number> {
    const cleared = this.rows.length;
    this.rows.length = 0;
    return cleared;
  }

  async insertBatch(_table: TableRef, columns: readonly string[], rows: readonly LoadValue[][]): Promise<void> {
    this.insertCalls += 1;
    if (this.insertCalls === this.failOnBatch) {
      throw new Error('insert failed');
    }
    const staged = rows.map((values) => {
      const record: Record<string, LoadValue> = {};
      columns.forEach((column, index) => {
        record[column] = values[index] ?? null;
      });
      return record;
    });
    this.rows.push(...staged);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
