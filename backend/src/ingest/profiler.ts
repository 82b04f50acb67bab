import { MalformedSourceError } from '../errors.js';
import type { CellValue, SheetTable, SourceProfile } from './types.js';

export function isMissing(value: CellValue | undefined): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

/**
 * Rename repeated header names the way spreadsheet exports do: the second
 * `note` becomes `note.1`, the third `note.2`. A generated name that collides
 * with a header already present cannot be disambiguated.
 */
export function disambiguateHeader(header: readonly string[]): string[] {
  const present = new Set(header.filter((name) => name !== ''));
  const seen = new Map<string, number>();
  const taken = new Set<string>();

  return header.map((name, index) => {
    if (name === '') return '';
    const occurrences = seen.get(name) ?? 0;
    seen.set(name, occurrences + 1);
    if (occurrences === 0) {
      taken.add(name);
      return name;
    }
    const renamed = `${name}.${occurrences}`;
    if (present.has(renamed) || taken.has(renamed)) {
      throw new MalformedSourceError(`duplicate header "${name}" at column ${index + 1} cannot be disambiguated`, {
        column: index + 1,
        header: name,
      });
    }
    taken.add(renamed);
    return renamed;
  });
}

export function profileSheet(table: SheetTable): SourceProfile {
  const trimmed = table.header.map((name) => name.trim());
  if (!trimmed.length || trimmed.every((name) => name === '')) {
    throw new MalformedSourceError(`header row ${table.headerRow + 1} of sheet "${table.sheetName}" is missing or blank`, {
      headerRow: table.headerRow + 1,
    });
  }

  const header = disambiguateHeader(trimmed);
  const columnCount = header.length;
  const columnPositions: Record<string, number> = {};
  header.forEach((name, index) => {
    if (name !== '') columnPositions[name] = index;
  });

  const missing = new Array<number>(columnCount).fill(0);
  for (const row of table.rows) {
    for (let column = 0; column < columnCount; column += 1) {
      if (isMissing(row.cells[column])) missing[column] += 1;
    }
  }
  const rowCount = table.rows.length;
  const nullDensity = missing.map((count) => (rowCount ? count / rowCount : 0));

  return Object.freeze({ columnCount, header, columnPositions, nullDensity, rowCount });
}
