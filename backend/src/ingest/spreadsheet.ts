import path from 'node:path';
import { promises as fsp } from 'node:fs';
import * as XLSX from 'xlsx';
import { MalformedSourceError } from '../errors.js';
import type { CellValue, SheetTable, SourceRow } from './types.js';

export type SpreadsheetSource = { path: string } | { filename: string; data: Buffer };

export type ReadSheetOptions = {
  /** 0-based sheet row holding the header. */
  headerRow?: number;
  sheetName?: string;
};

export const SUPPORTED_EXTENSIONS = ['.xlsx', '.xlsm', '.xls', '.csv'];

export function sourceName(source: SpreadsheetSource): string {
  return 'path' in source ? path.basename(source.path) : source.filename;
}

function toCell(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (value instanceof Date) return value;
  return String(value);
}

function isBlank(value: CellValue): boolean {
  return value === null || (typeof value === 'string' && value.trim() === '');
}

function chooseSheet(sheetNames: string[], preferred?: string): string {
  if (preferred) {
    const match = sheetNames.find((name) => name.toLowerCase() === preferred.toLowerCase());
    if (!match) {
      throw new MalformedSourceError(`sheet "${preferred}" not found`, { sheets: sheetNames });
    }
    return match;
  }
  const first = sheetNames[0];
  if (!first) {
    throw new MalformedSourceError('workbook has no sheets');
  }
  return first;
}

function readWorkbook(data: Buffer, filename: string): XLSX.WorkBook {
  const ext = path.extname(filename).toLowerCase();
  if (!SUPPORTED_EXTENSIONS.includes(ext)) {
    throw new MalformedSourceError(`unsupported file type: ${filename}`);
  }
  try {
    if (ext === '.csv') {
      return XLSX.read(data.toString('utf8'), { type: 'string', cellDates: true });
    }
    return XLSX.read(data, { type: 'buffer', cellDates: true });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MalformedSourceError(`could not read ${filename}: ${reason}`);
  }
}

/**
 * Parse workbook bytes into a header plus data rows. Fully blank rows are
 * skipped; every kept row remembers its sheet line for audit.
 */
export function parseSpreadsheet(data: Buffer, filename: string, options: ReadSheetOptions = {}): SheetTable {
  const headerRow = options.headerRow ?? 0;
  const workbook = readWorkbook(data, filename);
  const sheetName = chooseSheet(workbook.SheetNames, options.sheetName);
  const sheet = workbook.Sheets[sheetName];
  const ref = sheet?.['!ref'];
  if (!sheet || !ref) {
    return { sheetName, headerRow, header: [], rows: [] };
  }

  const range = XLSX.utils.decode_range(ref);
  const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: null,
    raw: true,
    blankrows: true,
  });

  const headerIndex = headerRow - range.s.r;
  const headerCells = headerIndex >= 0 ? (matrix[headerIndex] ?? []).map(toCell) : [];
  let width = headerCells.length;
  while (width > 0 && isBlank(headerCells[width - 1] ?? null)) width -= 1;
  const header = headerCells.slice(0, width).map((cell) => (cell === null ? '' : String(cell).trim()));

  const rows: SourceRow[] = [];
  for (let index = Math.max(headerIndex + 1, 0); index < matrix.length; index += 1) {
    const raw = matrix[index] ?? [];
    const cells: CellValue[] = [];
    for (let column = 0; column < width; column += 1) {
      cells.push(toCell(raw[column]));
    }
    if (cells.every(isBlank)) continue;
    rows.push({ line: range.s.r + index + 1, cells });
  }

  return { sheetName, headerRow, header, rows };
}

export async function readSpreadsheet(source: SpreadsheetSource, options: ReadSheetOptions = {}): Promise<SheetTable> {
  if ('path' in source) {
    const data = await fsp.readFile(source.path);
    return parseSpreadsheet(data, source.path, options);
  }
  return parseSpreadsheet(source.data, source.filename, options);
}
