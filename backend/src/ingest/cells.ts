import type { CellValue, ColumnMapping, LoadValue, ReconciledRow, RejectedRow, SemanticType, SourceRow, TargetSchema } from './types.js';

export type CleaningRules = {
  nullTokens: readonly string[];
  maxTextLength: number;
};

type NumericType = Exclude<SemanticType, 'text'>;

const GROUPED_THOUSANDS = /^[-+]?\d{1,3}(,\d{3})+(\.\d+)?$/;
const DECIMAL_COMMA = /^[-+]?\d+,\d+$/;

function isNullToken(text: string, rules: CleaningRules): boolean {
  if (!text) return true;
  const lowered = text.toLowerCase();
  return rules.nullTokens.some((token) => token.trim().toLowerCase() === lowered);
}

export function normalizeText(value: CellValue, rules: CleaningRules): string | null {
  if (value == null) return null;
  if (value instanceof Date) return value.toISOString().split('T')[0] ?? null;
  const str = String(value).trim();
  if (isNullToken(str, rules)) return null;
  return str.length > rules.maxTextLength ? str.slice(0, rules.maxTextLength) : str;
}

/** Returns `undefined` when the cell holds something that is not a number. */
export function normalizeNumber(value: CellValue, type: NumericType, rules: CleaningRules): number | null | undefined {
  if (value == null) return null;
  if (typeof value === 'boolean' || value instanceof Date) return undefined;

  let parsed: number;
  if (typeof value === 'number') {
    parsed = value;
  } else {
    let str = value.trim();
    if (isNullToken(str, rules)) return null;
    if (type === 'percent' && str.endsWith('%')) str = str.slice(0, -1).trim();
    str = str.replace(/\s+/g, '');
    if (GROUPED_THOUSANDS.test(str)) {
      str = str.replace(/,/g, '');
    } else if (DECIMAL_COMMA.test(str)) {
      str = str.replace(',', '.');
    }
    parsed = str === '' ? Number.NaN : Number(str);
  }

  if (!Number.isFinite(parsed)) return undefined;
  if (type === 'integer' && !Number.isInteger(parsed)) return undefined;
  return parsed;
}

export type RowConversion = { ok: true; row: ReconciledRow } | { ok: false; rejection: RejectedRow };

/**
 * Build the target-ordered row for one source row. Absent fields load as
 * null; a value that does not fit its field rejects the whole row.
 */
export function toReconciledRow(
  source: SourceRow,
  mapping: ColumnMapping,
  schema: TargetSchema,
  rules: CleaningRules
): RowConversion {
  const values: LoadValue[] = [];
  for (const fieldMapping of mapping.fields) {
    const field = schema.fields[fieldMapping.fieldIndex];
    if (!field) continue;
    const raw = fieldMapping.sourceIndex === null ? null : source.cells[fieldMapping.sourceIndex] ?? null;

    let value: LoadValue;
    if (field.semanticType === 'text') {
      value = normalizeText(raw, rules);
    } else {
      const numeric = normalizeNumber(raw, field.semanticType, rules);
      if (numeric === undefined) {
        return {
          ok: false,
          rejection: { row: source.line, reason: 'invalid-number', detail: `${field.name}: ${String(raw)}` },
        };
      }
      value = numeric;
    }

    if (value === null && !field.nullable) {
      return { ok: false, rejection: { row: source.line, reason: 'missing-required-value', detail: field.name } };
    }
    values.push(value);
  }
  return { ok: true, row: { line: source.line, values } };
}
