import { isMissing } from './profiler.js';
import type { CellValue, ColumnMapping, FilterOutcome, FilterPredicate, FilterReason, SourceRow } from './types.js';

type PredicateKind = FilterPredicate['kind'];
type PredicateOf<K extends PredicateKind> = Extract<FilterPredicate, { kind: K }>;

/** Evaluators return null when the value passes, otherwise the exclusion reason. */
type Evaluator<K extends PredicateKind> = (value: CellValue, predicate: PredicateOf<K>) => FilterReason | null;

function comparable(value: CellValue | string | number): string {
  if (value instanceof Date) return value.toISOString().split('T')[0] ?? '';
  return String(value).trim();
}

const evaluators: { [K in PredicateKind]: Evaluator<K> } = {
  equals: (value, predicate) => (comparable(value) === comparable(predicate.value) ? null : 'value-mismatch'),
  'not-null': () => null,
  'in-set': (value, predicate) => {
    const candidate = comparable(value);
    return predicate.values.some((option) => comparable(option) === candidate) ? null : 'value-not-in-set';
  },
};

function evaluate(value: CellValue, predicate: FilterPredicate): FilterReason | null {
  switch (predicate.kind) {
    case 'equals':
      return evaluators.equals(value, predicate);
    case 'not-null':
      return evaluators['not-null'](value, predicate);
    case 'in-set':
      return evaluators['in-set'](value, predicate);
    default: {
      const unknownKind: never = predicate;
      throw new Error(`unsupported predicate ${JSON.stringify(unknownKind)}`);
    }
  }
}

export function evaluateRow(
  row: SourceRow,
  anchors: ColumnMapping['anchors'],
  predicates: readonly FilterPredicate[]
): FilterOutcome {
  for (const predicate of predicates) {
    const position = Object.hasOwn(anchors, predicate.anchor) ? anchors[predicate.anchor] : undefined;
    const value = position === undefined ? null : row.cells[position] ?? null;
    // every predicate needs a value to compare against
    if (isMissing(value)) {
      return { row, eligible: false, reason: 'missing-anchor-value', anchor: predicate.anchor };
    }
    const reason = evaluate(value, predicate);
    if (reason) {
      return { row, eligible: false, reason, anchor: predicate.anchor };
    }
  }
  return { row, eligible: true };
}

/**
 * Lazily tag each source row as eligible or not, in source order. A chain of
 * predicates is AND-combined and stops at the first failing one.
 */
export function* filterRows(
  rows: Iterable<SourceRow>,
  mapping: Pick<ColumnMapping, 'anchors'>,
  predicates: readonly FilterPredicate[]
): Generator<FilterOutcome, void, undefined> {
  for (const row of rows) {
    yield evaluateRow(row, mapping.anchors, predicates);
  }
}
