import { describe, it, expect } from 'vitest';
import { evaluateRow, filterRows } from '../row-filter.js';
import type { FilterPredicate, SourceRow } from '../types.js';

const anchors = { businessUnit: 1, status: 2 };
const smdOnly: FilterPredicate[] = [{ kind: 'equals', anchor: 'businessUnit', value: 'SMD' }];

const row = (line: number, ...cells: SourceRow['cells']): SourceRow => ({ line, cells });

describe('filterRows', () => {
  const rows = [row(5, 'a', 'SMD'), row(6, 'b', 'ABC'), row(7, 'c', null), row(8, 'd', ' SMD '), row(9, 'e', '')];

  it('tags each row in source order', () => {
    const outcomes = [...filterRows(rows, { anchors }, smdOnly)];

    expect(outcomes.map((outcome) => [outcome.row.line, outcome.eligible, outcome.reason])).toEqual([
      [5, true, undefined],
      [6, false, 'value-mismatch'],
      [7, false, 'missing-anchor-value'],
      [8, true, undefined],
      [9, false, 'missing-anchor-value'],
    ]);
    expect(outcomes[1]?.anchor).toBe('businessUnit');
  });

  it('gives the same outcomes on a second pass over the same rows', () => {
    const first = [...filterRows(rows, { anchors }, smdOnly)];
    const second = [...filterRows(rows, { anchors }, smdOnly)];

    expect(second).toEqual(first);
  });

  it('pulls source rows lazily', () => {
    let pulled = 0;
    function* source() {
      for (const item of rows) {
        pulled += 1;
        yield item;
      }
    }

    const outcomes = filterRows(source(), { anchors }, smdOnly);
    outcomes.next();

    expect(pulled).toBe(1);
  });

  it('keeps every row when there are no predicates', () => {
    expect([...filterRows(rows, { anchors }, [])].every((outcome) => outcome.eligible)).toBe(true);
  });
});

describe('evaluateRow', () => {
  it('compares numbers and strings by their text', () => {
    const outcome = evaluateRow(row(2, 'x', '5'), anchors, [{ kind: 'equals', anchor: 'businessUnit', value: 5 }]);
    expect(outcome.eligible).toBe(true);
  });

  it('checks set membership', () => {
    const predicates: FilterPredicate[] = [{ kind: 'in-set', anchor: 'businessUnit', values: ['SMD', 'LAB'] }];

    expect(evaluateRow(row(2, 'x', 'LAB'), anchors, predicates).eligible).toBe(true);
    expect(evaluateRow(row(3, 'x', 'OPS'), anchors, predicates).reason).toBe('value-not-in-set');
  });

  it('rejects blanks under not-null', () => {
    const predicates: FilterPredicate[] = [{ kind: 'not-null', anchor: 'status' }];

    expect(evaluateRow(row(2, 'x', 'SMD', 'ok'), anchors, predicates).eligible).toBe(true);
    expect(evaluateRow(row(3, 'x', 'SMD', ' '), anchors, predicates).reason).toBe('missing-anchor-value');
  });

  it('stops the chain at the first failing predicate', () => {
    const outcome = evaluateRow(row(2, 'x', 'ABC', null), anchors, [
      { kind: 'equals', anchor: 'businessUnit', value: 'SMD' },
      { kind: 'not-null', anchor: 'status' },
    ]);

    expect(outcome).toMatchObject({ eligible: false, reason: 'value-mismatch', anchor: 'businessUnit' });
  });

  it('treats an anchor that was never located as missing', () => {
    const outcome = evaluateRow(row(2, 'x', 'SMD'), anchors, [{ kind: 'not-null', anchor: 'toString' }]);

    expect(outcome).toMatchObject({ eligible: false, reason: 'missing-anchor-value', anchor: 'toString' });
  });

  it('compares dates by calendar day', () => {
    const outcome = evaluateRow(row(2, 'x', new Date(Date.UTC(2024, 2, 1))), anchors, [
      { kind: 'equals', anchor: 'businessUnit', value: '2024-03-01' },
    ]);
    expect(outcome.eligible).toBe(true);
  });
});
