import { describe, it, expect } from 'vitest';
import { MalformedSourceError } from '../../errors.js';
import { disambiguateHeader, isMissing, profileSheet } from '../profiler.js';
import { sheet } from './helpers.js';

describe('disambiguateHeader', () => {
  it('suffixes repeated names and leaves blanks alone', () => {
    expect(disambiguateHeader(['id', 'note', 'note', '', 'note', ''])).toEqual(['id', 'note', 'note.1', '', 'note.2', '']);
  });

  it('fails when a generated name collides with a real header', () => {
    expect(() => disambiguateHeader(['note', 'note', 'note.1'])).toThrow(MalformedSourceError);
  });
});

describe('profileSheet', () => {
  it('computes positions and null density', () => {
    const profile = profileSheet(
      sheet(
        ['a', ' b ', ''],
        [
          [1, null, 'x'],
          [2, '  ', null],
        ]
      )
    );

    expect(profile.columnCount).toBe(3);
    expect(profile.rowCount).toBe(2);
    expect(profile.header).toEqual(['a', 'b', '']);
    expect(profile.columnPositions).toEqual({ a: 0, b: 1 });
    expect(profile.nullDensity).toEqual([0, 1, 0.5]);
    expect(Object.isFrozen(profile)).toBe(true);
  });

  it('reports zero density for a sheet without data rows', () => {
    expect(profileSheet(sheet(['a', 'b'], [])).nullDensity).toEqual([0, 0]);
  });

  it('counts short rows as missing trailing cells', () => {
    expect(profileSheet(sheet(['a', 'b'], [['x']])).nullDensity).toEqual([0, 1]);
  });

  it('rejects a blank header row', () => {
    expect(() => profileSheet(sheet(['', '  '], [['x', 'y']], 3))).toThrow(/header row 4 .* is missing or blank/);
  });

  it('rejects a missing header row', () => {
    expect(() => profileSheet(sheet([], []))).toThrow(MalformedSourceError);
  });
});

describe('isMissing', () => {
  it('treats null, undefined and whitespace as missing', () => {
    expect([null, undefined, '', ' \t', 0, false, 'x'].map(isMissing)).toEqual([
      true,
      true,
      true,
      true,
      false,
      false,
      false,
    ]);
  });
});
