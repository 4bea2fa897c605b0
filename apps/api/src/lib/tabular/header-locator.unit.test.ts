import { describe, expect, it } from 'vitest';
import { DataValidationError, HeaderNotFoundError } from '../errors.js';
import {
  locateHeader,
  locateTabular,
  readText,
  requireColumns,
  requireHeader,
  tableFromHeader,
} from './header-locator.js';
import { rawTableFromValues } from './raw-table.js';

const sheet = rawTableFromValues('KR', [
  ['Country report', null, null, null, null],
  [null, null, null, null, null],
  [' Series ', 'Code ', 'Currency', null, '2020'],
  ['GDP', 'DGDP', 'USD', 'x', 1.5],
  [null, null, null, null, null],
  ['CPI', 'DCPI', '', '', 2],
]);

describe('locateHeader', () => {
  it('finds the first row whose leading cells match after trimming', () => {
    expect(locateHeader(sheet, ['Series', 'Code'])).toBe(2);
  });

  it('ignores trailing cells beyond the spec', () => {
    expect(locateHeader(sheet, ['Series'])).toBe(2);
  });

  it('returns null when the header sits below the scan window', () => {
    expect(locateHeader(sheet, ['Series', 'Code'], { maxRows: 2 })).toBeNull();
  });

  it('returns null when a spec position is blank in the row', () => {
    expect(locateHeader(sheet, ['Series', 'Code', 'Currency', 'Units'])).toBeNull();
  });

  it('does not match case-insensitively', () => {
    expect(locateHeader(sheet, ['series', 'code'])).toBeNull();
  });

  it('returns null for an empty spec', () => {
    expect(locateHeader(sheet, [])).toBeNull();
  });
});

describe('requireHeader', () => {
  it('throws HeaderNotFoundError naming the sheet', () => {
    expect(() => requireHeader(sheet, ['Geography', 'Code'])).toThrow(HeaderNotFoundError);
    expect(() => requireHeader(sheet, ['Geography', 'Code'])).toThrow(
      'Header row [Geography, Code] not found in sheet "KR".'
    );
  });
});

describe('tableFromHeader', () => {
  it('stops the column list at the first blank header cell when asked', () => {
    const t = tableFromHeader(sheet, 2, { stopAtBlank: true });
    expect(t.columns).toEqual(['Series', 'Code', 'Currency']);
    expect(t.rows).toHaveLength(2);
    expect(readText(t.rows[0] ?? {}, 'Code')).toBe('DGDP');
  });

  it('keeps columns past a blank header cell by default', () => {
    const t = tableFromHeader(sheet, 2);
    expect(t.columns).toEqual(['Series', 'Code', 'Currency', '2020']);
    expect(t.rows[1]?.['2020']?.value).toBe(2);
  });

  it('keeps the first position of a repeated column name', () => {
    const dup = rawTableFromValues('D', [
      ['A', 'B', 'A'],
      [1, 2, 3],
    ]);
    const t = tableFromHeader(dup, 0);
    expect(t.columns).toEqual(['A', 'B']);
    expect(t.rows[0]?.A?.value).toBe(1);
  });
});

describe('locateTabular + requireColumns', () => {
  it('combines locating and slicing', () => {
    const t = locateTabular(sheet, ['Series', 'Code']);
    expect(t.sheet).toBe('KR');
    expect(t.rows.map((r) => readText(r, 'Series'))).toEqual(['GDP', 'CPI']);
  });

  it('reports every missing column at once', () => {
    const t = locateTabular(sheet, ['Series', 'Code']);
    expect(() => requireColumns(t, ['Series', 'Units', 'Note'])).toThrow(DataValidationError);
    expect(() => requireColumns(t, ['Series', 'Units', 'Note'])).toThrow(
      'Missing required columns: Units, Note'
    );
  });

  it('returns "" for an absent column', () => {
    const t = locateTabular(sheet, ['Series', 'Code']);
    expect(readText(t.rows[0] ?? {}, 'Nope')).toBe('');
  });
});
