import { numericise, numericiseAll, toCellValue, padRows, maxLineLength } from './value.utils.js';

describe('numericise', () => {
  it('converts integers and decimals', () => {
    expect(numericise('3')).toBe(3);
    expect(numericise('-12')).toBe(-12);
    expect(numericise('3.1')).toBe(3.1);
    expect(numericise('.5')).toBe(0.5);
    expect(numericise('1e3')).toBe(1000);
  });

  it('keeps integers too large to hold exactly as strings', () => {
    expect(numericise('12345678901234567890')).toBe('12345678901234567890');
    expect(numericise('9007199254740991')).toBe(9007199254740991);
  });

  it('keeps other strings', () => {
    expect(numericise('faa')).toBe('faa');
    expect(numericise('12abc')).toBe('12abc');
    expect(numericise('1,000')).toBe('1,000');
  });

  it('replaces empty strings with the empty value', () => {
    expect(numericise('')).toBe('');
    expect(numericise('', 0)).toBe(0);
    expect(numericise('', null)).toBeNull();
  });

  it('passes numbers and booleans through', () => {
    expect(numericise(4)).toBe(4);
    expect(numericise(true)).toBe(true);
  });

  it('numericiseAll maps every value', () => {
    expect(numericiseAll(['1', 'x', ''], 0)).toEqual([1, 'x', 0]);
  });
});

describe('matrix helpers', () => {
  it('toCellValue maps missing values to empty strings', () => {
    expect(toCellValue(undefined)).toBe('');
    expect(toCellValue(null)).toBe('');
    expect(toCellValue(2)).toBe(2);
  });

  it('padRows pads short rows', () => {
    expect(padRows([['a'], ['b', 'c']], 3, '')).toEqual([
      ['a', '', ''],
      ['b', 'c', ''],
    ]);
  });

  it('maxLineLength finds the longest row', () => {
    expect(maxLineLength([['a'], ['b', 'c', 'd'], []])).toBe(3);
    expect(maxLineLength([])).toBe(0);
  });

  it('maxLineLength handles more rows than a call can take as arguments', () => {
    const rows = Array.from({ length: 300_000 }, (_, i) => (i === 299_999 ? ['x', 'y'] : ['x']));
    expect(maxLineLength(rows)).toBe(2);
  });
});
