import { Address, GridRange, parseAddress, WorksheetRef } from './address.js';
import { GoogleSheetsInvalidAddressError, GoogleSheetsInvalidArgumentError } from '../errors/index.js';

const sheet: WorksheetRef = { id: 42, title: 'Sheet1', rows: 100, cols: 26 };

describe('Address', () => {
  it.each([
    ['A1', 1, 1],
    ['Z1', 1, 26],
    ['AA3', 3, 27],
    ['AZ10', 10, 52],
    ['BA2', 2, 53],
    ['ZZ1', 1, 702],
    ['AAA7', 7, 703],
  ])('maps %s to (%d, %d) and back', (label, row, col) => {
    const fromLabel = Address.from(label);
    expect(fromLabel.index).toEqual([row, col]);
    expect(Address.from([row, col]).label).toBe(label);
  });

  it('uppercases lowercase labels', () => {
    expect(Address.from('ab12').label).toBe('AB12');
  });

  it('rejects partial addresses unless allowed', () => {
    expect(() => Address.from('A')).toThrow('Not a valid cell label format: A.');
    expect(() => Address.from([null, 2])).toThrow(GoogleSheetsInvalidAddressError);

    const column = Address.from('C', true);
    expect(column.index).toEqual([null, 3]);
    expect(column.label).toBe('C');
    expect(Address.from('5', true).label).toBe('5');
  });

  it('rejects coordinates below one', () => {
    expect(() => Address.from([0, 1])).toThrow('Address coordinates may not be below zero: (0, 1)');
    expect(() => Address.from('A0', true)).toThrow('Address coordinates may not be below zero: (0, 1)');
  });

  it('rejects malformed labels', () => {
    expect(() => Address.from('1A')).toThrow('Not a valid cell label format: 1A.');
    expect(() => Address.from('A1:B2')).toThrow('Not a valid cell label format: A1:B2.');
  });

  it('offsets by tuples and addresses', () => {
    const base = Address.from('B2');
    expect(base.add([3, 0]).label).toBe('B5');
    expect(base.add(Address.from('A1')).label).toBe('C3');
    expect(base.subtract([1, 1]).label).toBe('A1');
    expect(() => base.subtract([2, 0])).toThrow(GoogleSheetsInvalidAddressError);
  });

  it('keeps unbounded parts when offsetting', () => {
    expect(Address.from('C', true).add([5, 1]).label).toBe('D');
  });

  it('compares against labels, tuples and addresses', () => {
    const address = Address.from([4, 4]);
    expect(address.equals('D4')).toBe(true);
    expect(address.equals([4, 4])).toBe(true);
    expect(address.equals(Address.from('D4'))).toBe(true);
    expect(address.equals('D5')).toBe(false);
  });

  it('replaces a single part', () => {
    expect(Address.from('C3').withRow(10).label).toBe('C10');
    expect(Address.from('C3').withCol(1).label).toBe('A3');
  });

  it('parseAddress returns a Result', () => {
    expect(parseAddress('B7')._unsafeUnwrap().index).toEqual([7, 2]);

    const failed = parseAddress('7B');
    expect(failed.isErr()).toBe(true);
    expect(failed._unsafeUnwrapErr()).toBeInstanceOf(GoogleSheetsInvalidAddressError);
  });
});

describe('GridRange', () => {
  it('builds a quoted label', () => {
    const range = new GridRange({ worksheet: sheet, start: 'A1', end: 'D4' });
    expect(range.label).toBe("'Sheet1'!A1:D4");
    expect(range.a1).toBe('A1:D4');
  });

  it('escapes quotes in titles', () => {
    const range = new GridRange({ worksheetTitle: "Bob's", start: 'A1', end: 'B2' });
    expect(range.label).toBe("'Bob''s'!A1:B2");
    expect(GridRange.fromLabel("'Bob''s'!A1:B2").worksheetTitle).toBe("Bob's");
  });

  it('omits the title prefix when there is none', () => {
    expect(new GridRange({ start: 'B2', end: 'C3' }).label).toBe('B2:C3');
  });

  it('parses labels with unbounded parts', () => {
    const columns = GridRange.fromLabel('Data!A:C');
    expect(columns.worksheetTitle).toBe('Data');
    expect(columns.start.index).toEqual([null, 1]);
    expect(columns.end.index).toEqual([null, 3]);
    expect(columns.label).toBe("'Data'!A:C");
  });

  it('unbounds both ends on the same axis', () => {
    const range = new GridRange({ worksheet: sheet, start: 'A', end: 'D4' });
    expect(range.a1).toBe('A:D');
  });

  it('rejects ends unbounded on different axes', () => {
    expect(() => new GridRange({ start: 'A', end: '4' })).toThrow(
      'Invalid indexes set. Indexes should be unbounded at same axes.'
    );
  });

  it('rejects a start after the end', () => {
    expect(() => new GridRange({ start: 'C3', end: 'A1' })).toThrow('Range start C3 lies after its end A1');
  });

  it('fills an open end from the worksheet extent', () => {
    const range = new GridRange({ worksheet: sheet, start: 'B2' });
    expect(range.end.label).toBe('Z100');
    expect(range.label).toBe("'Sheet1'!B2:Z100");
  });

  it('converts to API JSON with 0-based, end-exclusive indexes', () => {
    const range = new GridRange({ worksheet: sheet, start: 'B2', end: 'D5' });
    expect(range.toJSON()).toEqual({
      sheetId: 42,
      startRowIndex: 1,
      startColumnIndex: 1,
      endRowIndex: 5,
      endColumnIndex: 4,
    });
  });

  it('omits unbounded parts from JSON', () => {
    const range = new GridRange({ worksheet: sheet, start: 'A', end: 'B' });
    expect(range.toJSON()).toEqual({ sheetId: 42, startColumnIndex: 0, endColumnIndex: 2 });
    expect(new GridRange({ worksheet: sheet }).toJSON()).toEqual({ sheetId: 42 });
  });

  it('requires a worksheet id for JSON', () => {
    expect(() => new GridRange({ start: 'A1', end: 'B2' }).toJSON()).toThrow(GoogleSheetsInvalidArgumentError);
  });

  it('reads API JSON', () => {
    const range = GridRange.fromJSON({
      sheetId: 7,
      startRowIndex: 0,
      endRowIndex: 3,
      startColumnIndex: 2,
      endColumnIndex: 4,
    });
    expect(range.worksheetId).toBe(7);
    expect(range.a1).toBe('C1:D3');
  });

  it('creates from the supported inputs', () => {
    expect(GridRange.create('A1:B2', sheet).label).toBe("'Sheet1'!A1:B2");
    expect(GridRange.create(['C3', [4, 4]], sheet).a1).toBe('C3:D4');
    expect(GridRange.create({ sheetId: 42, startRowIndex: 0, endRowIndex: 1 }, sheet).a1).toBe('1:1');
  });

  it('reports size and membership', () => {
    const range = new GridRange({ worksheet: sheet, start: 'B2', end: 'D5' });
    expect(range.height).toBe(4);
    expect(range.width).toBe(3);
    expect(range.contains('C3')).toBe(true);
    expect(range.contains('E3')).toBe(false);
    expect(range.contains([1, 2])).toBe(false);
  });

  it('iterates addresses row by row', () => {
    const range = new GridRange({ worksheet: sheet, start: 'A1', end: 'B2' });
    expect([...range].map(address => address.label)).toEqual(['A1', 'B1', 'A2', 'B2']);
  });
});
