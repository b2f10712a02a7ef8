/**
 * A1 address notation
 *
 * `Address` is an immutable (row, col) pair with 1-based indexes; either part
 * may be `null` (unbounded) when explicitly allowed, so that `"A"` (a whole
 * column) and `"3"` (a whole row) can be represented. `GridRange` is a
 * rectangle of addresses on one worksheet.
 */

import { Result } from 'neverthrow';
import type { sheets_v4 } from 'googleapis';
import {
  GoogleSheetsError,
  GoogleSheetsInvalidAddressError,
  GoogleSheetsInvalidArgumentError,
} from '../errors/index.js';
import type { AddressTuple } from '../types/index.js';

export type AddressInput = string | AddressTuple | Address;

const LABEL_PATTERN = /^([A-Za-z]*)(\d*)$/;
const CHAR_OFFSET = 64;

function columnToLetters(col: number): string {
  let label = '';
  let div = col;
  while (div > 0) {
    let mod = div % 26;
    div = Math.floor(div / 26);
    if (mod === 0) {
      mod = 26;
      div -= 1;
    }
    label = String.fromCharCode(mod + CHAR_OFFSET) + label;
  }
  return label;
}

function lettersToColumn(letters: string): number {
  let col = 0;
  for (let i = 0; i < letters.length; i++) {
    col += (letters.charCodeAt(letters.length - 1 - i) - CHAR_OFFSET) * 26 ** i;
  }
  return col;
}

export class Address {
  private constructor(
    public readonly row: number | null,
    public readonly col: number | null
  ) {}

  /**
   * Build an address from a label, a `[row, col]` tuple or another address.
   *
   * @throws GoogleSheetsInvalidAddressError
   */
  static from(value: AddressInput, allowNonSingle = false): Address {
    if (value instanceof Address) {
      return Address.validated(value.row, value.col, allowNonSingle);
    }
    if (typeof value === 'string') {
      return Address.fromLabel(value, allowNonSingle);
    }
    const [row, col] = value;
    for (const part of value) {
      if (part !== null && !Number.isInteger(part)) {
        throw new GoogleSheetsInvalidAddressError(
          `Address coordinates must be integers: (${row}, ${col})`
        );
      }
    }
    return Address.validated(row, col, allowNonSingle);
  }

  /** Address unbounded on both axes */
  static unbounded(): Address {
    return new Address(null, null);
  }

  private static fromLabel(label: string, allowNonSingle: boolean): Address {
    const match = LABEL_PATTERN.exec(label);
    const letters = match ? match[1].toUpperCase() : '';
    const digits = match ? match[2] : '';
    const row = digits ? parseInt(digits, 10) : null;
    const col = letters ? lettersToColumn(letters) : null;

    if (!match || (!allowNonSingle && !(row && col))) {
      throw new GoogleSheetsInvalidAddressError(`Not a valid cell label format: ${label}.`, { label });
    }
    return Address.validated(row, col, allowNonSingle);
  }

  private static validated(row: number | null, col: number | null, allowNonSingle: boolean): Address {
    if (!allowNonSingle && (row === null || col === null)) {
      throw new GoogleSheetsInvalidAddressError(
        'Address cannot be unbounded if allowNonSingle is not set.',
        { row, col }
      );
    }
    if ((row !== null && row < 1) || (col !== null && col < 1)) {
      throw new GoogleSheetsInvalidAddressError(
        `Address coordinates may not be below zero: (${row}, ${col})`,
        { row, col }
      );
    }
    return new Address(row, col);
  }

  /** Label in A1 notation; `"A"` or `"3"` for partially unbounded addresses */
  get label(): string {
    const colLabel = this.col !== null ? columnToLetters(this.col) : '';
    const rowLabel = this.row !== null ? String(this.row) : '';
    return `${colLabel}${rowLabel}`;
  }

  get index(): AddressTuple {
    return [this.row, this.col];
  }

  get isBounded(): boolean {
    return this.row !== null && this.col !== null;
  }

  get isUnbounded(): boolean {
    return this.row === null && this.col === null;
  }

  withRow(row: number | null): Address {
    return Address.from([row, this.col], row === null || this.col === null);
  }

  withCol(col: number | null): Address {
    return Address.from([this.row, col], this.row === null || col === null);
  }

  /**
   * Offset by another address or tuple. Unbounded parts stay unbounded.
   */
  add(other: AddressTuple | Address): Address {
    return this.offset(other, 1);
  }

  subtract(other: AddressTuple | Address): Address {
    return this.offset(other, -1);
  }

  private offset(other: AddressTuple | Address, sign: 1 | -1): Address {
    const [dRow, dCol] = other instanceof Address ? other.index : other;
    const row = this.row === null ? null : this.row + sign * (dRow ?? 0);
    const col = this.col === null ? null : this.col + sign * (dCol ?? 0);
    return Address.from([row, col], !this.isBounded);
  }

  /**
   * Compare with another address, a label or a tuple
   */
  equals(other: AddressInput): boolean {
    if (typeof other === 'string') {
      return this.label === other;
    }
    if (other instanceof Address) {
      return this.label === other.label;
    }
    return this.row === other[0] && this.col === other[1];
  }

  toString(): string {
    return this.label;
  }
}

function toAddressError(error: unknown): GoogleSheetsError {
  if (error instanceof GoogleSheetsError) {
    return error;
  }
  return new GoogleSheetsInvalidAddressError(error instanceof Error ? error.message : String(error));
}

/**
 * Result-returning variant of `Address.from`
 */
export const parseAddress = Result.fromThrowable(
  (value: AddressInput, allowNonSingle: boolean = false): Address => Address.from(value, allowNonSingle),
  toAddressError
);

/**
 * Minimal view of a worksheet a range can be attached to
 */
export interface WorksheetRef {
  readonly id: number;
  readonly title: string;
  readonly rows: number;
  readonly cols: number;
}

export interface GridRangeOptions {
  worksheet?: WorksheetRef;
  worksheetTitle?: string;
  worksheetId?: number;
  start?: AddressInput | null;
  end?: AddressInput | null;
}

function quoteTitle(title: string): string {
  return `'${title.replace(/'/g, "''")}'`;
}

function unquoteTitle(title: string): string {
  if (title.length >= 2 && title.startsWith("'") && title.endsWith("'")) {
    return title.slice(1, -1).replace(/''/g, "'");
  }
  return title;
}

/**
 * Rectangular range of cells on a worksheet. Indexes are 1-based and
 * inclusive. A missing part means the range is unbounded on that side:
 * `A:B`, `A1:B3` and `1:2` are valid, `A:1` is not.
 */
export class GridRange {
  private readonly worksheet?: WorksheetRef;
  private readonly worksheetTitleValue?: string;
  private readonly worksheetIdValue?: number;
  private readonly startValue: Address;
  private readonly endValue: Address;

  constructor(options: GridRangeOptions = {}) {
    this.worksheet = options.worksheet;
    this.worksheetTitleValue = options.worksheetTitle;
    this.worksheetIdValue = options.worksheetId;

    const [start, end] = GridRange.constrain(
      options.start ? Address.from(options.start, true) : Address.unbounded(),
      options.end ? Address.from(options.end, true) : Address.unbounded()
    );
    this.startValue = start;
    this.endValue = end;
  }

  /**
   * If one end is unbounded on an axis, the other end becomes unbounded on it.
   */
  private static constrain(start: Address, end: Address): [Address, Address] {
    if (start.isUnbounded || end.isUnbounded) {
      return [start, end];
    }

    const mismatched =
      (start.row !== null && start.col === null && end.row === null && end.col !== null) ||
      (start.row === null && start.col !== null && end.row !== null && end.col === null);
    if (mismatched) {
      throw new GoogleSheetsInvalidAddressError(
        'Invalid indexes set. Indexes should be unbounded at same axes.',
        { start: start.label, end: end.label }
      );
    }

    let s = start;
    let e = end;
    if (s.row === null || e.row === null) {
      s = Address.from([null, s.col], true);
      e = Address.from([null, e.col], true);
    } else if (s.col === null || e.col === null) {
      s = Address.from([s.row, null], true);
      e = Address.from([e.row, null], true);
    }

    if ((s.row !== null && e.row !== null && s.row > e.row) || (s.col !== null && e.col !== null && s.col > e.col)) {
      throw new GoogleSheetsInvalidAddressError(
        `Range start ${s.label} lies after its end ${e.label}`,
        { start: s.label, end: e.label }
      );
    }
    return [s, e];
  }

  /**
   * Parse `'Sheet Title'!A1:B3`, `Sheet1!A:A`, `A1:B3` or `A1`
   */
  static fromLabel(label: string, options: Omit<GridRangeOptions, 'start' | 'end'> = {}): GridRange {
    const separator = label.lastIndexOf('!');
    const title = separator >= 0 ? unquoteTitle(label.slice(0, separator)) : options.worksheetTitle;
    const rest = separator >= 0 ? label.slice(separator + 1) : label;
    const [startLabel, endLabel] = rest.split(':');

    return new GridRange({
      ...options,
      worksheetTitle: title,
      start: startLabel ? startLabel : null,
      end: endLabel ? endLabel : null,
    });
  }

  static fromJSON(json: sheets_v4.Schema$GridRange, options: Omit<GridRangeOptions, 'start' | 'end'> = {}): GridRange {
    const plusOne = (value: number | null | undefined): number | null =>
      value === null || value === undefined ? null : value + 1;
    const orNull = (value: number | null | undefined): number | null => value ?? null;

    return new GridRange({
      ...options,
      worksheetId: json.sheetId ?? options.worksheetId,
      start: [plusOne(json.startRowIndex), plusOne(json.startColumnIndex)],
      end: [orNull(json.endRowIndex), orNull(json.endColumnIndex)],
    });
  }

  /**
   * Create a range from a label, a `[start, end]` pair, API JSON or another range
   */
  static create(
    data: string | GridRange | sheets_v4.Schema$GridRange | [AddressInput, AddressInput],
    worksheet?: WorksheetRef
  ): GridRange {
    if (data instanceof GridRange) {
      return worksheet ? data.withWorksheet(worksheet) : data;
    }
    if (typeof data === 'string') {
      return GridRange.fromLabel(data, { worksheet });
    }
    if (Array.isArray(data)) {
      return new GridRange({ worksheet, start: data[0], end: data[1] });
    }
    return GridRange.fromJSON(data, { worksheet });
  }

  withWorksheet(worksheet: WorksheetRef): GridRange {
    return new GridRange({ worksheet, start: this.startValue, end: this.endValue });
  }

  get worksheetId(): number | undefined {
    return this.worksheet ? this.worksheet.id : this.worksheetIdValue;
  }

  get worksheetTitle(): string | undefined {
    return this.worksheet ? this.worksheet.title : this.worksheetTitleValue;
  }

  /** Top left address */
  get start(): Address {
    if (this.startValue.isUnbounded && !this.endValue.isUnbounded) {
      return Address.from([this.endValue.row === null ? null : 1, this.endValue.col === null ? null : 1], true);
    }
    return this.startValue;
  }

  /** Bottom right address; an open end extends to the worksheet's extent */
  get end(): Address {
    if (this.endValue.isUnbounded && !this.startValue.isUnbounded) {
      if (!this.worksheet) {
        throw new GoogleSheetsInvalidArgumentError('worksheet is required for unbounded ranges');
      }
      return Address.from(
        [
          this.startValue.row === null ? null : this.worksheet.rows,
          this.startValue.col === null ? null : this.worksheet.cols,
        ],
        true
      );
    }
    return this.endValue;
  }

  /** `A1:B3` without the worksheet title */
  get a1(): string {
    const start = this.start;
    if (start.isUnbounded && this.endValue.isUnbounded) {
      return '';
    }
    return `${start.label}:${this.end.label}`;
  }

  /** `'Title'!A1:B3` */
  get label(): string {
    const title = this.worksheetTitle;
    const a1 = this.a1;
    if (!title) {
      return a1;
    }
    return a1 ? `${quoteTitle(title)}!${a1}` : quoteTitle(title);
  }

  /**
   * Bounded corners, filling open parts from the worksheet extent
   */
  boundedIndexes(): [Address, Address] {
    const start = this.start;
    const end = this.startValue.isUnbounded && this.endValue.isUnbounded ? Address.unbounded() : this.end;

    if (!this.worksheet && (end.row === null || end.col === null)) {
      throw new GoogleSheetsInvalidArgumentError('Worksheet not set for calculating size.');
    }
    return [
      Address.from([start.row ?? 1, start.col ?? 1]),
      Address.from([end.row ?? this.worksheet?.rows ?? 1, end.col ?? this.worksheet?.cols ?? 1]),
    ];
  }

  get height(): number {
    const [start, end] = this.boundedIndexes();
    return (end.row ?? 0) - (start.row ?? 0) + 1;
  }

  get width(): number {
    const [start, end] = this.boundedIndexes();
    return (end.col ?? 0) - (start.col ?? 0) + 1;
  }

  contains(value: AddressInput): boolean {
    const address = Address.from(value);
    const [start, end] = this.boundedIndexes();
    const row = address.row ?? 0;
    const col = address.col ?? 0;
    return (
      (start.row ?? 1) <= row &&
      row <= (end.row ?? Infinity) &&
      (start.col ?? 1) <= col &&
      col <= (end.col ?? Infinity)
    );
  }

  /**
   * API representation with 0-based, end-exclusive indexes
   */
  toJSON(): sheets_v4.Schema$GridRange {
    const sheetId = this.worksheetId;
    if (sheetId === undefined) {
      throw new GoogleSheetsInvalidArgumentError('worksheet id not set for this range.');
    }
    const json: sheets_v4.Schema$GridRange = { sheetId };
    if (this.startValue.isUnbounded && this.endValue.isUnbounded) {
      return json;
    }
    const start = this.start;
    const end = this.end;
    if (start.row !== null) json.startRowIndex = start.row - 1;
    if (start.col !== null) json.startColumnIndex = start.col - 1;
    if (end.row !== null) json.endRowIndex = end.row;
    if (end.col !== null) json.endColumnIndex = end.col;
    return json;
  }

  equals(other: GridRange | string): boolean {
    return this.label === (typeof other === 'string' ? other : other.label);
  }

  *[Symbol.iterator](): IterableIterator<Address> {
    const [start, end] = this.boundedIndexes();
    for (let r = start.row ?? 1; r <= (end.row ?? 0); r++) {
      for (let c = start.col ?? 1; c <= (end.col ?? 0); c++) {
        yield Address.from([r, c]);
      }
    }
  }

  toString(): string {
    return this.label;
  }
}
