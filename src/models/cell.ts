import type { sheets_v4 } from 'googleapis';

import {
  GoogleSheetsCellNotFoundError,
  GoogleSheetsInvalidArgumentError,
  googleErr,
  googleOk,
} from '../errors/index.js';
import type { GoogleWorkspaceResult } from '../errors/index.js';
import { FormatType } from '../types/index.js';
import type { CellDirection, CellValue } from '../types/index.js';
import { Address, GridRange, parseAddress } from './address.js';
import type { AddressInput } from './address.js';
import type { Worksheet } from './worksheet.js';

export interface NumberFormat {
  type: FormatType;
  pattern?: string;
}

/** A relative `[rows, cols]` offset or a direction such as `'bottom'` or `'bottom right'` */
export type NeighbourPosition = [number, number] | CellDirection | string;

function extendedValue(value: sheets_v4.Schema$ExtendedValue | null | undefined): CellValue | undefined {
  if (!value) {
    return undefined;
  }
  if (typeof value.numberValue === 'number') return value.numberValue;
  if (typeof value.boolValue === 'boolean') return value.boolValue;
  if (typeof value.stringValue === 'string') return value.stringValue;
  if (typeof value.formulaValue === 'string') return value.formulaValue;
  return value.errorValue?.message ?? undefined;
}

function toExtendedValue(value: CellValue): sheets_v4.Schema$ExtendedValue {
  if (typeof value === 'number') return { numberValue: value };
  if (typeof value === 'boolean') return { boolValue: value };
  return value.startsWith('=') ? { formulaValue: value } : { stringValue: value };
}

function formatTypeOf(value: string | null | undefined): FormatType | undefined {
  return Object.values(FormatType).find(type => type === value);
}

/**
 * A single cell.
 *
 * A linked cell writes every change to its worksheet as it is made; an
 * unlinked cell is a local scratch object. Row, column and label are all
 * read from one {@link Address}, which moves replace as a whole.
 */
export class Cell {
  private address: Address;
  private worksheetRef?: Worksheet;
  private linkedState: boolean;
  private valueState: CellValue;
  private unformattedValueState: CellValue;
  private formulaState = '';
  private noteState = '';
  private formatState: NumberFormat = { type: FormatType.CUSTOM };

  /** Write values as if typed into the UI */
  parseValue = true;
  /**
   * Simple cells carry a value only. Setting a format or a note, or
   * fetching, turns this off, and later value writes refetch the cell.
   */
  simple = true;

  /**
   * @throws GoogleSheetsInvalidAddressError when `position` is not a single cell
   */
  constructor(position: AddressInput, value: CellValue = '', worksheet?: Worksheet, data?: sheets_v4.Schema$CellData) {
    this.address = Address.from(position);
    this.valueState = value;
    this.unformattedValueState = value;
    this.worksheetRef = worksheet;
    this.linkedState = worksheet !== undefined;
    if (data) {
      this.setJSON(data);
    }
  }

  get row(): number {
    return this.address.row ?? 1;
  }

  get col(): number {
    return this.address.col ?? 1;
  }

  get label(): string {
    return this.address.label;
  }

  get position(): Address {
    return this.address;
  }

  get worksheet(): Worksheet | undefined {
    return this.worksheetRef;
  }

  get linked(): boolean {
    return this.linkedState && this.worksheetRef !== undefined;
  }

  /** Formatted value */
  get value(): CellValue {
    return this.valueState;
  }

  get unformattedValue(): CellValue {
    return this.unformattedValueState;
  }

  get formula(): string {
    return this.formulaState;
  }

  get note(): string {
    return this.noteState;
  }

  get format(): NumberFormat {
    return { ...this.formatState };
  }

  private get gridRange(): GridRange | undefined {
    return this.worksheetRef
      ? new GridRange({ worksheet: this.worksheetRef, start: this.address, end: this.address })
      : undefined;
  }

  async setValue(value: CellValue): Promise<GoogleWorkspaceResult<this>> {
    if (this.linked && this.worksheetRef) {
      const written = await this.worksheetRef.updateValue(this.address, value, this.parseValue);
      if (written.isErr()) {
        return googleErr(written.error);
      }
      this.valueState = value;
      return this.simple ? googleOk(this) : this.fetch();
    }
    this.valueState = value;
    return googleOk(this);
  }

  /**
   * Set a formula; a missing leading `=` is added. Always written with
   * parsing, then the computed value is fetched.
   */
  async setFormula(formula: string): Promise<GoogleWorkspaceResult<this>> {
    const normalized = formula.startsWith('=') ? formula : `=${formula}`;
    this.formulaState = normalized;
    if (!this.linked || !this.worksheetRef) {
      this.valueState = normalized;
      return googleOk(this);
    }

    const written = await this.worksheetRef.updateValue(this.address, normalized, true);
    if (written.isErr()) {
      return googleErr(written.error);
    }
    return this.fetch();
  }

  async setNote(note: string): Promise<GoogleWorkspaceResult<this>> {
    this.noteState = note;
    this.simple = false;
    const result = await this.update();
    return result.map(() => this);
  }

  /**
   * Set the number format. `FormatType.CUSTOM` sends the pattern alone.
   */
  async setFormat(type: FormatType, pattern?: string): Promise<GoogleWorkspaceResult<this>> {
    this.simple = false;
    this.formatState = { type, pattern };
    const range = this.gridRange;
    if (!this.linked || !this.worksheetRef || !range) {
      return googleOk(this);
    }

    const sent = await this.worksheetRef.spreadsheet.dispatch([
      {
        repeatCell: {
          range: range.toJSON(),
          cell: { userEnteredFormat: { numberFormat: this.numberFormatJSON() } },
          fields: 'userEnteredFormat.numberFormat',
        },
      },
    ]);
    if (sent.isErr()) {
      return googleErr(sent.error);
    }
    return this.fetch();
  }

  private numberFormatJSON(): sheets_v4.Schema$NumberFormat {
    const numberFormat: sheets_v4.Schema$NumberFormat = {};
    if (this.formatState.type !== FormatType.CUSTOM) {
      numberFormat.type = this.formatState.type;
    }
    if (this.formatState.pattern !== undefined) {
      numberFormat.pattern = this.formatState.pattern;
    }
    return numberFormat;
  }

  private get hasFormat(): boolean {
    return this.formatState.type !== FormatType.CUSTOM || this.formatState.pattern !== undefined;
  }

  /**
   * Move to another position. A linked cell then reads its new position.
   */
  async moveTo(position: AddressInput): Promise<GoogleWorkspaceResult<this>> {
    const parsed = parseAddress(position);
    if (parsed.isErr()) {
      return googleErr(parsed.error);
    }
    this.address = parsed.value;
    return this.linked ? this.fetch() : googleOk(this);
  }

  setRow(row: number): Promise<GoogleWorkspaceResult<this>> {
    return this.moveTo([row, this.col]);
  }

  setCol(col: number): Promise<GoogleWorkspaceResult<this>> {
    return this.moveTo([this.row, col]);
  }

  setLabel(label: string): Promise<GoogleWorkspaceResult<this>> {
    return this.moveTo(label);
  }

  /**
   * The cell at a relative position, read from the worksheet
   */
  async neighbour(position: NeighbourPosition): Promise<GoogleWorkspaceResult<Cell>> {
    if (!this.linked || !this.worksheetRef) {
      return googleErr(new GoogleSheetsInvalidArgumentError('Neighbours can only be read from a linked cell'));
    }

    let row = this.row;
    let col = this.col;
    if (Array.isArray(position)) {
      row += position[0];
      col += position[1];
    } else {
      if (position.includes('right')) col += 1;
      if (position.includes('left')) col -= 1;
      if (position.includes('top')) row -= 1;
      if (position.includes('bottom')) row += 1;
    }

    const target = parseAddress([row, col]);
    if (target.isErr()) {
      return googleErr(
        new GoogleSheetsCellNotFoundError(
          `No cell at (${row}, ${col})`,
          this.worksheetRef.spreadsheet.id,
          undefined,
          { from: this.label }
        )
      );
    }
    return this.worksheetRef.cell(target.value);
  }

  /**
   * Read value, formula, note and format from the worksheet
   */
  async fetch(): Promise<GoogleWorkspaceResult<this>> {
    if (!this.linked || !this.worksheetRef) {
      return googleErr(new GoogleSheetsInvalidArgumentError('Only a linked cell can be fetched'));
    }
    this.simple = false;
    const data = await this.worksheetRef.cellData(this.address);
    return data.map(cellData => this.setJSON(cellData ?? {}));
  }

  /**
   * Push note and number format
   */
  async update(): Promise<GoogleWorkspaceResult<void>> {
    const range = this.gridRange;
    if (!this.linked || !this.worksheetRef || !range) {
      return googleOk(undefined);
    }
    this.simple = false;

    const cell: sheets_v4.Schema$CellData = { note: this.noteState };
    const fields = ['note'];
    if (this.hasFormat) {
      cell.userEnteredFormat = { numberFormat: this.numberFormatJSON() };
      fields.unshift('userEnteredFormat.numberFormat');
    }

    const sent = await this.worksheetRef.spreadsheet.dispatch([
      { repeatCell: { range: range.toJSON(), cell, fields: fields.join(',') } },
    ]);
    return sent.map(() => undefined);
  }

  /**
   * Link to `worksheet` (or the one already set) and optionally push
   * note and format
   */
  async link(worksheet?: Worksheet, update = false): Promise<GoogleWorkspaceResult<this>> {
    const target = worksheet ?? this.worksheetRef;
    if (!target) {
      return googleErr(new GoogleSheetsInvalidArgumentError('Worksheet not set for uplink'));
    }
    this.worksheetRef = target;
    this.linkedState = true;
    if (!update) {
      return googleOk(this);
    }
    const result = await this.update();
    return result.map(() => this);
  }

  unlink(): this {
    this.linkedState = false;
    return this;
  }

  /** `CellData` with the value, format and note of this cell */
  toJSON(): sheets_v4.Schema$CellData {
    const data: sheets_v4.Schema$CellData = {
      userEnteredValue: this.formulaState ? { formulaValue: this.formulaState } : toExtendedValue(this.valueState),
    };
    if (this.hasFormat) {
      data.userEnteredFormat = { numberFormat: this.numberFormatJSON() };
    }
    if (this.noteState) {
      data.note = this.noteState;
    }
    return data;
  }

  setJSON(data: sheets_v4.Schema$CellData): this {
    this.valueState = data.formattedValue ?? '';
    this.unformattedValueState = extendedValue(data.effectiveValue) ?? '';
    this.formulaState = data.userEnteredValue?.formulaValue ?? '';
    this.noteState = data.note ?? '';

    const numberFormat = data.userEnteredFormat?.numberFormat;
    if (numberFormat) {
      this.formatState = {
        type: formatTypeOf(numberFormat.type) ?? FormatType.CUSTOM,
        pattern: numberFormat.pattern ?? undefined,
      };
    }
    return this;
  }

  equals(other: Cell): boolean {
    if (this.worksheetRef && other.worksheetRef && !this.worksheetRef.equals(other.worksheetRef)) {
      return false;
    }
    return this.label === other.label;
  }

  toString(): string {
    return `<Cell ${this.label} ${JSON.stringify(this.valueState)}>`;
  }
}
