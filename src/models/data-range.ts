import type { sheets_v4 } from 'googleapis';

import { GoogleSheetsError, GoogleSheetsInvalidArgumentError, googleErr, googleOk } from '../errors/index.js';
import type { GoogleWorkspaceResult } from '../errors/index.js';
import { BORDER_STYLES } from '../types/index.js';
import type { BorderStyle, CellInput, MergeType, SortOrder } from '../types/index.js';
import { Address, GridRange } from './address.js';
import type { AddressInput } from './address.js';
import type { Cell } from './cell.js';
import type { Worksheet } from './worksheet.js';

export interface DataRangeOptions {
  name?: string;
  nameId?: string;
  protectedRange?: sheets_v4.Schema$ProtectedRange;
  data?: Cell[][];
}

export interface BorderOptions {
  top?: boolean;
  right?: boolean;
  bottom?: boolean;
  left?: boolean;
  innerHorizontal?: boolean;
  innerVertical?: boolean;
  style?: BorderStyle;
  width?: number;
  /** Colour channels between 0 and 1 */
  red?: number;
  green?: number;
  blue?: number;
}

const DEFAULT_FORMAT_FIELDS = 'userEnteredFormat,hyperlink,note,textFormatRuns,dataValidation,pivotTable';

const BORDER_SIDES = ['top', 'right', 'bottom', 'left', 'innerHorizontal', 'innerVertical'] as const;

/**
 * A rectangle of cells that may be named or protected.
 *
 * Nothing is fetched on construction; `fetch` loads the cells.
 */
export class DataRange {
  private startState: Address;
  private endState: Address;
  private nameState: string;
  private nameIdState?: string;
  private protectedJSON?: sheets_v4.Schema$ProtectedRange;
  private cellsState: Cell[][];
  private linkedState = true;

  /**
   * @throws GoogleSheetsInvalidAddressError
   */
  constructor(start: AddressInput, end: AddressInput, readonly worksheet: Worksheet, options: DataRangeOptions = {}) {
    this.startState = Address.from(start);
    this.endState = Address.from(end);
    this.nameState = options.name ?? '';
    this.nameIdState = options.nameId;
    this.protectedJSON = options.protectedRange;
    this.cellsState = options.data ?? [];
  }

  /**
   * @throws GoogleSheetsInvalidArgumentError when the range lies on no known worksheet
   */
  static fromNamedRange(worksheet: Worksheet, json: sheets_v4.Schema$NamedRange): DataRange {
    const [start, end] = GridRange.fromJSON(json.range ?? {}).withWorksheet(worksheet).boundedIndexes();
    return new DataRange(start, end, worksheet, {
      name: json.name ?? '',
      nameId: json.namedRangeId ?? undefined,
    });
  }

  static fromProtectedRange(worksheet: Worksheet, json: sheets_v4.Schema$ProtectedRange): DataRange {
    const [start, end] = GridRange.fromJSON(json.range ?? {}).withWorksheet(worksheet).boundedIndexes();
    return new DataRange(start, end, worksheet, { protectedRange: json });
  }

  get name(): string {
    return this.nameState;
  }

  get nameId(): string | undefined {
    return this.nameIdState;
  }

  get protectId(): number | undefined {
    return this.protectedJSON?.protectedRangeId ?? undefined;
  }

  get protected(): boolean {
    return this.protectedJSON !== undefined;
  }

  get editors(): sheets_v4.Schema$Editors | undefined {
    return this.protectedJSON?.editors ?? undefined;
  }

  get requestingUserCanEdit(): boolean {
    return this.protectedJSON?.requestingUserCanEdit ?? true;
  }

  get startAddress(): Address {
    return this.startState;
  }

  get endAddress(): Address {
    return this.endState;
  }

  get range(): GridRange {
    return new GridRange({ worksheet: this.worksheet, start: this.startState, end: this.endState });
  }

  get cells(): Cell[][] {
    return this.cellsState;
  }

  get linked(): boolean {
    return this.linkedState;
  }

  /**
   * Rename. An empty name removes the named range; a range without a name
   * id is created as a named range.
   */
  async setName(name: string): Promise<GoogleWorkspaceResult<this>> {
    if (!name) {
      const id = this.nameIdState;
      this.nameState = '';
      this.nameIdState = undefined;
      if (!this.linkedState || !id) {
        return googleOk(this);
      }
      const deleted = await this.worksheet.deleteNamedRange('', id);
      return deleted.map(() => this);
    }

    this.nameState = name;
    if (!this.linkedState) {
      return googleOk(this);
    }
    if (!this.nameIdState) {
      const created = await this.worksheet.createNamedRange(name, this.startState, this.endState);
      return created.map(named => {
        this.nameIdState = named.nameId;
        return this;
      });
    }
    const updated = await this.updateNamedRange();
    return updated.map(() => this);
  }

  /**
   * Protect or unprotect the range
   */
  async setProtected(value: boolean): Promise<GoogleWorkspaceResult<this>> {
    if (value === this.protected) {
      return googleOk(this);
    }
    if (!value) {
      const id = this.protectId;
      this.protectedJSON = undefined;
      if (!this.linkedState || id === undefined) {
        return googleOk(this);
      }
      const removed = await this.worksheet.removeProtectedRange(id);
      return removed.map(() => this);
    }

    if (!this.linkedState) {
      this.protectedJSON = { range: this.range.toJSON() };
      return googleOk(this);
    }
    const created = await this.worksheet.createProtectedRange(this.startState, this.endState);
    return created.map(json => {
      this.protectedJSON = json ?? { range: this.range.toJSON() };
      return this;
    });
  }

  /**
   * Replace the editors of a protected range
   */
  async setEditors(editors: sheets_v4.Schema$Editors): Promise<GoogleWorkspaceResult<this>> {
    if (!this.protectedJSON) {
      return googleErr(new GoogleSheetsInvalidArgumentError('Editors can only be set on a protected range'));
    }
    this.protectedJSON.editors = editors;
    const result = await this.updateProtectedRange('editors');
    return result.map(() => this);
  }

  async setRequestingUserCanEdit(value: boolean): Promise<GoogleWorkspaceResult<this>> {
    if (!this.protectedJSON) {
      return googleErr(new GoogleSheetsInvalidArgumentError('Only a protected range has editing rights'));
    }
    this.protectedJSON.requestingUserCanEdit = value;
    const result = await this.updateProtectedRange('requestingUserCanEdit');
    return result.map(() => this);
  }

  async setStartAddress(start: AddressInput): Promise<GoogleWorkspaceResult<this>> {
    const moved = this.moved(start, this.endState);
    if (moved.isErr()) {
      return googleErr(moved.error);
    }
    this.startState = moved.value[0];
    const result = await this.updateNamedRange();
    return result.map(() => this);
  }

  async setEndAddress(end: AddressInput): Promise<GoogleWorkspaceResult<this>> {
    const moved = this.moved(this.startState, end);
    if (moved.isErr()) {
      return googleErr(moved.error);
    }
    this.endState = moved.value[1];
    const result = await this.updateNamedRange();
    return result.map(() => this);
  }

  private moved(start: AddressInput, end: AddressInput): GoogleWorkspaceResult<[Address, Address]> {
    try {
      const range = new GridRange({ worksheet: this.worksheet, start, end });
      return googleOk<[Address, Address]>([range.start, range.end]);
    } catch (error) {
      if (error instanceof GoogleSheetsError) {
        return googleErr(error);
      }
      throw error;
    }
  }

  /**
   * Link the range and its cells, pushing local state when `update` is set
   */
  async link(update = true): Promise<GoogleWorkspaceResult<this>> {
    this.linkedState = true;
    for (const row of this.cellsState) {
      for (const cell of row) {
        const linked = await cell.link(this.worksheet);
        if (linked.isErr()) {
          return googleErr(linked.error);
        }
      }
    }
    if (!update) {
      return googleOk(this);
    }
    const result = await this.updateNamedRange();
    return result.map(() => this);
  }

  unlink(): this {
    this.linkedState = false;
    for (const row of this.cellsState) {
      for (const cell of row) {
        cell.unlink();
      }
    }
    return this;
  }

  /** Load every cell of the range */
  async fetch(): Promise<GoogleWorkspaceResult<this>> {
    const cells = await this.worksheet.getCells(this.startState, this.endState, { includeAll: true });
    return cells.map(data => {
      this.cellsState = data;
      return this;
    });
  }

  /**
   * Copy the format of `cell` onto every cell of the range
   */
  async applyFormat(cell: Cell, fields: string = DEFAULT_FORMAT_FIELDS): Promise<GoogleWorkspaceResult<void>> {
    if (!this.linkedState) {
      return googleOk(undefined);
    }
    const result = await this.worksheet.spreadsheet.dispatch([
      { repeatCell: { range: this.range.toJSON(), cell: cell.toJSON(), fields } },
    ]);
    return result.map(() => undefined);
  }

  /**
   * Write `values`, or the values of the loaded cells
   */
  updateValues(values?: CellInput[][]): Promise<GoogleWorkspaceResult<void>> {
    const matrix = values ?? this.cellsState.map(row => row.map(cell => cell.formula || cell.value));
    return this.worksheet.updateValues(this.range.a1, matrix);
  }

  /**
   * Sort by the column `baseColumn` places to the right of the range start
   */
  sort(baseColumn = 0, sortOrder: SortOrder = 'ASCENDING'): Promise<GoogleWorkspaceResult<void>> {
    return this.worksheet.sortRange(this.startState, this.endState, {
      baseColumnIndex: baseColumn + (this.startState.col ?? 1) - 1,
      sortOrder,
    });
  }

  /**
   * Push name and bounds; a protected range is pushed first
   */
  async updateNamedRange(): Promise<GoogleWorkspaceResult<void>> {
    if (!this.linkedState) {
      return googleOk(undefined);
    }
    if (this.protectedJSON) {
      const updated = await this.updateProtectedRange();
      if (updated.isErr()) {
        return googleErr(updated.error);
      }
    }
    if (!this.nameIdState) {
      return googleOk(undefined);
    }
    const result = await this.worksheet.spreadsheet.dispatch([
      {
        updateNamedRange: {
          namedRange: { namedRangeId: this.nameIdState, name: this.nameState, range: this.range.toJSON() },
          fields: '*',
        },
      },
    ]);
    return result.map(() => undefined);
  }

  async updateProtectedRange(fields = '*'): Promise<GoogleWorkspaceResult<void>> {
    if (!this.linkedState || !this.protectedJSON) {
      return googleOk(undefined);
    }
    this.protectedJSON.range = this.range.toJSON();
    const result = await this.worksheet.spreadsheet.dispatch([
      { updateProtectedRange: { protectedRange: this.protectedJSON, fields } },
    ]);
    return result.map(() => undefined);
  }

  /**
   * Draw borders on the chosen sides. Nothing is sent when no side is set.
   */
  async updateBorders(options: BorderOptions = {}): Promise<GoogleWorkspaceResult<void>> {
    const sides = BORDER_SIDES.filter(side => options[side]);
    if (sides.length === 0) {
      return googleOk(undefined);
    }
    const style = options.style ?? 'NONE';
    if (!BORDER_STYLES.includes(style)) {
      return googleErr(
        new GoogleSheetsInvalidArgumentError(`${String(style)} is not a valid border style`, {
          styles: BORDER_STYLES.join(','),
        })
      );
    }

    const border: sheets_v4.Schema$Border = {
      style,
      width: options.width ?? 1,
      color: { red: options.red ?? 0, green: options.green ?? 0, blue: options.blue ?? 0 },
    };
    const request: sheets_v4.Schema$UpdateBordersRequest = { range: this.range.toJSON() };
    for (const side of sides) {
      request[side] = border;
    }
    const result = await this.worksheet.spreadsheet.dispatch([{ updateBorders: request }]);
    return result.map(() => undefined);
  }

  /**
   * Merge the range; `NONE` unmerges it
   */
  async mergeCells(mergeType: MergeType = 'MERGE_ALL'): Promise<GoogleWorkspaceResult<void>> {
    const range = this.range.toJSON();
    const request: sheets_v4.Schema$Request =
      mergeType === 'NONE' ? { unmergeCells: { range } } : { mergeCells: { range, mergeType } };
    const result = await this.worksheet.spreadsheet.dispatch([request]);
    return result.map(() => undefined);
  }

  toString(): string {
    const name = this.nameState ? ` ${this.nameState}` : '';
    return `<DataRange${name} ${this.range.label}>`;
  }
}
