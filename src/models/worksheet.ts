import type { sheets_v4 } from 'googleapis';

import {
  GoogleSheetsBatchModeError,
  GoogleSheetsCellNotFoundError,
  GoogleSheetsError,
  GoogleSheetsInvalidArgumentError,
  GoogleSheetsInvalidRangeError,
  GoogleSheetsRangeNotFoundError,
  googleErr,
  googleOk,
} from '../errors/index.js';
import type { GoogleWorkspaceResult } from '../errors/index.js';
import { ChartType, ExportType, ValueRenderOption } from '../types/index.js';
import type { CellInput, CellValue, Dimension, SortOrder } from '../types/index.js';
import { maxLineLength, numericiseAll, padRows, toCellValue } from '../utils/value.utils.js';
import { Address, GridRange, parseAddress } from './address.js';
import type { AddressInput, WorksheetRef } from './address.js';
import { Cell } from './cell.js';
import { Chart } from './chart.js';
import type { RangePair } from './chart.js';
import { DataRange } from './data-range.js';
import { DeveloperMetadata } from './developer-metadata.js';
import type { ReplaceOptions, Spreadsheet } from './spreadsheet.js';

export interface GetValuesOptions {
  majorDimension?: Dimension;
  /** Pad every line to the longest one */
  includeTailingEmpty?: boolean;
  /** Return the exact rectangle, empty cells included */
  includeAll?: boolean;
  valueRender?: ValueRenderOption;
}

export interface GetCellsOptions {
  majorDimension?: Dimension;
  includeAll?: boolean;
}

export interface UpdateValuesOptions {
  majorDimension?: Dimension;
  parse?: boolean;
  /** Grow the worksheet when the values reach past its extent */
  extend?: boolean;
}

export interface InsertOptions {
  number?: number;
  values?: CellInput[] | CellInput[][];
  /** Take dimension properties from the line before instead of after */
  inherit?: boolean;
}

export interface AppendTableOptions {
  start?: AddressInput;
  end?: AddressInput;
  dimension?: Dimension;
  overwrite?: boolean;
}

export interface SortRangeOptions {
  /** 0-based index of the column to sort by */
  baseColumnIndex?: number;
  sortOrder?: SortOrder;
}

export interface FindOptions {
  /** Strings default to true; patterns only match whole values when set */
  matchEntireCell?: boolean;
  /** Defaults to true; ignored for patterns */
  caseSensitive?: boolean;
}

export interface AddChartOptions {
  title?: string;
  chartType?: ChartType;
  anchorCell?: AddressInput;
}

export interface WorksheetExportOptions {
  path?: string;
  /** File name without extension; default is the worksheet id */
  filename?: string;
}

/** Properties pushed by {@link Worksheet.sync} */
const SYNC_FIELDS = [
  'title',
  'index',
  'gridProperties/rowCount',
  'gridProperties/columnCount',
  'gridProperties/frozenRowCount',
  'gridProperties/frozenColumnCount',
].join(',');

function toMatrix(values: CellInput[] | CellInput[][]): CellInput[][] {
  const lines: CellInput[][] = [];
  const single: CellInput[] = [];
  for (const value of values) {
    if (Array.isArray(value)) {
      lines.push(value);
    } else {
      single.push(value);
    }
  }
  return lines.length > 0 ? lines : [single];
}

function asSheetsError<T>(build: () => T): GoogleWorkspaceResult<T> {
  try {
    return googleOk(build());
  } catch (error) {
    if (error instanceof GoogleSheetsError) {
      return googleErr(error);
    }
    throw error;
  }
}

/**
 * One worksheet (tab) of a spreadsheet.
 *
 * Property setters change the local copy and, while linked, send an
 * `updateSheetProperties` request with the matching field mask.
 */
export class Worksheet implements WorksheetRef {
  private json: sheets_v4.Schema$Sheet;
  private linkedState = true;

  constructor(
    readonly spreadsheet: Spreadsheet,
    json: sheets_v4.Schema$Sheet
  ) {
    this.json = json;
  }

  private get properties(): sheets_v4.Schema$SheetProperties {
    this.json.properties ??= {};
    return this.json.properties;
  }

  private get gridProperties(): sheets_v4.Schema$GridProperties {
    this.properties.gridProperties ??= {};
    return this.properties.gridProperties;
  }

  get id(): number {
    return this.json.properties?.sheetId ?? 0;
  }

  get index(): number {
    return this.json.properties?.index ?? 0;
  }

  get title(): string {
    return this.json.properties?.title ?? '';
  }

  get rows(): number {
    return this.json.properties?.gridProperties?.rowCount ?? 0;
  }

  get cols(): number {
    return this.json.properties?.gridProperties?.columnCount ?? 0;
  }

  get frozenRows(): number {
    return this.json.properties?.gridProperties?.frozenRowCount ?? 0;
  }

  get frozenCols(): number {
    return this.json.properties?.gridProperties?.frozenColumnCount ?? 0;
  }

  get url(): string {
    return `${this.spreadsheet.url}#gid=${this.id}`;
  }

  get linked(): boolean {
    return this.linkedState;
  }

  get charts(): sheets_v4.Schema$EmbeddedChart[] {
    return this.json.charts ?? [];
  }

  toJSON(): sheets_v4.Schema$Sheet {
    return this.json;
  }

  setJSON(json: sheets_v4.Schema$Sheet): void {
    this.json = json;
  }

  private async pushProperties(fields: string): Promise<GoogleWorkspaceResult<void>> {
    if (!this.linkedState) {
      return googleOk(undefined);
    }
    const result = await this.spreadsheet.dispatch([
      { updateSheetProperties: { properties: this.properties, fields } },
    ]);
    return result.map(() => undefined);
  }

  setIndex(index: number): Promise<GoogleWorkspaceResult<void>> {
    this.properties.index = index;
    return this.pushProperties('index');
  }

  setTitle(title: string): Promise<GoogleWorkspaceResult<void>> {
    this.properties.title = title;
    return this.pushProperties('title');
  }

  setRows(rows: number): Promise<GoogleWorkspaceResult<void>> {
    this.gridProperties.rowCount = rows;
    return this.pushProperties('gridProperties/rowCount');
  }

  setCols(cols: number): Promise<GoogleWorkspaceResult<void>> {
    this.gridProperties.columnCount = cols;
    return this.pushProperties('gridProperties/columnCount');
  }

  setFrozenRows(rows: number): Promise<GoogleWorkspaceResult<void>> {
    this.gridProperties.frozenRowCount = rows;
    return this.pushProperties('gridProperties/frozenRowCount');
  }

  setFrozenCols(cols: number): Promise<GoogleWorkspaceResult<void>> {
    this.gridProperties.frozenColumnCount = cols;
    return this.pushProperties('gridProperties/frozenColumnCount');
  }

  /** Set both extents with one request */
  resize(rows: number = this.rows, cols: number = this.cols): Promise<GoogleWorkspaceResult<void>> {
    this.gridProperties.rowCount = rows;
    this.gridProperties.columnCount = cols;
    return this.pushProperties('gridProperties/rowCount,gridProperties/columnCount');
  }

  addRows(count: number): Promise<GoogleWorkspaceResult<void>> {
    return this.resize(this.rows + count, this.cols);
  }

  addCols(count: number): Promise<GoogleWorkspaceResult<void>> {
    return this.resize(this.rows, this.cols + count);
  }

  /**
   * Link again. With `syncToCloud` local properties are pushed, otherwise
   * they are replaced by the remote ones.
   */
  async link(syncToCloud = true): Promise<GoogleWorkspaceResult<void>> {
    this.linkedState = true;
    if (syncToCloud) {
      return this.sync();
    }
    const refreshed = await this.refresh();
    return refreshed.map(() => undefined);
  }

  unlink(): void {
    this.linkedState = false;
  }

  /** Push every local property */
  async sync(): Promise<GoogleWorkspaceResult<void>> {
    const result = await this.spreadsheet.dispatch([
      { updateSheetProperties: { properties: this.properties, fields: SYNC_FIELDS } },
    ]);
    return result.map(() => undefined);
  }

  async refresh(): Promise<GoogleWorkspaceResult<this>> {
    const result = await this.spreadsheet.refresh();
    return result.map(() => this);
  }

  /**
   * A range on this worksheet from an A1 label or a pair of addresses
   *
   * @throws GoogleSheetsInvalidAddressError
   */
  gridRange(range: string | [AddressInput, AddressInput]): GridRange {
    return GridRange.create(range, this);
  }

  private rangeOf(start: AddressInput, end: AddressInput): GoogleWorkspaceResult<GridRange> {
    return asSheetsError(() => new GridRange({ worksheet: this, start, end }));
  }

  /**
   * Values of the rectangle from `start` to `end`
   */
  async getValues(
    start: AddressInput,
    end: AddressInput,
    options: GetValuesOptions = {}
  ): Promise<GoogleWorkspaceResult<CellValue[][]>> {
    const range = this.rangeOf(start, end);
    if (range.isErr()) {
      return googleErr(range.error);
    }
    const majorDimension = options.majorDimension ?? 'ROWS';
    const result = await this.spreadsheet.client.sheets.valuesGet(this.spreadsheet.id, range.value.label, {
      majorDimension,
      valueRenderOption: options.valueRender ?? ValueRenderOption.FORMATTED_VALUE,
    });
    if (result.isErr()) {
      return googleErr(result.error);
    }

    const values = (result.value.values ?? []).map(line => line.map(toCellValue));
    if (options.includeAll) {
      const byRows = majorDimension === 'ROWS';
      const lineCount = byRows ? range.value.height : range.value.width;
      const lineWidth = byRows ? range.value.width : range.value.height;
      const padded = padRows(values, lineWidth, '');
      while (padded.length < lineCount) {
        padded.push(Array<CellValue>(lineWidth).fill(''));
      }
      return googleOk(padded);
    }
    if (options.includeTailingEmpty ?? true) {
      return googleOk(padRows(values, maxLineLength(values), ''));
    }
    return googleOk(values);
  }

  /**
   * Cells of a rectangle with value, formula, note and format
   */
  async getCells(
    start: AddressInput,
    end: AddressInput,
    options: GetCellsOptions = {}
  ): Promise<GoogleWorkspaceResult<Cell[][]>> {
    const range = this.rangeOf(start, end);
    if (range.isErr()) {
      return googleErr(range.error);
    }
    const [topLeft, bottomRight] = range.value.boundedIndexes();
    const rowData = await this.rowData(range.value.label);
    if (rowData.isErr()) {
      return googleErr(rowData.error);
    }

    const firstRow = topLeft.row ?? 1;
    const firstCol = topLeft.col ?? 1;
    const cells = rowData.value.map((row, r) =>
      (row.values ?? []).map((data, c) => new Cell([firstRow + r, firstCol + c], '', this, data))
    );

    const columns = options.majorDimension === 'COLUMNS';
    if (!options.includeAll && !columns) {
      return googleOk(cells);
    }

    const height = (bottomRight.row ?? firstRow) - firstRow + 1;
    const width = (bottomRight.col ?? firstCol) - firstCol + 1;
    const grid: Cell[][] = [];
    for (let r = 0; r < height; r++) {
      const line: Cell[] = [];
      for (let c = 0; c < width; c++) {
        line.push(cells[r]?.[c] ?? new Cell([firstRow + r, firstCol + c], '', this));
      }
      grid.push(line);
    }
    if (!columns) {
      return googleOk(grid);
    }
    return googleOk(Array.from({ length: width }, (_, c) => grid.map(line => line[c])));
  }

  private async rowData(label: string): Promise<GoogleWorkspaceResult<sheets_v4.Schema$RowData[]>> {
    const result = await this.spreadsheet.client.sheets.get(this.spreadsheet.id, {
      ranges: [label],
      fields: 'sheets/data/rowData',
      includeGridData: true,
    });
    return result.map(json => json.sheets?.[0]?.data?.[0]?.rowData ?? []);
  }

  /**
   * Raw `CellData` at one address; `undefined` for a cell never written
   */
  async cellData(position: AddressInput): Promise<GoogleWorkspaceResult<sheets_v4.Schema$CellData | undefined>> {
    const range = this.rangeOf(position, position);
    if (range.isErr()) {
      return googleErr(range.error);
    }
    const rowData = await this.rowData(range.value.label);
    return rowData
      .map(rows => rows[0]?.values?.[0] ?? undefined)
      .mapErr(error => this.outsideGrid(error, range.value.label));
  }

  private outsideGrid<E extends Error>(error: E, label: string): E | GoogleSheetsCellNotFoundError {
    if (error instanceof GoogleSheetsInvalidRangeError || /exceeds grid limits/.test(error.message)) {
      return new GoogleSheetsCellNotFoundError(`Cell ${label} lies outside the worksheet grid`, this.spreadsheet.id, label);
    }
    return error;
  }

  /**
   * The linked cell at `position`
   */
  async cell(position: AddressInput): Promise<GoogleWorkspaceResult<Cell>> {
    const address = parseAddress(position);
    if (address.isErr()) {
      return googleErr(address.error);
    }
    const data = await this.cellData(address.value);
    return data.map(cellData => new Cell(address.value, '', this, cellData ?? {}));
  }

  async getValue(position: AddressInput, valueRender?: ValueRenderOption): Promise<GoogleWorkspaceResult<CellValue>> {
    const values = await this.getValues(position, position, { includeTailingEmpty: false, valueRender });
    return values.map(matrix => matrix[0]?.[0] ?? '');
  }

  /**
   * A data range over an A1 range such as `A1:C4`, with its cells loaded
   */
  async range(a1Range: string): Promise<GoogleWorkspaceResult<DataRange>> {
    const range = asSheetsError(() => this.gridRange(a1Range));
    if (range.isErr()) {
      return googleErr(range.error);
    }
    const [start, end] = range.value.boundedIndexes();
    const cells = await this.getCells(start, end, { includeAll: true });
    return cells.map(data => new DataRange(start, end, this, { data }));
  }

  getAllValues(options: GetValuesOptions = {}): Promise<GoogleWorkspaceResult<CellValue[][]>> {
    return this.getValues([1, 1], [Math.max(this.rows, 1), Math.max(this.cols, 1)], options);
  }

  /**
   * Rows below the `head` row as objects keyed by the head row's values.
   * Values are numericised and empty cells become `emptyValue`.
   */
  async getAllRecords(
    options: { emptyValue?: CellValue; head?: number } = {}
  ): Promise<GoogleWorkspaceResult<Array<Record<string, CellValue>>>> {
    const emptyValue = options.emptyValue ?? '';
    const headIndex = (options.head ?? 1) - 1;
    const values = await this.getAllValues({ includeTailingEmpty: true });

    return values.map(matrix => {
      const keys = (matrix[headIndex] ?? []).map(String);
      return matrix.slice(headIndex + 1).map(row => {
        const numeric = numericiseAll(row, emptyValue);
        return Object.fromEntries(keys.map((key, i) => [key, numeric[i] ?? emptyValue]));
      });
    });
  }

  async getRow(row: number, options: GetValuesOptions = {}): Promise<GoogleWorkspaceResult<CellValue[]>> {
    const values = await this.getValues([row, 1], [row, Math.max(this.cols, 1)], { ...options, majorDimension: 'ROWS' });
    return values.map(matrix => matrix[0] ?? []);
  }

  async getCol(col: number, options: GetValuesOptions = {}): Promise<GoogleWorkspaceResult<CellValue[]>> {
    const values = await this.getValues([1, col], [Math.max(this.rows, 1), col], {
      ...options,
      majorDimension: 'COLUMNS',
    });
    return values.map(matrix => matrix[0] ?? []);
  }

  updateValue(position: AddressInput, value: CellInput, parse?: boolean): Promise<GoogleWorkspaceResult<void>> {
    return this.updateValues(position, [[value]], { parse });
  }

  /**
   * Write a matrix of values. `range` is an A1 range, or a start address
   * from which the end is worked out from the values. `null` leaves a cell
   * unchanged.
   */
  async updateValues(
    range: AddressInput,
    values: CellInput[][],
    options: UpdateValuesOptions = {}
  ): Promise<GoogleWorkspaceResult<void>> {
    const majorDimension = options.majorDimension ?? 'ROWS';
    const target = asSheetsError(() => {
      if (typeof range === 'string' && range.includes(':')) {
        return this.gridRange(range);
      }
      const start = Address.from(range);
      const lines = values.length;
      const width = maxLineLength(values);
      const end =
        majorDimension === 'ROWS'
          ? start.add([Math.max(lines, 1) - 1, Math.max(width, 1) - 1])
          : start.add([Math.max(width, 1) - 1, Math.max(lines, 1) - 1]);
      return new GridRange({ worksheet: this, start, end });
    });
    if (target.isErr()) {
      return googleErr(target.error);
    }

    if (options.extend) {
      const grown = await this.growTo(target.value.end);
      if (grown.isErr()) {
        return googleErr(grown.error);
      }
    }

    return this.spreadsheet.writeValues([{ range: target.value.label, majorDimension, values }], options.parse);
  }

  private async growTo(end: Address): Promise<GoogleWorkspaceResult<void>> {
    const refreshed = await this.refresh();
    if (refreshed.isErr()) {
      return googleErr(refreshed.error);
    }
    const rows = Math.max(this.rows, end.row ?? 0);
    const cols = Math.max(this.cols, end.col ?? 0);
    if (rows === this.rows && cols === this.cols) {
      return googleOk(undefined);
    }
    return this.resize(rows, cols);
  }

  /**
   * Write the values of several cells with one call covering their
   * bounding box; positions without a cell are left unchanged
   */
  async updateCells(cells: Cell[], parse?: boolean): Promise<GoogleWorkspaceResult<void>> {
    if (cells.length === 0) {
      return googleOk(undefined);
    }
    let [minRow, minCol] = [cells[0].row, cells[0].col];
    let [maxRow, maxCol] = [minRow, minCol];
    for (const cell of cells) {
      minRow = Math.min(minRow, cell.row);
      minCol = Math.min(minCol, cell.col);
      maxRow = Math.max(maxRow, cell.row);
      maxCol = Math.max(maxCol, cell.col);
    }

    const values: CellInput[][] = Array.from({ length: maxRow - minRow + 1 }, () =>
      Array<CellInput>(maxCol - minCol + 1).fill(null)
    );
    for (const cell of cells) {
      values[cell.row - minRow][cell.col - minCol] = cell.formula || cell.value;
    }

    const range = `${Address.from([minRow, minCol]).label}:${Address.from([maxRow, maxCol]).label}`;
    return this.updateValues(range, values, { parse });
  }

  /**
   * Write rows starting at row `index`, skipping `colOffset` columns
   */
  updateRow(index: number, values: CellInput[] | CellInput[][], colOffset = 0): Promise<GoogleWorkspaceResult<void>> {
    const rows = toMatrix(values);
    return this.updateValues([index, colOffset + 1], rows, { majorDimension: 'ROWS' });
  }

  /**
   * Write columns starting at column `index`, skipping `rowOffset` rows
   */
  updateCol(index: number, values: CellInput[] | CellInput[][], rowOffset = 0): Promise<GoogleWorkspaceResult<void>> {
    const cols = toMatrix(values);
    return this.updateValues([rowOffset + 1, index], cols, { majorDimension: 'COLUMNS' });
  }

  /**
   * Append after the table found between `start` and `end`. Sent at once,
   * also in batch mode.
   */
  async appendTable(
    values: CellInput[] | CellInput[][],
    options: AppendTableOptions = {}
  ): Promise<GoogleWorkspaceResult<sheets_v4.Schema$AppendValuesResponse>> {
    const range = this.rangeOf(options.start ?? 'A1', options.end ?? [Math.max(this.rows, 1), Math.max(this.cols, 1)]);
    if (range.isErr()) {
      return googleErr(range.error);
    }
    return this.spreadsheet.client.sheets.valuesAppend(this.spreadsheet.id, range.value.label, toMatrix(values), {
      majorDimension: options.dimension ?? 'ROWS',
      insertDataOption: options.overwrite ? 'OVERWRITE' : 'INSERT_ROWS',
    });
  }

  private async insertDimension(
    dimension: Dimension,
    after: number,
    options: InsertOptions
  ): Promise<GoogleWorkspaceResult<void>> {
    const count = options.number ?? 1;
    if (count < 1) {
      return googleErr(new GoogleSheetsInvalidArgumentError(`Cannot insert ${count} ${dimension.toLowerCase()}`));
    }
    const result = await this.spreadsheet.dispatch([
      {
        insertDimension: {
          inheritFromBefore: options.inherit ?? false,
          range: { sheetId: this.id, dimension, startIndex: after, endIndex: after + count },
        },
      },
    ]);
    if (result.isErr()) {
      return googleErr(result.error);
    }

    if (dimension === 'ROWS') {
      this.gridProperties.rowCount = this.rows + count;
    } else {
      this.gridProperties.columnCount = this.cols + count;
    }
    if (!options.values) {
      return googleOk(undefined);
    }
    return dimension === 'ROWS' ? this.updateRow(after + 1, options.values) : this.updateCol(after + 1, options.values);
  }

  /** Insert rows after row `row` (0 inserts at the top) and fill them */
  insertRows(row: number, options: InsertOptions = {}): Promise<GoogleWorkspaceResult<void>> {
    return this.insertDimension('ROWS', row, options);
  }

  insertCols(col: number, options: InsertOptions = {}): Promise<GoogleWorkspaceResult<void>> {
    return this.insertDimension('COLUMNS', col, options);
  }

  private async deleteDimension(dimension: Dimension, index: number, count: number): Promise<GoogleWorkspaceResult<void>> {
    if (count < 1) {
      return googleErr(new GoogleSheetsInvalidArgumentError(`Cannot delete ${count} ${dimension.toLowerCase()}`));
    }
    const result = await this.spreadsheet.dispatch([
      {
        deleteDimension: {
          range: { sheetId: this.id, dimension, startIndex: index - 1, endIndex: index - 1 + count },
        },
      },
    ]);
    if (result.isErr()) {
      return googleErr(result.error);
    }
    if (dimension === 'ROWS') {
      this.gridProperties.rowCount = this.rows - count;
    } else {
      this.gridProperties.columnCount = this.cols - count;
    }
    return googleOk(undefined);
  }

  /** Delete `count` rows starting at row `index` (1-based) */
  deleteRows(index: number, count = 1): Promise<GoogleWorkspaceResult<void>> {
    return this.deleteDimension('ROWS', index, count);
  }

  deleteCols(index: number, count = 1): Promise<GoogleWorkspaceResult<void>> {
    return this.deleteDimension('COLUMNS', index, count);
  }

  /**
   * Clear `fields` (values by default) from `start` to `end`, or to the
   * end of the worksheet
   */
  async clear(
    start: AddressInput = 'A1',
    end?: AddressInput,
    fields = 'userEnteredValue'
  ): Promise<GoogleWorkspaceResult<void>> {
    const range = this.rangeOf(start, end ?? [Math.max(this.rows, 1), Math.max(this.cols, 1)]);
    if (range.isErr()) {
      return googleErr(range.error);
    }
    const json = asSheetsError(() => range.value.toJSON());
    if (json.isErr()) {
      return googleErr(json.error);
    }
    const result = await this.spreadsheet.dispatch([{ updateCells: { range: json.value, fields } }]);
    return result.map(() => undefined);
  }

  private async resizeDimension(
    dimension: Dimension,
    start: number,
    end: number | undefined,
    pixelSize: number
  ): Promise<GoogleWorkspaceResult<void>> {
    const endIndex = end === undefined || end <= start ? start + 1 : end;
    const result = await this.spreadsheet.dispatch([
      {
        updateDimensionProperties: {
          range: { sheetId: this.id, dimension, startIndex: start, endIndex },
          properties: { pixelSize },
          fields: 'pixelSize',
        },
      },
    ]);
    return result.map(() => undefined);
  }

  /** Set the width of columns `start` (0-based) up to `end` (exclusive) */
  adjustColumnWidth(start: number, end?: number, pixelSize = 100): Promise<GoogleWorkspaceResult<void>> {
    return this.resizeDimension('COLUMNS', start, end, pixelSize);
  }

  adjustRowHeight(start: number, end?: number, pixelSize = 100): Promise<GoogleWorkspaceResult<void>> {
    return this.resizeDimension('ROWS', start, end, pixelSize);
  }

  async sortRange(
    start: AddressInput,
    end: AddressInput,
    options: SortRangeOptions = {}
  ): Promise<GoogleWorkspaceResult<void>> {
    const range = this.rangeOf(start, end);
    if (range.isErr()) {
      return googleErr(range.error);
    }
    const result = await this.spreadsheet.dispatch([
      {
        sortRange: {
          range: range.value.toJSON(),
          sortSpecs: [{ dimensionIndex: options.baseColumnIndex ?? 0, sortOrder: options.sortOrder ?? 'ASCENDING' }],
        },
      },
    ]);
    return result.map(() => undefined);
  }

  /** Copy this worksheet into another spreadsheet */
  copyTo(spreadsheetId: string): Promise<GoogleWorkspaceResult<sheets_v4.Schema$SheetProperties>> {
    return this.spreadsheet.client.sheets.copyTo(this.spreadsheet.id, this.id, spreadsheetId);
  }

  replace(
    pattern: string,
    replacement: string,
    options: Omit<ReplaceOptions, 'range' | 'sheetId'> = {}
  ): Promise<GoogleWorkspaceResult<sheets_v4.Schema$FindReplaceResponse | null>> {
    return this.spreadsheet.replace(pattern, replacement, { ...options, sheetId: this.id });
  }

  /**
   * Cells whose value matches `pattern`. A string matches the whole value,
   * case-sensitively, unless `matchEntireCell` or `caseSensitive` is false.
   */
  async find(pattern: string | RegExp, options: FindOptions = {}): Promise<GoogleWorkspaceResult<Cell[]>> {
    const values = await this.getAllValues({ includeTailingEmpty: false });
    if (values.isErr()) {
      return googleErr(values.error);
    }

    const matchEntireCell = options.matchEntireCell ?? true;
    const caseSensitive = options.caseSensitive ?? true;
    // global and sticky flags would carry lastIndex from one cell to the next
    const regex = pattern instanceof RegExp ? new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, '')) : undefined;
    const matches = (text: string): boolean => {
      if (regex) {
        const match = regex.exec(text);
        return match !== null && (options.matchEntireCell !== true || match[0] === text);
      }
      const needle = caseSensitive ? String(pattern) : String(pattern).toLowerCase();
      const haystack = caseSensitive ? text : text.toLowerCase();
      return matchEntireCell ? haystack === needle : haystack.includes(needle);
    };

    const found: Cell[] = [];
    values.value.forEach((row, r) =>
      row.forEach((value, c) => {
        if (value !== '' && matches(String(value))) {
          found.push(new Cell([r + 1, c + 1], value, this));
        }
      })
    );
    return googleOk(found);
  }

  /**
   * Name the range from `start` to `end`. The id is unset when the request
   * was queued.
   */
  async createNamedRange(name: string, start: AddressInput, end: AddressInput): Promise<GoogleWorkspaceResult<DataRange>> {
    const range = this.rangeOf(start, end);
    if (range.isErr()) {
      return googleErr(range.error);
    }
    const result = await this.spreadsheet.dispatch([
      { addNamedRange: { namedRange: { name, range: range.value.toJSON() } } },
    ]);
    return result.map(outcome => {
      const nameId = outcome.queued
        ? undefined
        : (outcome.response.replies?.[0]?.addNamedRange?.namedRange?.namedRangeId ?? undefined);
      return new DataRange(range.value.start, range.value.end, this, { name, nameId });
    });
  }

  private namedRangesHere(name?: string): sheets_v4.Schema$NamedRange[] {
    return this.spreadsheet
      .namedRanges()
      .filter(named => (named.range?.sheetId ?? 0) === this.id && (name === undefined || named.name === name));
  }

  /**
   * The named range `name` on this worksheet; refreshes once on a miss
   */
  async getNamedRange(name: string): Promise<GoogleWorkspaceResult<DataRange>> {
    let found = this.namedRangesHere(name);
    if (found.length === 0) {
      const refreshed = await this.refresh();
      if (refreshed.isErr()) {
        return googleErr(refreshed.error);
      }
      found = this.namedRangesHere(name);
    }
    if (found.length === 0) {
      return googleErr(new GoogleSheetsRangeNotFoundError(`Named range ${name} not found`, this.spreadsheet.id));
    }
    return asSheetsError(() => DataRange.fromNamedRange(this, found[0]));
  }

  async getNamedRanges(): Promise<GoogleWorkspaceResult<DataRange[]>> {
    const refreshed = await this.refresh();
    if (refreshed.isErr()) {
      return googleErr(refreshed.error);
    }
    return asSheetsError(() => this.namedRangesHere().map(named => DataRange.fromNamedRange(this, named)));
  }

  async deleteNamedRange(name: string, rangeId?: string): Promise<GoogleWorkspaceResult<void>> {
    let namedRangeId = rangeId;
    if (!namedRangeId) {
      const named = await this.getNamedRange(name);
      if (named.isErr()) {
        return googleErr(named.error);
      }
      namedRangeId = named.value.nameId;
    }
    const result = await this.spreadsheet.dispatch([{ deleteNamedRange: { namedRangeId } }]);
    return result.map(() => undefined);
  }

  /**
   * Protect the range from `start` to `end`. Resolves to `null` when queued.
   */
  async createProtectedRange(
    start: AddressInput,
    end: AddressInput
  ): Promise<GoogleWorkspaceResult<sheets_v4.Schema$ProtectedRange | null>> {
    const range = this.rangeOf(start, end);
    if (range.isErr()) {
      return googleErr(range.error);
    }
    const result = await this.spreadsheet.dispatch(
      [{ addProtectedRange: { protectedRange: { range: range.value.toJSON() } } }],
      'replies/addProtectedRange'
    );
    return result.map(outcome =>
      outcome.queued ? null : (outcome.response.replies?.[0]?.addProtectedRange?.protectedRange ?? null)
    );
  }

  async removeProtectedRange(protectedRangeId: number): Promise<GoogleWorkspaceResult<void>> {
    const result = await this.spreadsheet.dispatch([{ deleteProtectedRange: { protectedRangeId } }]);
    return result.map(() => undefined);
  }

  /**
   * A data range without fetching its cells
   */
  dataRange(start: AddressInput, end: AddressInput): GoogleWorkspaceResult<DataRange> {
    return asSheetsError(() => new DataRange(start, end, this));
  }

  /**
   * Add a chart of `ranges` over `domain`. Not available in batch mode,
   * since the chart id comes from the reply.
   */
  async addChart(
    domain: RangePair,
    ranges: RangePair[],
    options: AddChartOptions = {}
  ): Promise<GoogleWorkspaceResult<Chart>> {
    return Chart.create(this, domain, ranges, {
      title: options.title,
      chartType: options.chartType ?? ChartType.COLUMN,
      anchorCell: options.anchorCell,
    });
  }

  async getCharts(): Promise<GoogleWorkspaceResult<Chart[]>> {
    const refreshed = await this.refresh();
    if (refreshed.isErr()) {
      return googleErr(refreshed.error);
    }
    return asSheetsError(() => this.charts.map(json => Chart.fromJSON(this, json)));
  }

  createDeveloperMetadata(key: string, value: string): Promise<GoogleWorkspaceResult<DeveloperMetadata | null>> {
    return DeveloperMetadata.create(this.spreadsheet, key, value, this.id);
  }

  getDeveloperMetadata(key?: string): Promise<GoogleWorkspaceResult<DeveloperMetadata[]>> {
    return DeveloperMetadata.search(this.spreadsheet, key, this.id);
  }

  /**
   * Download this worksheet. The export covers the first worksheet only,
   * so any other worksheet is moved to the front for the download and
   * then put back. Resolves to the path written.
   */
  async export(format: ExportType = ExportType.CSV, options: WorksheetExportOptions = {}): Promise<GoogleWorkspaceResult<string>> {
    if (this.spreadsheet.batchMode) {
      return googleErr(new GoogleSheetsBatchModeError('export', this.spreadsheet.id));
    }
    const filename = options.filename ?? String(this.id);
    const originalIndex = this.index;
    if (originalIndex === 0) {
      return this.spreadsheet.downloadTo(format, filename, options.path);
    }

    const moved = await this.moveTo(0);
    if (moved.isErr()) {
      return googleErr(moved.error);
    }
    const written = await this.spreadsheet.downloadTo(format, filename, options.path);
    const restored = await this.moveTo(originalIndex);
    if (written.isErr()) {
      return written;
    }
    return restored.map(() => written.value);
  }

  private async moveTo(index: number): Promise<GoogleWorkspaceResult<void>> {
    const result = await this.spreadsheet.dispatch([
      { updateSheetProperties: { properties: { sheetId: this.id, index }, fields: 'index' } },
    ]);
    return result.map(() => undefined);
  }

  equals(other: Worksheet): boolean {
    return this.id === other.id && this.spreadsheet.id === other.spreadsheet.id;
  }

  toString(): string {
    return `<Worksheet ${JSON.stringify(this.title)} index:${this.index}>`;
  }
}
