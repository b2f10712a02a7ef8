import { OAuth2Client } from 'google-auth-library';
import { google, sheets_v4 } from 'googleapis';

import {
  GoogleService,
  GoogleServiceRetryConfig,
  GoogleServiceTimeoutConfig,
  ServiceContext,
} from './base/google-service.js';
import type { AuthClientSource } from './auth/auth-provider.interface.js';
import {
  GoogleSheetsError,
  GoogleSheetsInvalidArgumentError,
  GoogleWorkspaceResult,
  GoogleErrorFactory,
  googleErr,
  googleOk,
} from '../errors/index.js';
import { CELL_UPDATE_LIMIT } from '../config/index.js';
import { DateTimeRenderOption, ValueInputOption, ValueRenderOption } from '../types/index.js';
import type { Dimension, ValueRangeInput, CellInput } from '../types/index.js';
import { GridRange } from '../models/address.js';
import { createServiceLogger, Logger } from '../utils/logger.js';
import { maxLineLength } from '../utils/value.utils.js';

export interface GetSpreadsheetOptions {
  fields?: string;
  ranges?: string[];
  includeGridData?: boolean;
}

export interface ValuesGetOptions {
  majorDimension?: Dimension;
  valueRenderOption?: ValueRenderOption;
  dateTimeRenderOption?: DateTimeRenderOption;
}

export interface ValuesAppendOptions {
  majorDimension?: Dimension;
  inputOption?: ValueInputOption;
  insertDataOption?: 'OVERWRITE' | 'INSERT_ROWS';
}

/**
 * Google Sheets API v4 wrapper
 *
 * Each method is one REST call (value writes may be split into several).
 * Failures come back as `Err` after the base class has retried transient
 * errors.
 */
export class SheetsService extends GoogleService {
  private readonly authSource: AuthClientSource;
  private sheetsApi?: sheets_v4.Sheets;
  private initializingPromise: Promise<GoogleWorkspaceResult<void>> | null = null;
  private readonly cellLimit: number;

  constructor(
    authSource: AuthClientSource,
    logger?: Logger,
    retryConfig?: GoogleServiceRetryConfig,
    timeoutConfig?: GoogleServiceTimeoutConfig,
    cellLimit: number = CELL_UPDATE_LIMIT
  ) {
    super(new OAuth2Client(), logger ?? createServiceLogger('sheets-service'), retryConfig, timeoutConfig);
    this.authSource = authSource;
    this.cellLimit = cellLimit;
  }

  public getServiceName(): string {
    return 'SheetsService';
  }

  public getServiceVersion(): string {
    return 'v4';
  }

  public async initialize(): Promise<GoogleWorkspaceResult<void>> {
    if (this.sheetsApi) {
      return googleOk(undefined);
    }
    if (this.initializingPromise) {
      return this.initializingPromise;
    }

    const context = this.createContext('initialize');
    this.initializingPromise = this.executeWithRetry(async () => {
      const authResult = await this.authSource.getAuthClient();
      if (authResult.isErr()) {
        throw authResult.error;
      }

      this.auth = authResult.value;
      this.sheetsApi = google.sheets({ version: 'v4', auth: authResult.value });
      this.logger.info('Sheets service initialized successfully', {
        service: this.getServiceName(),
        version: this.getServiceVersion(),
      });
    }, context);

    try {
      return await this.initializingPromise;
    } finally {
      this.initializingPromise = null;
    }
  }

  public async healthCheck(): Promise<GoogleWorkspaceResult<boolean>> {
    const result = await this.initialize();
    if (result.isErr()) {
      this.logger.error('Sheets health check failed', { error: result.error.toJSON() });
      return googleErr(result.error);
    }
    return googleOk(true);
  }

  /**
   * Apply `requests` atomically, in order. Replies mirror the requests.
   */
  public async batchUpdate(
    spreadsheetId: string,
    requests: sheets_v4.Schema$Request[],
    fields = '*'
  ): Promise<GoogleWorkspaceResult<sheets_v4.Schema$BatchUpdateSpreadsheetResponse>> {
    const context = this.createContext('batchUpdate', { spreadsheetId, requestCount: requests.length });

    return this.executeAsyncWithRetry(async () => {
      const sheets = await this.ensureInitialized();
      const response = await sheets.spreadsheets.batchUpdate({
        spreadsheetId,
        fields,
        requestBody: { requests },
      });
      this.logger.debug('Applied batch update', {
        spreadsheetId,
        requestCount: requests.length,
        requestId: context.requestId,
      });
      return response.data;
    }, context);
  }

  /**
   * Create a spreadsheet, optionally from a template resource. The template's
   * title is replaced by `title`.
   */
  public async create(
    title: string,
    template?: sheets_v4.Schema$Spreadsheet
  ): Promise<GoogleWorkspaceResult<sheets_v4.Schema$Spreadsheet>> {
    const context = this.createContext('create', { title });
    const requestBody: sheets_v4.Schema$Spreadsheet = {
      ...template,
      properties: { ...template?.properties, title },
    };

    return this.executeAsyncWithRetry(async () => {
      const sheets = await this.ensureInitialized();
      const response = await sheets.spreadsheets.create({ requestBody });
      this.logger.info('Created spreadsheet', {
        spreadsheetId: response.data.spreadsheetId,
        requestId: context.requestId,
      });
      return response.data;
    }, context);
  }

  public async get(
    spreadsheetId: string,
    options: GetSpreadsheetOptions = {}
  ): Promise<GoogleWorkspaceResult<sheets_v4.Schema$Spreadsheet>> {
    const context = this.createContext('get', { spreadsheetId, ranges: options.ranges });

    return this.executeAsyncWithRetry(async () => {
      const sheets = await this.ensureInitialized();
      const response = await sheets.spreadsheets.get({
        spreadsheetId,
        includeGridData: options.includeGridData ?? false,
        ...(options.fields ? { fields: options.fields } : {}),
        ...(options.ranges ? { ranges: options.ranges } : {}),
      });
      return response.data;
    }, context);
  }

  /**
   * Copy a worksheet into another spreadsheet
   */
  public async copyTo(
    spreadsheetId: string,
    sheetId: number,
    destinationSpreadsheetId: string
  ): Promise<GoogleWorkspaceResult<sheets_v4.Schema$SheetProperties>> {
    const context = this.createContext('copyTo', { spreadsheetId, sheetId, destinationSpreadsheetId });

    return this.executeAsyncWithRetry(async () => {
      const sheets = await this.ensureInitialized();
      const response = await sheets.spreadsheets.sheets.copyTo({
        spreadsheetId,
        sheetId,
        fields: '*',
        requestBody: { destinationSpreadsheetId },
      });
      return response.data;
    }, context);
  }

  public async valuesGet(
    spreadsheetId: string,
    range: string,
    options: ValuesGetOptions = {}
  ): Promise<GoogleWorkspaceResult<sheets_v4.Schema$ValueRange>> {
    const context = this.createContext('valuesGet', { spreadsheetId, range });

    return this.executeAsyncWithRetry(async () => {
      const sheets = await this.ensureInitialized();
      const response = await sheets.spreadsheets.values.get({
        spreadsheetId,
        range,
        majorDimension: options.majorDimension ?? 'ROWS',
        valueRenderOption: options.valueRenderOption ?? ValueRenderOption.FORMATTED_VALUE,
        dateTimeRenderOption: options.dateTimeRenderOption ?? DateTimeRenderOption.SERIAL_NUMBER,
      });
      return response.data;
    }, context);
  }

  /**
   * Write several ranges. Writes over the cell limit are split along their
   * major dimension and sent in as many calls as needed.
   */
  public async valuesBatchUpdate(
    spreadsheetId: string,
    data: ValueRangeInput[],
    inputOption: ValueInputOption = ValueInputOption.USER_ENTERED
  ): Promise<GoogleWorkspaceResult<sheets_v4.Schema$BatchUpdateValuesResponse[]>> {
    let pieces: ValueRangeInput[];
    try {
      pieces = data.flatMap(entry => splitValueRange(entry, this.cellLimit));
    } catch (error) {
      if (error instanceof GoogleSheetsError) {
        return googleErr(error);
      }
      throw error;
    }

    const calls = packByCellCount(pieces, this.cellLimit);
    const responses: sheets_v4.Schema$BatchUpdateValuesResponse[] = [];

    for (const call of calls) {
      const context = this.createContext('valuesBatchUpdate', {
        spreadsheetId,
        ranges: call.map(entry => entry.range),
        inputOption,
      });
      const result = await this.executeAsyncWithRetry(async () => {
        const sheets = await this.ensureInitialized();
        const response = await sheets.spreadsheets.values.batchUpdate({
          spreadsheetId,
          requestBody: {
            valueInputOption: inputOption,
            data: call.map(entry => ({
              range: entry.range,
              majorDimension: entry.majorDimension ?? 'ROWS',
              values: entry.values,
            })),
          },
        });
        return response.data;
      }, context);

      if (result.isErr()) {
        return googleErr(result.error);
      }
      responses.push(result.value);
    }

    if (calls.length > 1) {
      this.logger.info('Split value update into several calls', { spreadsheetId, calls: calls.length });
    }
    return googleOk(responses);
  }

  /**
   * Append rows (or columns) after the table found in `range`
   */
  public async valuesAppend(
    spreadsheetId: string,
    range: string,
    values: CellInput[][],
    options: ValuesAppendOptions = {}
  ): Promise<GoogleWorkspaceResult<sheets_v4.Schema$AppendValuesResponse>> {
    const majorDimension = options.majorDimension ?? 'ROWS';
    const context = this.createContext('valuesAppend', { spreadsheetId, range });

    return this.executeAsyncWithRetry(async () => {
      const sheets = await this.ensureInitialized();
      const response = await sheets.spreadsheets.values.append({
        spreadsheetId,
        range,
        valueInputOption: options.inputOption ?? ValueInputOption.USER_ENTERED,
        insertDataOption: options.insertDataOption ?? 'INSERT_ROWS',
        includeValuesInResponse: false,
        requestBody: { values, majorDimension },
      });
      return response.data;
    }, context);
  }

  /** Clear the values of `ranges`; formatting stays */
  public async valuesBatchClear(spreadsheetId: string, ranges: string[]): Promise<GoogleWorkspaceResult<void>> {
    const context = this.createContext('valuesBatchClear', { spreadsheetId, ranges });

    return this.executeAsyncWithRetry(async () => {
      const sheets = await this.ensureInitialized();
      await sheets.spreadsheets.values.batchClear({ spreadsheetId, requestBody: { ranges } });
    }, context);
  }

  public async developerMetadataGet(
    spreadsheetId: string,
    metadataId: number
  ): Promise<GoogleWorkspaceResult<sheets_v4.Schema$DeveloperMetadata>> {
    const context = this.createContext('developerMetadataGet', { spreadsheetId, metadataId });

    return this.executeAsyncWithRetry(async () => {
      const sheets = await this.ensureInitialized();
      const response = await sheets.spreadsheets.developerMetadata.get({ spreadsheetId, metadataId });
      return response.data;
    }, context);
  }

  public async developerMetadataSearch(
    spreadsheetId: string,
    dataFilters: sheets_v4.Schema$DataFilter[]
  ): Promise<GoogleWorkspaceResult<sheets_v4.Schema$MatchedDeveloperMetadata[]>> {
    const context = this.createContext('developerMetadataSearch', { spreadsheetId });

    return this.executeAsyncWithRetry(async () => {
      const sheets = await this.ensureInitialized();
      const response = await sheets.spreadsheets.developerMetadata.search({
        spreadsheetId,
        requestBody: { dataFilters },
      });
      return response.data.matchedDeveloperMetadata ?? [];
    }, context);
  }

  protected convertServiceSpecificError(error: Error, context: ServiceContext): GoogleSheetsError | null {
    const spreadsheetId = context.data?.spreadsheetId;
    const range = context.data?.range;
    return GoogleErrorFactory.createSheetsError(
      error,
      typeof spreadsheetId === 'string' ? spreadsheetId : undefined,
      typeof range === 'string' ? range : undefined
    );
  }

  private async ensureInitialized(): Promise<sheets_v4.Sheets> {
    const result = await this.initialize();
    if (result.isErr()) {
      throw result.error;
    }
    if (!this.sheetsApi) {
      throw new GoogleSheetsError('Sheets API not initialized', 'GOOGLE_SHEETS_NOT_INITIALIZED', 500);
    }
    return this.sheetsApi;
  }
}

function cellCount(entry: ValueRangeInput): number {
  return entry.values.reduce((total, line) => total + line.length, 0);
}

/**
 * Split one range into pieces of at most `limit` cells, cutting between
 * rows (or columns for COLUMNS-major data).
 *
 * @throws GoogleSheetsInvalidArgumentError when a single line exceeds `limit`
 */
export function splitValueRange(entry: ValueRangeInput, limit: number): ValueRangeInput[] {
  if (cellCount(entry) <= limit) {
    return [entry];
  }

  const lineWidth = maxLineLength(entry.values);
  const linesPerPiece = Math.floor(limit / lineWidth);
  if (linesPerPiece === 0) {
    throw new GoogleSheetsInvalidArgumentError(
      `A single line of ${lineWidth} cells exceeds the limit of ${limit} cells per update`,
      { range: entry.range }
    );
  }

  const gridRange = GridRange.fromLabel(entry.range);
  const startRow = gridRange.start.row ?? 1;
  const startCol = gridRange.start.col ?? 1;
  const byColumns = entry.majorDimension === 'COLUMNS';
  const pieces: ValueRangeInput[] = [];

  for (let offset = 0; offset < entry.values.length; offset += linesPerPiece) {
    const values = entry.values.slice(offset, offset + linesPerPiece);
    const width = maxLineLength(values);
    const start: [number, number] = byColumns ? [startRow, startCol + offset] : [startRow + offset, startCol];
    const end: [number, number] = byColumns
      ? [startRow + width - 1, start[1] + values.length - 1]
      : [start[0] + values.length - 1, startCol + width - 1];

    pieces.push({
      range: new GridRange({ worksheetTitle: gridRange.worksheetTitle, start, end }).label,
      majorDimension: entry.majorDimension,
      values,
    });
  }
  return pieces;
}

/**
 * Group pieces into calls that each stay within `limit` cells
 */
export function packByCellCount(pieces: ValueRangeInput[], limit: number): ValueRangeInput[][] {
  const calls: ValueRangeInput[][] = [];
  let current: ValueRangeInput[] = [];
  let currentCells = 0;

  for (const piece of pieces) {
    const cells = cellCount(piece);
    if (current.length > 0 && currentCells + cells > limit) {
      calls.push(current);
      current = [];
      currentCells = 0;
    }
    current.push(piece);
    currentCells += cells;
  }
  if (current.length > 0) {
    calls.push(current);
  }
  return calls;
}
