import { promises as fs } from 'fs';
import { join } from 'path';
import type { sheets_v4 } from 'googleapis';

import {
  GoogleSheetsBatchModeError,
  GoogleSheetsError,
  GoogleSheetsWorksheetNotFoundError,
  googleErr,
  googleOk,
} from '../errors/index.js';
import type { GoogleWorkspaceResult } from '../errors/index.js';
import { RequestQueue } from '../services/batch/request-queue.js';
import type { FlushSummary } from '../services/batch/request-queue.js';
import type { CreatePermissionOptions } from '../services/drive.service.js';
import { ExportType, ValueInputOption } from '../types/index.js';
import type { Permission, PermissionRole, PermissionType, ValueRangeInput, WorksheetProperty } from '../types/index.js';
import type { ClientContext } from './context.js';
import { DeveloperMetadata } from './developer-metadata.js';
import { Worksheet } from './worksheet.js';
import type { Cell } from './cell.js';
import type { FindOptions } from './worksheet.js';

/** Fields requested whenever a spreadsheet is (re)loaded */
export const SPREADSHEET_FIELDS =
  'spreadsheetId,spreadsheetUrl,properties,namedRanges,sheets(properties,protectedRanges,charts)';

/**
 * What happened to a structural request: sent with its response, or queued
 * in batch mode
 */
export type DispatchOutcome =
  | { queued: true }
  | { queued: false; response: sheets_v4.Schema$BatchUpdateSpreadsheetResponse };

export interface SpreadsheetOptions {
  /** Value input used when a write does not say; `true` is USER_ENTERED */
  defaultParse?: boolean;
}

export interface AddWorksheetOptions {
  rows?: number;
  cols?: number;
  /** Copy this worksheet instead of creating an empty one */
  source?: Worksheet;
}

export interface ReplaceOptions {
  regex?: boolean;
  matchCase?: boolean;
  includeFormulas?: boolean;
  matchEntireCell?: boolean;
  /** A1 range including the worksheet title */
  range?: string;
  sheetId?: number;
}

export interface ShareOptions {
  role?: PermissionRole;
  type?: PermissionType;
  expirationTime?: string;
  emailMessage?: string;
}

export interface ExportOptions {
  /** Directory to write to; default is the working directory */
  path?: string;
  /** File name without extension */
  filename?: string;
}

export function exportParts(format: ExportType): { mimeType: string; extension: string } {
  const separator = format.lastIndexOf(':');
  return { mimeType: format.slice(0, separator), extension: format.slice(separator + 1) };
}

/**
 * A spreadsheet and its worksheets.
 *
 * Structural changes go through {@link Spreadsheet.dispatch} and value
 * writes through {@link Spreadsheet.writeValues}; both send at once, or
 * queue while batch mode is on.
 */
export class Spreadsheet {
  private json: sheets_v4.Schema$Spreadsheet;
  private worksheetList: Worksheet[] = [];
  private readonly queue = new RequestQueue();
  private batching = false;
  readonly defaultParse: boolean;

  constructor(
    readonly client: ClientContext,
    json: sheets_v4.Schema$Spreadsheet,
    options: SpreadsheetOptions = {}
  ) {
    this.json = json;
    this.defaultParse = options.defaultParse ?? true;
    this.syncWorksheets();
  }

  /**
   * Load a spreadsheet by id
   */
  static async open(
    client: ClientContext,
    spreadsheetId: string,
    options: SpreadsheetOptions = {}
  ): Promise<GoogleWorkspaceResult<Spreadsheet>> {
    const result = await client.sheets.get(spreadsheetId, { fields: SPREADSHEET_FIELDS });
    return result.map(json => new Spreadsheet(client, json, options));
  }

  get id(): string {
    return this.json.spreadsheetId ?? '';
  }

  get title(): string {
    return this.json.properties?.title ?? '';
  }

  get url(): string {
    return this.json.spreadsheetUrl ?? `https://docs.google.com/spreadsheets/d/${this.id}`;
  }

  get defaultFormat(): sheets_v4.Schema$CellFormat | undefined {
    return this.json.properties?.defaultFormat ?? undefined;
  }

  get locale(): string | undefined {
    return this.json.properties?.locale ?? undefined;
  }

  get timeZone(): string | undefined {
    return this.json.properties?.timeZone ?? undefined;
  }

  /** First worksheet by index */
  get sheet1(): Worksheet | undefined {
    return this.worksheetList.find(worksheet => worksheet.index === 0) ?? this.worksheetList[0];
  }

  get batchMode(): boolean {
    return this.batching;
  }

  namedRanges(): sheets_v4.Schema$NamedRange[] {
    return this.json.namedRanges ?? [];
  }

  protectedRanges(): sheets_v4.Schema$ProtectedRange[] {
    return (this.json.sheets ?? []).flatMap(sheet => sheet.protectedRanges ?? []);
  }

  /** Reload properties and worksheets; existing Worksheet objects are updated in place */
  async refresh(): Promise<GoogleWorkspaceResult<this>> {
    const result = await this.client.sheets.get(this.id, { fields: SPREADSHEET_FIELDS });
    return result.map(json => {
      this.json = json;
      this.syncWorksheets();
      return this;
    });
  }

  private syncWorksheets(): void {
    const current = new Map(this.worksheetList.map(worksheet => [worksheet.id, worksheet]));
    this.worksheetList = (this.json.sheets ?? []).map(sheet => {
      const existing = current.get(sheet.properties?.sheetId ?? -1);
      if (existing) {
        existing.setJSON(sheet);
        return existing;
      }
      return new Worksheet(this, sheet);
    });
  }

  /**
   * Worksheets matching `property`, or all of them. A miss triggers one
   * refresh before it is reported.
   */
  async worksheets(property?: WorksheetProperty, value?: string | number): Promise<GoogleWorkspaceResult<Worksheet[]>> {
    if (property === undefined) {
      return googleOk([...this.worksheetList]);
    }

    const matches = (): Worksheet[] => this.worksheetList.filter(worksheet => worksheet[property] === value);
    let found = matches();
    if (found.length === 0) {
      const refreshed = await this.refresh();
      if (refreshed.isErr()) {
        return googleErr(refreshed.error);
      }
      found = matches();
    }
    if (found.length === 0) {
      return googleErr(new GoogleSheetsWorksheetNotFoundError(property, String(value), this.id));
    }
    return googleOk(found);
  }

  async worksheet(property: WorksheetProperty = 'index', value: string | number = 0): Promise<GoogleWorkspaceResult<Worksheet>> {
    const result = await this.worksheets(property, value);
    return result.map(found => found[0]);
  }

  worksheetByTitle(title: string): Promise<GoogleWorkspaceResult<Worksheet>> {
    return this.worksheet('title', title);
  }

  /**
   * Send structural requests, or queue them in batch mode
   */
  async dispatch(requests: sheets_v4.Schema$Request[], fields?: string): Promise<GoogleWorkspaceResult<DispatchOutcome>> {
    if (this.batching) {
      this.queue.enqueue(...requests);
      return googleOk<DispatchOutcome>({ queued: true });
    }
    const result = await this.client.sheets.batchUpdate(this.id, requests, fields);
    return result.map((response): DispatchOutcome => ({ queued: false, response }));
  }

  /**
   * Write value ranges with USER_ENTERED (parse) or RAW input
   */
  async writeValues(updates: ValueRangeInput[], parse?: boolean): Promise<GoogleWorkspaceResult<void>> {
    const inputOption = (parse ?? this.defaultParse) ? ValueInputOption.USER_ENTERED : ValueInputOption.RAW;
    if (this.batching) {
      this.queue.enqueueValues(inputOption, ...updates);
      return googleOk(undefined);
    }
    const result = await this.client.sheets.valuesBatchUpdate(this.id, updates, inputOption);
    return result.map(() => undefined);
  }

  /**
   * Add an empty worksheet, or copy `source` into this spreadsheet and
   * rename the copy
   */
  async addWorksheet(title: string, options: AddWorksheetOptions = {}): Promise<GoogleWorkspaceResult<Worksheet>> {
    if (this.batching) {
      return googleErr(new GoogleSheetsBatchModeError('addWorksheet', this.id));
    }

    let properties: sheets_v4.Schema$SheetProperties | undefined;
    if (options.source) {
      const copied = await this.client.sheets.copyTo(options.source.spreadsheet.id, options.source.id, this.id);
      if (copied.isErr()) {
        return googleErr(copied.error);
      }
      properties = copied.value;
    } else {
      const result = await this.client.sheets.batchUpdate(
        this.id,
        [
          {
            addSheet: {
              properties: { title, gridProperties: { rowCount: options.rows ?? 100, columnCount: options.cols ?? 26 } },
            },
          },
        ],
        'replies/addSheet'
      );
      if (result.isErr()) {
        return googleErr(result.error);
      }
      properties = result.value.replies?.[0]?.addSheet?.properties ?? undefined;
    }

    if (!properties) {
      return googleErr(
        new GoogleSheetsError('The service returned no worksheet properties', 'GOOGLE_SHEETS_EMPTY_REPLY', 502, this.id)
      );
    }

    const worksheet = new Worksheet(this, { properties });
    this.worksheetList.push(worksheet);
    this.json.sheets = [...(this.json.sheets ?? []), { properties }];
    this.client.logger.info('Added worksheet', { spreadsheetId: this.id, sheetId: worksheet.id, title });

    if (options.source) {
      const renamed = await worksheet.setTitle(title);
      if (renamed.isErr()) {
        return googleErr(renamed.error);
      }
    }
    return googleOk(worksheet);
  }

  async deleteWorksheet(worksheet: Worksheet): Promise<GoogleWorkspaceResult<void>> {
    if (!this.worksheetList.includes(worksheet)) {
      return googleErr(new GoogleSheetsWorksheetNotFoundError('id', String(worksheet.id), this.id));
    }
    const result = await this.dispatch([{ deleteSheet: { sheetId: worksheet.id } }]);
    if (result.isErr()) {
      return googleErr(result.error);
    }
    this.worksheetList = this.worksheetList.filter(item => item !== worksheet);
    this.json.sheets = (this.json.sheets ?? []).filter(sheet => sheet.properties?.sheetId !== worksheet.id);
    return googleOk(undefined);
  }

  /**
   * Find and replace through the whole spreadsheet, one range or one
   * worksheet. Resolves to `null` when queued.
   */
  async replace(
    pattern: string,
    replacement: string,
    options: ReplaceOptions = {}
  ): Promise<GoogleWorkspaceResult<sheets_v4.Schema$FindReplaceResponse | null>> {
    const findReplace: sheets_v4.Schema$FindReplaceRequest = {
      find: pattern,
      replacement,
      searchByRegex: options.regex ?? true,
      matchCase: options.matchCase ?? false,
      includeFormulas: options.includeFormulas ?? false,
      matchEntireCell: options.matchEntireCell ?? false,
    };

    if (options.range) {
      const worksheetResult = await this.worksheetForRange(options.range);
      if (worksheetResult.isErr()) {
        return googleErr(worksheetResult.error);
      }
      findReplace.range = worksheetResult.value.gridRange(options.range).toJSON();
    } else if (options.sheetId !== undefined) {
      findReplace.sheetId = options.sheetId;
    } else {
      findReplace.allSheets = true;
    }

    const result = await this.dispatch([{ findReplace }]);
    return result.map(outcome => (outcome.queued ? null : outcome.response.replies?.[0]?.findReplace ?? {}));
  }

  private async worksheetForRange(range: string): Promise<GoogleWorkspaceResult<Worksheet>> {
    const separator = range.lastIndexOf('!');
    if (separator < 0) {
      const first = this.sheet1;
      return first ? googleOk(first) : googleErr(new GoogleSheetsWorksheetNotFoundError('index', '0', this.id));
    }
    const title = range.slice(0, separator).replace(/^'(.*)'$/, '$1').replace(/''/g, "'");
    return this.worksheetByTitle(title);
  }

  /**
   * Cells matching `pattern` across every worksheet
   */
  async find(pattern: string | RegExp, options: FindOptions = {}): Promise<GoogleWorkspaceResult<Cell[]>> {
    const found: Cell[] = [];
    for (const worksheet of this.worksheetList) {
      const result = await worksheet.find(pattern, options);
      if (result.isErr()) {
        return googleErr(result.error);
      }
      found.push(...result.value);
    }
    return googleOk(found);
  }

  /**
   * Grant access to a user, group or domain (`address`), or to anyone with
   * the link when `type` is `anyone`
   */
  share(address: string, options: ShareOptions = {}): Promise<GoogleWorkspaceResult<Permission>> {
    const type = options.type ?? 'user';
    const permission: CreatePermissionOptions = {
      role: options.role ?? 'reader',
      type,
      expirationTime: options.expirationTime,
      emailMessage: options.emailMessage,
    };
    if (type === 'domain') {
      permission.domain = address;
    } else if (type !== 'anyone') {
      permission.emailAddress = address;
    }
    return this.client.drive.createPermission(this.id, permission);
  }

  listPermissions(): Promise<GoogleWorkspaceResult<Permission[]>> {
    return this.client.drive.listPermissions(this.id);
  }

  /**
   * Remove every permission granted to `address` (an email or a domain).
   * Resolves to the number removed.
   */
  async removePermission(address: string): Promise<GoogleWorkspaceResult<number>> {
    const listed = await this.listPermissions();
    if (listed.isErr()) {
      return googleErr(listed.error);
    }

    const matching = listed.value.filter(
      permission => permission.emailAddress === address || permission.domain === address
    );
    for (const permission of matching) {
      const removed = await this.client.drive.deletePermission(this.id, permission.id);
      if (removed.isErr()) {
        return googleErr(removed.error);
      }
    }
    return googleOk(matching.length);
  }

  /** Queue requests until {@link Spreadsheet.batchStop} */
  batchStart(): void {
    this.batching = true;
  }

  /**
   * Leave batch mode and send the queue, or drop it with `discard`. The
   * queue is empty afterwards either way.
   */
  async batchStop(options: { discard?: boolean } = {}): Promise<GoogleWorkspaceResult<FlushSummary>> {
    this.batching = false;
    if (options.discard) {
      this.queue.clear();
      return googleOk({ requests: 0, valueCalls: 0 });
    }
    const size = this.queue.size;
    const result = await this.queue.flush(this.id, this.client.sheets);
    if (result.isOk()) {
      this.client.logger.info('Flushed batched requests', { spreadsheetId: this.id, queued: size, ...result.value });
    }
    return result;
  }

  /**
   * Send requests as they are, even in batch mode
   */
  customRequest(
    requests: sheets_v4.Schema$Request[],
    fields = '*'
  ): Promise<GoogleWorkspaceResult<sheets_v4.Schema$BatchUpdateSpreadsheetResponse>> {
    return this.client.sheets.batchUpdate(this.id, requests, fields);
  }

  /** Last modification time as reported by Drive */
  updated(): Promise<GoogleWorkspaceResult<string>> {
    return this.client.drive.getModifiedTime(this.id);
  }

  delete(): Promise<GoogleWorkspaceResult<void>> {
    return this.client.drive.deleteFile(this.id);
  }

  /**
   * Download the spreadsheet. CSV and TSV hold one worksheet, so with
   * several worksheets each is written to its own file with its index
   * appended to the name. Resolves to the paths written.
   */
  async export(format: ExportType = ExportType.CSV, options: ExportOptions = {}): Promise<GoogleWorkspaceResult<string[]>> {
    const filename = options.filename ?? this.id;
    const singleSheetFormat = format === ExportType.CSV || format === ExportType.TSV;

    if (singleSheetFormat && this.worksheetList.length > 1) {
      const paths: string[] = [];
      for (const worksheet of this.worksheetList) {
        const result = await worksheet.export(format, { path: options.path, filename: `${filename}${worksheet.index}` });
        if (result.isErr()) {
          return googleErr(result.error);
        }
        paths.push(result.value);
      }
      return googleOk(paths);
    }

    const written = await this.downloadTo(format, filename, options.path);
    return written.map(path => [path]);
  }

  /**
   * Export the current first worksheet (or the whole file) to disk
   */
  async downloadTo(format: ExportType, filename: string, path = '.'): Promise<GoogleWorkspaceResult<string>> {
    const { mimeType, extension } = exportParts(format);
    const content = await this.client.drive.exportFile(this.id, mimeType);
    if (content.isErr()) {
      return googleErr(content.error);
    }

    const filePath = join(path, `${filename}${extension}`);
    try {
      await fs.writeFile(filePath, content.value);
    } catch (error) {
      return googleErr(
        new GoogleSheetsError(
          `Could not write ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
          'GOOGLE_SHEETS_EXPORT_WRITE_FAILED',
          500,
          this.id
        )
      );
    }
    this.client.logger.info('Exported spreadsheet', { spreadsheetId: this.id, mimeType, filePath });
    return googleOk(filePath);
  }

  createDeveloperMetadata(key: string, value: string): Promise<GoogleWorkspaceResult<DeveloperMetadata | null>> {
    return DeveloperMetadata.create(this, key, value);
  }

  /** Spreadsheet-level entries, optionally only those with `key` */
  findDeveloperMetadata(key?: string): Promise<GoogleWorkspaceResult<DeveloperMetadata[]>> {
    return DeveloperMetadata.search(this, key);
  }

  equals(other: Spreadsheet): boolean {
    return this.id === other.id;
  }

  toString(): string {
    return `<Spreadsheet ${JSON.stringify(this.title)} Sheets:${this.worksheetList.length}>`;
  }
}
