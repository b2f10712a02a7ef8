import type { sheets_v4 } from 'googleapis';

import {
  GoogleSheetsNoValidUrlKeyError,
  GoogleSheetsTitleNotFoundError,
  googleErr,
  googleOk,
} from './errors/index.js';
import type { GoogleWorkspaceResult } from './errors/index.js';
import { Spreadsheet } from './models/spreadsheet.js';
import type { ClientContext } from './models/context.js';
import type { AuthClientSource } from './services/auth/auth-provider.interface.js';
import type { GoogleServiceRetryConfig, GoogleServiceTimeoutConfig } from './services/base/google-service.js';
import { DriveService } from './services/drive.service.js';
import { SheetsService } from './services/sheets.service.js';
import type { DriveFileInfo } from './types/index.js';
import { DriveQueryBuilder } from './utils/drive-query-builder.js';
import { createServiceLogger, Logger } from './utils/logger.js';

export interface SheetsClientOptions {
  logger?: Logger;
  retryConfig?: GoogleServiceRetryConfig;
  timeoutConfig?: GoogleServiceTimeoutConfig;
  /** Whether written values are parsed as if typed into the UI */
  defaultParse?: boolean;
}

export interface CreateSpreadsheetOptions {
  /** A spreadsheet body, or the id of a spreadsheet to copy layout and data from */
  template?: sheets_v4.Schema$Spreadsheet | string;
  /** Id of the folder to put the new spreadsheet in */
  folder?: string;
}

const URL_KEY_PATTERNS = [/key=([^&#]+)/, /spreadsheets\/d\/([^&#/]+)/];

/**
 * Entry point: opens, creates and lists spreadsheets.
 *
 * @example
 * ```typescript
 * const client = await authorize({ serviceAccountFile: './service-account.json' });
 * const spreadsheet = (await client.open('Budget'))._unsafeUnwrap();
 * ```
 */
export class SheetsClient implements ClientContext {
  readonly sheets: SheetsService;
  readonly drive: DriveService;
  readonly logger: Logger;
  private readonly defaultParse: boolean;

  constructor(auth: AuthClientSource, options: SheetsClientOptions = {}) {
    this.logger = options.logger ?? createServiceLogger('sheets-client');
    this.sheets = new SheetsService(auth, this.logger, options.retryConfig, options.timeoutConfig);
    this.drive = new DriveService(auth, this.logger, options.retryConfig, options.timeoutConfig);
    this.defaultParse = options.defaultParse ?? true;
  }

  private async spreadsheetFiles(query: string): Promise<GoogleWorkspaceResult<DriveFileInfo[]>> {
    return this.drive.spreadsheetMetadata(query);
  }

  /** Titles of every spreadsheet visible to the account */
  async spreadsheetTitles(query = ''): Promise<GoogleWorkspaceResult<string[]>> {
    const files = await this.spreadsheetFiles(query);
    return files.map(list => list.map(file => file.name));
  }

  async spreadsheetIds(query = ''): Promise<GoogleWorkspaceResult<string[]>> {
    const files = await this.spreadsheetFiles(query);
    return files.map(list => list.map(file => file.id));
  }

  /**
   * Create a spreadsheet, optionally from a template and inside a folder
   */
  async create(title: string, options: CreateSpreadsheetOptions = {}): Promise<GoogleWorkspaceResult<Spreadsheet>> {
    let template: sheets_v4.Schema$Spreadsheet | undefined;
    if (typeof options.template === 'string') {
      const source = await this.sheets.get(options.template, { includeGridData: true });
      if (source.isErr()) {
        return googleErr(source.error);
      }
      template = source.value;
    } else {
      template = options.template;
    }

    const body = template
      ? { properties: template.properties, sheets: template.sheets, namedRanges: template.namedRanges }
      : undefined;
    const created = await this.sheets.create(title, body);
    if (created.isErr()) {
      return googleErr(created.error);
    }
    const spreadsheetId = created.value.spreadsheetId ?? '';

    if (options.folder) {
      const parents = await this.drive.getFileParents(spreadsheetId);
      if (parents.isErr()) {
        return googleErr(parents.error);
      }
      const moved = await this.drive.moveFile(spreadsheetId, parents.value.join(','), options.folder);
      if (moved.isErr()) {
        return googleErr(moved.error);
      }
    }
    return this.openByKey(spreadsheetId);
  }

  /**
   * Open the first spreadsheet with exactly this title
   */
  async open(title: string): Promise<GoogleWorkspaceResult<Spreadsheet>> {
    const query = new DriveQueryBuilder({ includeTrashed: true }).withName(title).build();
    const files = await this.spreadsheetFiles(query);
    if (files.isErr()) {
      return googleErr(files.error);
    }
    const match = files.value.find(file => file.name === title);
    if (!match) {
      return googleErr(new GoogleSheetsTitleNotFoundError(title));
    }
    return this.openByKey(match.id);
  }

  openByKey(key: string): Promise<GoogleWorkspaceResult<Spreadsheet>> {
    return Spreadsheet.open(this, key, { defaultParse: this.defaultParse });
  }

  /**
   * Open a spreadsheet from its URL, in the current or the old `key=` form
   */
  async openByUrl(url: string): Promise<GoogleWorkspaceResult<Spreadsheet>> {
    for (const pattern of URL_KEY_PATTERNS) {
      const match = pattern.exec(url);
      if (match) {
        return this.openByKey(match[1]);
      }
    }
    return googleErr(new GoogleSheetsNoValidUrlKeyError(url));
  }

  /**
   * Open every spreadsheet, or those whose title contains `title`
   */
  async openAll(title?: string): Promise<GoogleWorkspaceResult<Spreadsheet[]>> {
    const query = title ? new DriveQueryBuilder({ includeTrashed: true }).withNameContains(title).build() : '';
    const ids = await this.spreadsheetIds(query);
    if (ids.isErr()) {
      return googleErr(ids.error);
    }

    const spreadsheets: Spreadsheet[] = [];
    for (const id of ids.value) {
      const opened = await this.openByKey(id);
      if (opened.isErr()) {
        return googleErr(opened.error);
      }
      spreadsheets.push(opened.value);
    }
    return googleOk(spreadsheets);
  }

  /**
   * Copy a spreadsheet through Drive and open the copy
   */
  async copy(spreadsheetId: string, title: string, folder?: string): Promise<GoogleWorkspaceResult<Spreadsheet>> {
    const copied = await this.drive.copyFile(spreadsheetId, title, folder);
    if (copied.isErr()) {
      return googleErr(copied.error);
    }
    return this.openByKey(copied.value.id);
  }

  /** Search this shared drive first when listing spreadsheets */
  enableTeamDrive(teamDriveId: string): void {
    this.drive.enableTeamDrive(teamDriveId);
  }

  disableTeamDrive(): void {
    this.drive.disableTeamDrive();
  }
}
