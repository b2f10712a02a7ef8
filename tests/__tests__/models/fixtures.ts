import { OAuth2Client } from 'google-auth-library';
import type { sheets_v4 } from 'googleapis';
import { ok } from 'neverthrow';

import { SheetsClient } from '../../../src/client';
import { Spreadsheet } from '../../../src/models/spreadsheet';
import { NO_RETRY_CONFIG } from '../../../src/test-config';
import { createServiceLogger } from '../../../src/utils/logger';

export const SPREADSHEET_ID = 'spreadsheet-1';

export interface SheetFixture {
  sheetId: number;
  title: string;
  index: number;
  rows?: number;
  cols?: number;
}

export const SHEET1: SheetFixture = { sheetId: 0, title: 'Sheet1', index: 0 };
export const DATA_SHEET: SheetFixture = { sheetId: 7, title: 'Data', index: 1 };

export function sheetJSON(sheet: SheetFixture): sheets_v4.Schema$Sheet {
  return {
    properties: {
      sheetId: sheet.sheetId,
      title: sheet.title,
      index: sheet.index,
      gridProperties: { rowCount: sheet.rows ?? 10, columnCount: sheet.cols ?? 5 },
    },
  };
}

export function spreadsheetJSON(
  sheets: SheetFixture[] = [SHEET1],
  extra: sheets_v4.Schema$Spreadsheet = {}
): sheets_v4.Schema$Spreadsheet {
  return {
    spreadsheetId: SPREADSHEET_ID,
    spreadsheetUrl: `https://docs.google.com/spreadsheets/d/${SPREADSHEET_ID}/edit`,
    properties: { title: 'Budget', locale: 'en_US', timeZone: 'Etc/GMT' },
    sheets: sheets.map(sheetJSON),
    ...extra,
  };
}

export function createTestClient(options: { defaultParse?: boolean } = {}): SheetsClient {
  return new SheetsClient(
    { getAuthClient: async () => ok(new OAuth2Client()) },
    { logger: createServiceLogger('model-test'), retryConfig: NO_RETRY_CONFIG, defaultParse: options.defaultParse }
  );
}

/** A spreadsheet built from fixture JSON without any call */
export function openFixture(
  client: SheetsClient,
  json: sheets_v4.Schema$Spreadsheet = spreadsheetJSON(),
  defaultParse?: boolean
): Spreadsheet {
  return new Spreadsheet(client, json, { defaultParse });
}
