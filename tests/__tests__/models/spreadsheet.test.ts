import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

import { SPREADSHEET_FIELDS, Spreadsheet, exportParts } from '../../../src/models/spreadsheet';
import {
  GoogleSheetsBatchModeError,
  GoogleSheetsNotFoundError,
  GoogleSheetsWorksheetNotFoundError,
} from '../../../src/errors/index';
import { ExportType } from '../../../src/types/index';
import { createApiError } from '../../../src/test-config';
import { DATA_SHEET, SHEET1, SPREADSHEET_ID, createTestClient, openFixture, spreadsheetJSON } from './fixtures';

const mockSpreadsheets = {
  batchUpdate: jest.fn(),
  get: jest.fn(),
  values: {
    get: jest.fn(),
    batchUpdate: jest.fn(),
  },
  sheets: {
    copyTo: jest.fn(),
  },
  developerMetadata: {
    get: jest.fn(),
    search: jest.fn(),
  },
};
const mockFiles = {
  get: jest.fn(),
  export: jest.fn(),
  delete: jest.fn(),
};
const mockPermissions = {
  create: jest.fn(),
  list: jest.fn(),
  delete: jest.fn(),
};

jest.mock('googleapis', () => ({
  google: {
    sheets: jest.fn(() => ({ spreadsheets: mockSpreadsheets })),
    drive: jest.fn(() => ({ files: mockFiles, permissions: mockPermissions })),
  },
}));

describe('Spreadsheet', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('opening', () => {
    it('loads properties and worksheets', async () => {
      mockSpreadsheets.get.mockResolvedValueOnce({ data: spreadsheetJSON([SHEET1, DATA_SHEET]) });

      const spreadsheet = (await Spreadsheet.open(createTestClient(), SPREADSHEET_ID))._unsafeUnwrap();
      const worksheets = (await spreadsheet.worksheets())._unsafeUnwrap();

      expect(mockSpreadsheets.get).toHaveBeenCalledWith({
        spreadsheetId: SPREADSHEET_ID,
        includeGridData: false,
        fields: SPREADSHEET_FIELDS,
      });
      expect(spreadsheet.title).toBe('Budget');
      expect(spreadsheet.locale).toBe('en_US');
      expect(spreadsheet.sheet1?.title).toBe('Sheet1');
      expect(worksheets.map(worksheet => worksheet.title)).toEqual(['Sheet1', 'Data']);
    });

    it('maps a missing spreadsheet to a not-found error', async () => {
      mockSpreadsheets.get.mockRejectedValueOnce(createApiError(404, 'Requested entity was not found.'));

      const result = await Spreadsheet.open(createTestClient(), 'missing');

      expect(result._unsafeUnwrapErr()).toBeInstanceOf(GoogleSheetsNotFoundError);
    });

    it('builds a url when the service gives none', () => {
      const spreadsheet = openFixture(createTestClient(), { ...spreadsheetJSON(), spreadsheetUrl: undefined });

      expect(spreadsheet.url).toBe(`https://docs.google.com/spreadsheets/d/${SPREADSHEET_ID}`);
      expect(spreadsheet.sheet1?.url).toBe(`https://docs.google.com/spreadsheets/d/${SPREADSHEET_ID}#gid=0`);
    });
  });

  describe('worksheets', () => {
    it('finds a worksheet by title without a call', async () => {
      const spreadsheet = openFixture(createTestClient(), spreadsheetJSON([SHEET1, DATA_SHEET]));

      const worksheet = (await spreadsheet.worksheetByTitle('Data'))._unsafeUnwrap();

      expect(worksheet.id).toBe(7);
      expect(mockSpreadsheets.get).not.toHaveBeenCalled();
    });

    it('refreshes once before reporting a missing worksheet', async () => {
      const spreadsheet = openFixture(createTestClient());
      mockSpreadsheets.get.mockResolvedValueOnce({ data: spreadsheetJSON() });

      const result = await spreadsheet.worksheet('title', 'Missing');

      expect(result._unsafeUnwrapErr()).toBeInstanceOf(GoogleSheetsWorksheetNotFoundError);
      expect(result._unsafeUnwrapErr().message).toBe('Worksheet with title Missing not found');
      expect(mockSpreadsheets.get).toHaveBeenCalledTimes(1);
    });

    it('keeps worksheet objects across a refresh', async () => {
      const spreadsheet = openFixture(createTestClient());
      const worksheet = spreadsheet.sheet1;
      mockSpreadsheets.get.mockResolvedValueOnce({
        data: spreadsheetJSON([{ ...SHEET1, title: 'Renamed elsewhere' }]),
      });

      await spreadsheet.refresh();

      expect(spreadsheet.sheet1).toBe(worksheet);
      expect(worksheet?.title).toBe('Renamed elsewhere');
    });

    it('adds an empty worksheet', async () => {
      const spreadsheet = openFixture(createTestClient());
      mockSpreadsheets.batchUpdate.mockResolvedValueOnce({
        data: {
          replies: [
            {
              addSheet: {
                properties: { sheetId: 9, title: 'New', index: 1, gridProperties: { rowCount: 100, columnCount: 26 } },
              },
            },
          ],
        },
      });

      const worksheet = (await spreadsheet.addWorksheet('New'))._unsafeUnwrap();

      expect(mockSpreadsheets.batchUpdate).toHaveBeenCalledWith({
        spreadsheetId: SPREADSHEET_ID,
        fields: 'replies/addSheet',
        requestBody: {
          requests: [{ addSheet: { properties: { title: 'New', gridProperties: { rowCount: 100, columnCount: 26 } } } }],
        },
      });
      expect(worksheet.id).toBe(9);
      expect(worksheet.rows).toBe(100);
      expect((await spreadsheet.worksheets())._unsafeUnwrap()).toHaveLength(2);
    });

    it('copies a worksheet and renames the copy', async () => {
      const spreadsheet = openFixture(createTestClient());
      const source = spreadsheet.sheet1;
      if (!source) throw new Error('fixture has no worksheet');
      mockSpreadsheets.sheets.copyTo.mockResolvedValueOnce({
        data: { sheetId: 12, title: 'Copy of Sheet1', index: 1 },
      });
      mockSpreadsheets.batchUpdate.mockResolvedValueOnce({ data: { replies: [{}] } });

      const copy = (await spreadsheet.addWorksheet('Archive', { source }))._unsafeUnwrap();

      expect(mockSpreadsheets.sheets.copyTo).toHaveBeenCalledWith({
        spreadsheetId: SPREADSHEET_ID,
        sheetId: 0,
        fields: '*',
        requestBody: { destinationSpreadsheetId: SPREADSHEET_ID },
      });
      expect(mockSpreadsheets.batchUpdate).toHaveBeenCalledWith({
        spreadsheetId: SPREADSHEET_ID,
        fields: '*',
        requestBody: {
          requests: [{ updateSheetProperties: { properties: { sheetId: 12, title: 'Archive', index: 1 }, fields: 'title' } }],
        },
      });
      expect(copy.title).toBe('Archive');
    });

    it('deletes a worksheet', async () => {
      const spreadsheet = openFixture(createTestClient(), spreadsheetJSON([SHEET1, DATA_SHEET]));
      const data = (await spreadsheet.worksheetByTitle('Data'))._unsafeUnwrap();
      mockSpreadsheets.batchUpdate.mockResolvedValueOnce({ data: { replies: [{}] } });

      await spreadsheet.deleteWorksheet(data);

      expect(mockSpreadsheets.batchUpdate).toHaveBeenCalledWith({
        spreadsheetId: SPREADSHEET_ID,
        fields: '*',
        requestBody: { requests: [{ deleteSheet: { sheetId: 7 } }] },
      });
      expect((await spreadsheet.worksheets())._unsafeUnwrap().map(worksheet => worksheet.title)).toEqual(['Sheet1']);
    });
  });

  describe('batch mode', () => {
    it('sends queued requests and values when stopped', async () => {
      const spreadsheet = openFixture(createTestClient());
      const worksheet = spreadsheet.sheet1;
      if (!worksheet) throw new Error('fixture has no worksheet');
      mockSpreadsheets.batchUpdate.mockResolvedValueOnce({ data: { replies: [{}] } });
      mockSpreadsheets.values.batchUpdate.mockResolvedValueOnce({ data: { totalUpdatedCells: 2 } });

      spreadsheet.batchStart();
      await worksheet.setTitle('Renamed');
      await worksheet.updateValues('A1', [[1, 2]]);

      expect(mockSpreadsheets.batchUpdate).not.toHaveBeenCalled();
      expect(mockSpreadsheets.values.batchUpdate).not.toHaveBeenCalled();

      const summary = (await spreadsheet.batchStop())._unsafeUnwrap();

      expect(summary).toEqual({ requests: 1, valueCalls: 1 });
      expect(spreadsheet.batchMode).toBe(false);
      expect(mockSpreadsheets.batchUpdate).toHaveBeenCalledWith({
        spreadsheetId: SPREADSHEET_ID,
        fields: '*',
        requestBody: {
          requests: [
            {
              updateSheetProperties: {
                properties: {
                  sheetId: 0,
                  title: 'Renamed',
                  index: 0,
                  gridProperties: { rowCount: 10, columnCount: 5 },
                },
                fields: 'title',
              },
            },
          ],
        },
      });
      expect(mockSpreadsheets.values.batchUpdate).toHaveBeenCalledWith({
        spreadsheetId: SPREADSHEET_ID,
        requestBody: {
          valueInputOption: 'USER_ENTERED',
          data: [{ range: "'Renamed'!A1:B1", majorDimension: 'ROWS', values: [[1, 2]] }],
        },
      });
    });

    it('drops the queue when discarded', async () => {
      const spreadsheet = openFixture(createTestClient());
      const worksheet = spreadsheet.sheet1;
      if (!worksheet) throw new Error('fixture has no worksheet');

      spreadsheet.batchStart();
      await worksheet.setTitle('Discarded');
      const summary = (await spreadsheet.batchStop({ discard: true }))._unsafeUnwrap();

      expect(summary).toEqual({ requests: 0, valueCalls: 0 });

      mockSpreadsheets.batchUpdate.mockResolvedValueOnce({ data: { replies: [{}] } });
      await worksheet.setFrozenRows(1);

      expect(mockSpreadsheets.batchUpdate).toHaveBeenCalledTimes(1);
      expect(mockSpreadsheets.batchUpdate.mock.calls[0][0].requestBody.requests).toHaveLength(1);
    });

    it('refuses to add a worksheet', async () => {
      const spreadsheet = openFixture(createTestClient());
      spreadsheet.batchStart();

      const result = await spreadsheet.addWorksheet('New');

      expect(result._unsafeUnwrapErr()).toBeInstanceOf(GoogleSheetsBatchModeError);
      expect(result._unsafeUnwrapErr().message).toBe('addWorksheet is not supported in batch mode');
    });

    it('sends custom requests even while batching', async () => {
      const spreadsheet = openFixture(createTestClient());
      mockSpreadsheets.batchUpdate.mockResolvedValueOnce({ data: { replies: [{}] } });
      spreadsheet.batchStart();

      await spreadsheet.customRequest([{ deleteSheet: { sheetId: 0 } }]);

      expect(mockSpreadsheets.batchUpdate).toHaveBeenCalledTimes(1);
    });
  });

  it('writes raw values when parsing is off by default', async () => {
    const spreadsheet = openFixture(createTestClient(), spreadsheetJSON(), false);
    mockSpreadsheets.values.batchUpdate.mockResolvedValueOnce({ data: {} });

    await spreadsheet.writeValues([{ range: "'Sheet1'!A1:A1", values: [['=1+1']] }]);

    expect(mockSpreadsheets.values.batchUpdate.mock.calls[0][0].requestBody.valueInputOption).toBe('RAW');
  });

  describe('replace', () => {
    it('replaces through every worksheet', async () => {
      const spreadsheet = openFixture(createTestClient());
      mockSpreadsheets.batchUpdate.mockResolvedValueOnce({
        data: { replies: [{ findReplace: { occurrencesChanged: 3 } }] },
      });

      const result = (await spreadsheet.replace('foo', 'bar'))._unsafeUnwrap();

      expect(result).toEqual({ occurrencesChanged: 3 });
      expect(mockSpreadsheets.batchUpdate.mock.calls[0][0].requestBody.requests).toEqual([
        {
          findReplace: {
            find: 'foo',
            replacement: 'bar',
            searchByRegex: true,
            matchCase: false,
            includeFormulas: false,
            matchEntireCell: false,
            allSheets: true,
          },
        },
      ]);
    });

    it('limits the replacement to a range', async () => {
      const spreadsheet = openFixture(createTestClient());
      mockSpreadsheets.batchUpdate.mockResolvedValueOnce({ data: { replies: [{ findReplace: {} }] } });

      await spreadsheet.replace('a', 'b', { range: 'Sheet1!A1:B2', regex: false });

      const request = mockSpreadsheets.batchUpdate.mock.calls[0][0].requestBody.requests[0].findReplace;
      expect(request.searchByRegex).toBe(false);
      expect(request.range).toEqual({
        sheetId: 0,
        startRowIndex: 0,
        startColumnIndex: 0,
        endRowIndex: 2,
        endColumnIndex: 2,
      });
      expect(request.allSheets).toBeUndefined();
    });

    it('resolves to null while batching', async () => {
      const spreadsheet = openFixture(createTestClient());
      spreadsheet.batchStart();

      expect((await spreadsheet.replace('a', 'b'))._unsafeUnwrap()).toBeNull();
    });
  });

  describe('sharing', () => {
    it('shares with a domain', async () => {
      const spreadsheet = openFixture(createTestClient());
      mockPermissions.create.mockResolvedValueOnce({
        data: { id: 'perm-1', type: 'domain', role: 'writer', domain: 'example.com' },
      });

      const permission = (await spreadsheet.share('example.com', { type: 'domain', role: 'writer' }))._unsafeUnwrap();

      expect(permission).toEqual({ id: 'perm-1', type: 'domain', role: 'writer', domain: 'example.com' });
      expect(mockPermissions.create.mock.calls[0][0].requestBody).toEqual({
        kind: 'drive#permission',
        role: 'writer',
        type: 'domain',
        domain: 'example.com',
      });
    });

    it('removes every permission of an address', async () => {
      const spreadsheet = openFixture(createTestClient());
      mockPermissions.list.mockResolvedValueOnce({
        data: {
          permissions: [
            { id: 'perm-1', type: 'user', role: 'reader', emailAddress: 'reader@example.com' },
            { id: 'perm-2', type: 'user', role: 'owner', emailAddress: 'owner@example.com' },
          ],
        },
      });
      mockPermissions.delete.mockResolvedValueOnce({ data: {} });

      const removed = (await spreadsheet.removePermission('reader@example.com'))._unsafeUnwrap();

      expect(removed).toBe(1);
      expect(mockPermissions.delete).toHaveBeenCalledWith({
        fileId: SPREADSHEET_ID,
        permissionId: 'perm-1',
        supportsAllDrives: true,
      });
    });
  });

  describe('export', () => {
    let directory: string;

    beforeEach(async () => {
      directory = await fs.mkdtemp(join(tmpdir(), 'sheets-export-'));
    });

    afterEach(async () => {
      await fs.rm(directory, { recursive: true, force: true });
    });

    it('splits a CSV export into one file per worksheet', async () => {
      const spreadsheet = openFixture(createTestClient(), spreadsheetJSON([SHEET1, DATA_SHEET]));
      mockFiles.export
        .mockResolvedValueOnce({ data: Buffer.from('a,b') })
        .mockResolvedValueOnce({ data: Buffer.from('c,d') });
      mockSpreadsheets.batchUpdate.mockResolvedValue({ data: { replies: [{}] } });

      const paths = (await spreadsheet.export(ExportType.CSV, { path: directory, filename: 'report' }))._unsafeUnwrap();

      expect(paths).toEqual([join(directory, 'report0.csv'), join(directory, 'report1.csv')]);
      expect(await fs.readFile(paths[0], 'utf8')).toBe('a,b');
      expect(await fs.readFile(paths[1], 'utf8')).toBe('c,d');
      expect(mockFiles.export).toHaveBeenCalledWith(
        { fileId: SPREADSHEET_ID, mimeType: 'text/csv' },
        { responseType: 'arraybuffer' }
      );
      expect(mockSpreadsheets.batchUpdate.mock.calls.map(call => call[0].requestBody.requests)).toEqual([
        [{ updateSheetProperties: { properties: { sheetId: 7, index: 0 }, fields: 'index' } }],
        [{ updateSheetProperties: { properties: { sheetId: 7, index: 1 }, fields: 'index' } }],
      ]);
    });

    it('exports a PDF as one file named after the spreadsheet', async () => {
      const spreadsheet = openFixture(createTestClient(), spreadsheetJSON([SHEET1, DATA_SHEET]));
      mockFiles.export.mockResolvedValueOnce({ data: Buffer.from('%PDF') });

      const paths = (await spreadsheet.export(ExportType.PDF, { path: directory }))._unsafeUnwrap();

      expect(paths).toEqual([join(directory, `${SPREADSHEET_ID}.pdf`)]);
      expect(mockSpreadsheets.batchUpdate).not.toHaveBeenCalled();
    });
  });

  it('splits an export type into mime type and extension', () => {
    expect(exportParts(ExportType.TSV)).toEqual({ mimeType: 'text/tab-separated-values', extension: '.tsv' });
  });

  describe('developer metadata', () => {
    it('creates an entry and reads back its id', async () => {
      const spreadsheet = openFixture(createTestClient());
      mockSpreadsheets.batchUpdate.mockResolvedValueOnce({
        data: { replies: [{ createDeveloperMetadata: { developerMetadata: { metadataId: 42 } } }] },
      });

      const metadata = (await spreadsheet.createDeveloperMetadata('owner', 'finance'))._unsafeUnwrap();

      expect(metadata?.id).toBe(42);
      expect(mockSpreadsheets.batchUpdate.mock.calls[0][0].requestBody.requests).toEqual([
        {
          createDeveloperMetadata: {
            developerMetadata: {
              metadataKey: 'owner',
              metadataValue: 'finance',
              location: { spreadsheet: true },
              visibility: 'DOCUMENT',
            },
          },
        },
      ]);
    });

    it('resolves to null when the creation is queued', async () => {
      const spreadsheet = openFixture(createTestClient());
      spreadsheet.batchStart();

      expect((await spreadsheet.createDeveloperMetadata('owner', 'finance'))._unsafeUnwrap()).toBeNull();
    });

    it('searches spreadsheet-level entries by key', async () => {
      const spreadsheet = openFixture(createTestClient());
      mockSpreadsheets.developerMetadata.search.mockResolvedValueOnce({
        data: {
          matchedDeveloperMetadata: [
            { developerMetadata: { metadataId: 5, metadataKey: 'owner', metadataValue: 'finance' } },
          ],
        },
      });

      const found = (await spreadsheet.findDeveloperMetadata('owner'))._unsafeUnwrap();

      expect(found.map(entry => [entry.id, entry.key, entry.value])).toEqual([[5, 'owner', 'finance']]);
      expect(mockSpreadsheets.developerMetadata.search).toHaveBeenCalledWith({
        spreadsheetId: SPREADSHEET_ID,
        requestBody: {
          dataFilters: [
            { developerMetadataLookup: { metadataLocation: { spreadsheet: true }, metadataKey: 'owner' } },
          ],
        },
      });
    });
  });
});
