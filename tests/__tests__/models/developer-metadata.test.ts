import { DeveloperMetadata, metadataFilter } from '../../../src/models/developer-metadata';
import type { Spreadsheet } from '../../../src/models/spreadsheet';
import type { Worksheet } from '../../../src/models/worksheet';
import { SPREADSHEET_ID, createTestClient, openFixture } from './fixtures';

const mockSpreadsheets = {
  batchUpdate: jest.fn(),
  developerMetadata: {
    get: jest.fn(),
    search: jest.fn(),
  },
};

jest.mock('googleapis', () => ({
  google: {
    sheets: jest.fn(() => ({ spreadsheets: mockSpreadsheets })),
    drive: jest.fn(() => ({})),
  },
}));

function sentRequests(call = 0): unknown {
  return mockSpreadsheets.batchUpdate.mock.calls[call][0].requestBody.requests;
}

describe('metadataFilter', () => {
  it('matches the whole spreadsheet without a sheet id', () => {
    expect(metadataFilter({ key: 'owner' })).toEqual({
      developerMetadataLookup: { metadataLocation: { spreadsheet: true }, metadataKey: 'owner' },
    });
  });

  it('matches one worksheet by id and value', () => {
    expect(metadataFilter({ sheetId: 7, id: 3, value: 'finance' })).toEqual({
      developerMetadataLookup: { metadataLocation: { sheetId: 7 }, metadataId: 3, metadataValue: 'finance' },
    });
  });
});

describe('DeveloperMetadata', () => {
  let spreadsheet: Spreadsheet;
  let worksheet: Worksheet;

  beforeEach(() => {
    jest.clearAllMocks();
    spreadsheet = openFixture(createTestClient());
    const first = spreadsheet.sheet1;
    if (!first) throw new Error('fixture has no worksheet');
    worksheet = first;
    mockSpreadsheets.batchUpdate.mockResolvedValue({ data: { replies: [{}] } });
  });

  it('attaches an entry to a worksheet', async () => {
    mockSpreadsheets.batchUpdate.mockResolvedValueOnce({
      data: { replies: [{ createDeveloperMetadata: { developerMetadata: { metadataId: 11 } } }] },
    });

    const metadata = (await worksheet.createDeveloperMetadata('stage', 'draft'))._unsafeUnwrap();

    expect(sentRequests()).toEqual([
      {
        createDeveloperMetadata: {
          developerMetadata: {
            metadataKey: 'stage',
            metadataValue: 'draft',
            location: { sheetId: 0 },
            visibility: 'DOCUMENT',
          },
        },
      },
    ]);
    expect([metadata?.id, metadata?.key, metadata?.value, metadata?.sheetId]).toEqual([11, 'stage', 'draft', 0]);
  });

  it('finds entries of a worksheet and skips matches without an id', async () => {
    mockSpreadsheets.developerMetadata.search.mockResolvedValueOnce({
      data: {
        matchedDeveloperMetadata: [
          {
            developerMetadata: {
              metadataId: 11,
              metadataKey: 'stage',
              metadataValue: 'draft',
              location: { sheetId: 0 },
            },
          },
          { developerMetadata: { metadataKey: 'stage' } },
        ],
      },
    });

    const found = (await worksheet.getDeveloperMetadata('stage'))._unsafeUnwrap();

    expect(mockSpreadsheets.developerMetadata.search).toHaveBeenCalledWith({
      spreadsheetId: SPREADSHEET_ID,
      requestBody: {
        dataFilters: [{ developerMetadataLookup: { metadataLocation: { sheetId: 0 }, metadataKey: 'stage' } }],
      },
    });
    expect(found.map(entry => [entry.id, entry.value, entry.sheetId])).toEqual([[11, 'draft', 0]]);
  });

  it('pushes a changed value by id', async () => {
    const metadata = new DeveloperMetadata(11, 'stage', 'draft', spreadsheet, 0);
    metadata.value = 'final';

    await metadata.update();

    expect(sentRequests()).toEqual([
      {
        updateDeveloperMetadata: {
          dataFilters: [{ developerMetadataLookup: { metadataLocation: { sheetId: 0 }, metadataId: 11 } }],
          developerMetadata: { metadataKey: 'stage', metadataValue: 'final', location: { sheetId: 0 } },
          fields: '*',
        },
      },
    ]);
  });

  it('deletes by id', async () => {
    await new DeveloperMetadata(12, 'owner', 'finance', spreadsheet).delete();

    expect(sentRequests()).toEqual([
      {
        deleteDeveloperMetadata: {
          dataFilter: { developerMetadataLookup: { metadataLocation: { spreadsheet: true }, metadataId: 12 } },
        },
      },
    ]);
  });

  it('re-reads key and value', async () => {
    mockSpreadsheets.developerMetadata.get.mockResolvedValueOnce({
      data: { metadataId: 12, metadataKey: 'owner', metadataValue: 'sales' },
    });
    const metadata = new DeveloperMetadata(12, 'owner', 'finance', spreadsheet);

    await metadata.fetch();

    expect(mockSpreadsheets.developerMetadata.get).toHaveBeenCalledWith({ spreadsheetId: SPREADSHEET_ID, metadataId: 12 });
    expect(metadata.value).toBe('sales');
  });

  it('queues changes in batch mode', async () => {
    spreadsheet.batchStart();

    await new DeveloperMetadata(12, 'owner', 'finance', spreadsheet).delete();

    expect(mockSpreadsheets.batchUpdate).not.toHaveBeenCalled();
  });
});
