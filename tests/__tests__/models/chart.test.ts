import { Chart } from '../../../src/models/chart';
import { GoogleSheetsBatchModeError } from '../../../src/errors/index';
import type { Spreadsheet } from '../../../src/models/spreadsheet';
import type { Worksheet } from '../../../src/models/worksheet';
import { ChartType } from '../../../src/types/index';
import { SHEET1, createTestClient, openFixture, sheetJSON, spreadsheetJSON } from './fixtures';

const mockSpreadsheets = {
  batchUpdate: jest.fn(),
  get: jest.fn(),
};

jest.mock('googleapis', () => ({
  google: {
    sheets: jest.fn(() => ({ spreadsheets: mockSpreadsheets })),
    drive: jest.fn(() => ({})),
  },
}));

const DOMAIN = { sheetId: 0, startRowIndex: 0, startColumnIndex: 0, endRowIndex: 5, endColumnIndex: 1 };
const SERIES = { sheetId: 0, startRowIndex: 0, startColumnIndex: 1, endRowIndex: 5, endColumnIndex: 2 };

const SALES_SPEC = {
  title: 'Sales',
  fontName: 'Roboto',
  titleTextFormat: { fontFamily: 'Roboto' },
  basicChart: {
    chartType: 'COLUMN',
    legendPosition: 'RIGHT_LEGEND',
    domains: [{ domain: { sourceRange: { sources: [DOMAIN] } } }],
    series: [{ series: { sourceRange: { sources: [SERIES] } } }],
  },
};

function sentRequests(call = 0): unknown {
  return mockSpreadsheets.batchUpdate.mock.calls[call][0].requestBody.requests;
}

describe('Chart', () => {
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

  it('adds a chart below the domain and reads back its id', async () => {
    mockSpreadsheets.batchUpdate.mockResolvedValueOnce({
      data: { replies: [{ addChart: { chart: { chartId: 99, spec: SALES_SPEC } } }] },
    });

    const chart = (await worksheet.addChart(['A1', 'A5'], [['B1', 'B5']], { title: 'Sales' }))._unsafeUnwrap();

    expect(sentRequests()).toEqual([
      {
        addChart: {
          chart: {
            spec: SALES_SPEC,
            position: { overlayPosition: { anchorCell: { sheetId: 0, rowIndex: 5, columnIndex: 0 } } },
          },
        },
      },
    ]);
    expect([chart.id, chart.title, chart.chartType]).toEqual([99, 'Sales', ChartType.COLUMN]);
    expect(chart.domain?.a1).toBe('A1:A5');
    expect(chart.ranges.map(range => range.a1)).toEqual(['B1:B5']);
  });

  it('places the chart at an explicit anchor', () => {
    const chart = new Chart(worksheet, ['A1', 'A5'], [], { anchorCell: 'D2' });

    expect(chart.anchorJSON()).toEqual({ sheetId: 0, rowIndex: 1, columnIndex: 3 });
  });

  it('cannot be added while batching', async () => {
    spreadsheet.batchStart();

    const result = await worksheet.addChart(['A1', 'A5'], [['B1', 'B5']]);

    expect(result._unsafeUnwrapErr()).toBeInstanceOf(GoogleSheetsBatchModeError);
    expect(result._unsafeUnwrapErr().message).toBe('addChart is not supported in batch mode');
  });

  it('sends the whole spec when a property changes', async () => {
    const chart = new Chart(worksheet, ['A1', 'A5'], [['B1', 'B5']], { title: 'Sales' }, 99);

    await chart.setChartType(ChartType.LINE);
    await chart.setLegendPosition('BOTTOM_LEGEND');

    expect(sentRequests(1)).toEqual([
      {
        updateChartSpec: {
          chartId: 99,
          spec: {
            ...SALES_SPEC,
            basicChart: { ...SALES_SPEC.basicChart, chartType: 'LINE', legendPosition: 'BOTTOM_LEGEND' },
          },
        },
      },
    ]);
  });

  it('deletes itself', async () => {
    await new Chart(worksheet, undefined, [], {}, 99).delete();

    expect(sentRequests()).toEqual([{ deleteEmbeddedObject: { objectId: 99 } }]);
  });

  it('lists the charts of a worksheet', async () => {
    mockSpreadsheets.get.mockResolvedValueOnce({
      data: spreadsheetJSON([], {
        sheets: [
          {
            ...sheetJSON(SHEET1),
            charts: [
              {
                chartId: 4,
                spec: { ...SALES_SPEC, title: 'Trend', basicChart: { ...SALES_SPEC.basicChart, chartType: 'LINE' } },
                position: { overlayPosition: { anchorCell: { sheetId: 0, rowIndex: 0, columnIndex: 3 } } },
              },
            ],
          },
        ],
      }),
    });

    const charts = (await worksheet.getCharts())._unsafeUnwrap();

    expect(charts.map(chart => chart.toString())).toEqual(['<Chart LINE "Trend">']);
    expect(charts[0].anchorJSON()).toEqual({ sheetId: 0, rowIndex: 0, columnIndex: 3 });
    expect(charts[0].domain?.label).toBe("'Sheet1'!A1:A5");
  });

  it('reports a chart that is gone on refresh', async () => {
    mockSpreadsheets.get.mockResolvedValueOnce({ data: spreadsheetJSON() });
    const chart = new Chart(worksheet, undefined, [], {}, 99);

    const result = await chart.refresh();

    expect(result._unsafeUnwrapErr().code).toBe('GOOGLE_SHEETS_CHART_NOT_FOUND');
    expect(result._unsafeUnwrapErr().message).toBe('Chart 99 not found on worksheet Sheet1');
  });
});
