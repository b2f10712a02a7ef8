import type { sheets_v4 } from 'googleapis';

import {
  GoogleSheetsBatchModeError,
  GoogleSheetsError,
  googleErr,
  googleOk,
} from '../errors/index.js';
import type { GoogleWorkspaceResult } from '../errors/index.js';
import { ChartType, LEGEND_POSITIONS } from '../types/index.js';
import type { LegendPosition } from '../types/index.js';
import { Address, GridRange } from './address.js';
import type { AddressInput } from './address.js';
import type { Worksheet } from './worksheet.js';

/** Start and end of a chart domain or series */
export type RangePair = [AddressInput, AddressInput];

export interface ChartOptions {
  title?: string;
  chartType?: ChartType;
  /** Top left corner of the chart; defaults to beside the domain's last cell */
  anchorCell?: AddressInput;
  fontName?: string;
  legendPosition?: LegendPosition;
}

const DEFAULT_FONT = 'Roboto';
const DEFAULT_LEGEND: LegendPosition = 'RIGHT_LEGEND';

function chartTypeOf(value: string | null | undefined): ChartType | undefined {
  return Object.values(ChartType).find(type => type === value);
}

function legendPositionOf(value: string | null | undefined): LegendPosition | undefined {
  return LEGEND_POSITIONS.find(position => position === value);
}

function sourceRange(range: GridRange): sheets_v4.Schema$ChartData {
  return { sourceRange: { sources: [range.toJSON()] } };
}

/**
 * A basic chart embedded in a worksheet.
 *
 * Each setter updates the local state and sends the whole spec again.
 */
export class Chart {
  private idState?: number;
  private titleState: string;
  private chartTypeState: ChartType;
  private domainState?: GridRange;
  private rangesState: GridRange[];
  private fontNameState: string;
  private legendPositionState: LegendPosition;
  private anchor?: Address;

  constructor(
    readonly worksheet: Worksheet,
    domain: RangePair | undefined,
    ranges: RangePair[],
    options: ChartOptions = {},
    id?: number
  ) {
    this.idState = id;
    this.titleState = options.title ?? '';
    this.chartTypeState = options.chartType ?? ChartType.COLUMN;
    this.domainState = domain ? worksheet.gridRange(domain) : undefined;
    this.rangesState = ranges.map(range => worksheet.gridRange(range));
    this.fontNameState = options.fontName ?? DEFAULT_FONT;
    this.legendPositionState = options.legendPosition ?? DEFAULT_LEGEND;
    this.anchor = options.anchorCell === undefined ? undefined : Address.from(options.anchorCell);
  }

  /**
   * Add a chart to `worksheet` and read back its id
   */
  static async create(
    worksheet: Worksheet,
    domain: RangePair,
    ranges: RangePair[],
    options: ChartOptions = {}
  ): Promise<GoogleWorkspaceResult<Chart>> {
    if (worksheet.spreadsheet.batchMode) {
      return googleErr(new GoogleSheetsBatchModeError('addChart', worksheet.spreadsheet.id));
    }
    let chart: Chart;
    try {
      chart = new Chart(worksheet, domain, ranges, options);
    } catch (error) {
      if (error instanceof GoogleSheetsError) {
        return googleErr(error);
      }
      throw error;
    }

    const result = await worksheet.spreadsheet.dispatch([
      {
        addChart: {
          chart: {
            spec: chart.spec(),
            position: { overlayPosition: { anchorCell: chart.anchorJSON() } },
          },
        },
      },
    ]);
    if (result.isErr()) {
      return googleErr(result.error);
    }
    const created = result.value.queued ? undefined : result.value.response.replies?.[0]?.addChart?.chart;
    if (created) {
      chart.setJSON(created);
    }
    return googleOk(chart);
  }

  /**
   * Chart from an `EmbeddedChart`
   *
   * @throws GoogleSheetsInvalidAddressError when a source range is malformed
   */
  static fromJSON(worksheet: Worksheet, json: sheets_v4.Schema$EmbeddedChart): Chart {
    const chart = new Chart(worksheet, undefined, []);
    return chart.setJSON(json);
  }

  get id(): number | undefined {
    return this.idState;
  }

  get title(): string {
    return this.titleState;
  }

  get chartType(): ChartType {
    return this.chartTypeState;
  }

  get domain(): GridRange | undefined {
    return this.domainState;
  }

  get ranges(): GridRange[] {
    return [...this.rangesState];
  }

  get fontName(): string {
    return this.fontNameState;
  }

  get legendPosition(): LegendPosition {
    return this.legendPositionState;
  }

  /**
   * 0-based anchor cell. Without an explicit anchor the chart sits in the
   * column of the domain's last cell, one row below it.
   */
  anchorJSON(): sheets_v4.Schema$GridCoordinate {
    if (this.anchor) {
      return {
        sheetId: this.worksheet.id,
        rowIndex: (this.anchor.row ?? 1) - 1,
        columnIndex: (this.anchor.col ?? 1) - 1,
      };
    }
    const end = this.domainState?.end;
    return {
      sheetId: this.worksheet.id,
      rowIndex: end?.row ?? 0,
      columnIndex: (end?.col ?? 1) - 1,
    };
  }

  /** `ChartSpec` for the current state */
  spec(): sheets_v4.Schema$ChartSpec {
    return {
      title: this.titleState,
      fontName: this.fontNameState,
      titleTextFormat: { fontFamily: this.fontNameState },
      basicChart: {
        chartType: this.chartTypeState,
        legendPosition: this.legendPositionState,
        domains: this.domainState ? [{ domain: sourceRange(this.domainState) }] : [],
        series: this.rangesState.map(range => ({ series: sourceRange(range) })),
      },
    };
  }

  private async updateSpec(): Promise<GoogleWorkspaceResult<this>> {
    const result = await this.worksheet.spreadsheet.dispatch([
      { updateChartSpec: { chartId: this.idState, spec: this.spec() } },
    ]);
    return result.map(() => this);
  }

  setTitle(title: string): Promise<GoogleWorkspaceResult<this>> {
    this.titleState = title;
    return this.updateSpec();
  }

  setChartType(chartType: ChartType): Promise<GoogleWorkspaceResult<this>> {
    this.chartTypeState = chartType;
    return this.updateSpec();
  }

  setDomain(domain: RangePair): Promise<GoogleWorkspaceResult<this>> {
    this.domainState = this.worksheet.gridRange(domain);
    return this.updateSpec();
  }

  setRanges(ranges: RangePair[]): Promise<GoogleWorkspaceResult<this>> {
    this.rangesState = ranges.map(range => this.worksheet.gridRange(range));
    return this.updateSpec();
  }

  setFontName(fontName: string): Promise<GoogleWorkspaceResult<this>> {
    this.fontNameState = fontName;
    return this.updateSpec();
  }

  setLegendPosition(position: LegendPosition): Promise<GoogleWorkspaceResult<this>> {
    this.legendPositionState = position;
    return this.updateSpec();
  }

  async delete(): Promise<GoogleWorkspaceResult<void>> {
    const result = await this.worksheet.spreadsheet.dispatch([{ deleteEmbeddedObject: { objectId: this.idState } }]);
    return result.map(() => undefined);
  }

  /**
   * Re-read the chart from its worksheet
   */
  async refresh(): Promise<GoogleWorkspaceResult<this>> {
    const refreshed = await this.worksheet.refresh();
    if (refreshed.isErr()) {
      return googleErr(refreshed.error);
    }
    const json = this.worksheet.charts.find(chart => chart.chartId === this.idState);
    if (!json) {
      return googleErr(
        new GoogleSheetsError(
          `Chart ${this.idState ?? '(unsaved)'} not found on worksheet ${this.worksheet.title}`,
          'GOOGLE_SHEETS_CHART_NOT_FOUND',
          404,
          this.worksheet.spreadsheet.id
        )
      );
    }
    return googleOk(this.setJSON(json));
  }

  setJSON(json: sheets_v4.Schema$EmbeddedChart): this {
    this.idState = json.chartId ?? this.idState;
    const spec = json.spec;
    const basic = spec?.basicChart;
    this.titleState = spec?.title ?? '';
    this.fontNameState = spec?.fontName ?? spec?.titleTextFormat?.fontFamily ?? DEFAULT_FONT;
    this.chartTypeState = chartTypeOf(basic?.chartType) ?? this.chartTypeState;
    this.legendPositionState = legendPositionOf(basic?.legendPosition) ?? this.legendPositionState;

    const toRange = (data: sheets_v4.Schema$ChartData | undefined): GridRange | undefined => {
      const source = data?.sourceRange?.sources?.[0];
      return source ? GridRange.fromJSON(source).withWorksheet(this.worksheet) : undefined;
    };
    this.domainState = toRange(basic?.domains?.[0]?.domain);
    this.rangesState = (basic?.series ?? []).flatMap(series => {
      const range = toRange(series.series);
      return range ? [range] : [];
    });

    const anchor = json.position?.overlayPosition?.anchorCell;
    if (anchor && typeof anchor.rowIndex === 'number' && typeof anchor.columnIndex === 'number') {
      this.anchor = Address.from([anchor.rowIndex + 1, anchor.columnIndex + 1]);
    }
    return this;
  }

  toString(): string {
    return `<Chart ${this.chartTypeState} ${JSON.stringify(this.titleState)}>`;
  }
}
