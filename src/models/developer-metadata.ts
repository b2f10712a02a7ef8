import type { sheets_v4 } from 'googleapis';

import type { GoogleWorkspaceResult } from '../errors/index.js';
import { googleErr, googleOk } from '../errors/index.js';
import type { Spreadsheet } from './spreadsheet.js';

/**
 * Where a metadata entry lives: the whole spreadsheet or one worksheet
 */
export type MetadataLocation = { spreadsheet: true } | { sheetId: number };

export function metadataLocation(sheetId?: number): MetadataLocation {
  return sheetId === undefined ? { spreadsheet: true } : { sheetId };
}

export interface MetadataLookup {
  sheetId?: number;
  id?: number;
  key?: string;
  value?: string;
}

/**
 * `DataFilter` matching metadata by location and any of id, key and value
 */
export function metadataFilter(lookup: MetadataLookup): sheets_v4.Schema$DataFilter {
  const developerMetadataLookup: sheets_v4.Schema$DeveloperMetadataLookup = {
    metadataLocation: metadataLocation(lookup.sheetId),
  };
  if (lookup.id !== undefined) developerMetadataLookup.metadataId = lookup.id;
  if (lookup.key !== undefined) developerMetadataLookup.metadataKey = lookup.key;
  if (lookup.value !== undefined) developerMetadataLookup.metadataValue = lookup.value;
  return { developerMetadataLookup };
}

/**
 * A key/value pair attached to a spreadsheet or a worksheet
 */
export class DeveloperMetadata {
  key: string;
  value: string;

  constructor(
    readonly id: number,
    key: string,
    value: string,
    private readonly spreadsheet: Spreadsheet,
    readonly sheetId?: number
  ) {
    this.key = key;
    this.value = value;
  }

  /**
   * Create an entry. Resolves to `null` when the request was queued in
   * batch mode, since the id is only known once it is sent.
   */
  static async create(
    spreadsheet: Spreadsheet,
    key: string,
    value: string,
    sheetId?: number
  ): Promise<GoogleWorkspaceResult<DeveloperMetadata | null>> {
    const result = await spreadsheet.dispatch([
      {
        createDeveloperMetadata: {
          developerMetadata: {
            metadataKey: key,
            metadataValue: value,
            location: metadataLocation(sheetId),
            visibility: 'DOCUMENT',
          },
        },
      },
    ]);
    if (result.isErr()) {
      return googleErr(result.error);
    }
    if (result.value.queued) {
      return googleOk(null);
    }

    const created = result.value.response.replies?.[0]?.createDeveloperMetadata?.developerMetadata;
    return googleOk(new DeveloperMetadata(created?.metadataId ?? 0, key, value, spreadsheet, sheetId));
  }

  /**
   * Entries matching `key` (or every entry) at the given location
   */
  static async search(
    spreadsheet: Spreadsheet,
    key?: string,
    sheetId?: number
  ): Promise<GoogleWorkspaceResult<DeveloperMetadata[]>> {
    const result = await spreadsheet.client.sheets.developerMetadataSearch(spreadsheet.id, [
      metadataFilter({ sheetId, key }),
    ]);
    return result.map(matches =>
      matches.flatMap(match => {
        const metadata = match.developerMetadata;
        if (!metadata || metadata.metadataId === null || metadata.metadataId === undefined) {
          return [];
        }
        return [
          new DeveloperMetadata(
            metadata.metadataId,
            metadata.metadataKey ?? '',
            metadata.metadataValue ?? '',
            spreadsheet,
            metadata.location?.sheetId ?? sheetId
          ),
        ];
      })
    );
  }

  private get filter(): sheets_v4.Schema$DataFilter {
    return metadataFilter({ sheetId: this.sheetId, id: this.id });
  }

  /** Re-read key and value */
  async fetch(): Promise<GoogleWorkspaceResult<this>> {
    const result = await this.spreadsheet.client.sheets.developerMetadataGet(this.spreadsheet.id, this.id);
    return result.map(metadata => {
      this.key = metadata.metadataKey ?? '';
      this.value = metadata.metadataValue ?? '';
      return this;
    });
  }

  /**
   * Push the local key and value
   */
  async update(): Promise<GoogleWorkspaceResult<void>> {
    const result = await this.spreadsheet.dispatch([
      {
        updateDeveloperMetadata: {
          dataFilters: [this.filter],
          developerMetadata: {
            metadataKey: this.key,
            metadataValue: this.value,
            location: metadataLocation(this.sheetId),
          },
          fields: '*',
        },
      },
    ]);
    return result.map(() => undefined);
  }

  async delete(): Promise<GoogleWorkspaceResult<void>> {
    const result = await this.spreadsheet.dispatch([{ deleteDeveloperMetadata: { dataFilter: this.filter } }]);
    return result.map(() => undefined);
  }
}
