/**
 * DriveQueryBuilder utility class for constructing Google Drive `q` strings
 *
 * Conditions are joined with `and`. Trashed files are excluded unless a
 * trashed condition is set explicitly or `includeTrashed` is on.
 */

export const SPREADSHEET_MIME_TYPE = 'application/vnd.google-apps.spreadsheet';
export const FOLDER_MIME_TYPE = 'application/vnd.google-apps.folder';

export interface DriveQueryBuilderOptions {
  includeTrashed?: boolean;
}

const VALID_FIELDS = [
  'name',
  'mimeType',
  'modifiedTime',
  'createdTime',
  'parents',
  'trashed',
  'fullText',
  'owners',
  'writers',
  'readers',
  'starred',
  'sharedWithMe',
  'properties',
  'appProperties',
] as const;

const FIELD_PATTERNS = [
  // field = 'value', field contains 'value', ...
  /([\w.]+)\s*(?:!?=|contains|has|[<>]=?)\s*/g,
  // 'value' in field
  /'[^']*'\s+in\s+([\w.]+)/g,
];

export class DriveQueryBuilder {
  private readonly options: DriveQueryBuilderOptions;
  private customQuery?: string;
  private name?: string;
  private nameContains?: string;
  private mimeType?: string;
  private parentIds: string[] = [];
  private modifiedAfter?: string;
  private modifiedBefore?: string;
  private trashedFilter?: boolean;

  constructor(options: DriveQueryBuilderOptions = {}) {
    this.options = options;
  }

  /**
   * Add a raw Drive query. Only known search fields are accepted.
   */
  public withCustomQuery(query: string): this {
    const trimmed = query.trim();
    if (trimmed) {
      this.validateCustomQuery(trimmed);
      this.customQuery = trimmed;
    }
    return this;
  }

  public withName(name: string): this {
    this.name = name;
    return this;
  }

  public withNameContains(nameContains: string): this {
    this.nameContains = nameContains;
    return this;
  }

  public withMimeType(mimeType: string): this {
    this.mimeType = mimeType;
    return this;
  }

  /**
   * Match files inside any of the given folders
   */
  public withParentsIn(parentIds: string[]): this {
    if (parentIds.some(id => !id || id.trim() === '')) {
      throw new Error('Invalid folder ID');
    }
    this.parentIds = parentIds;
    return this;
  }

  public withModifiedAfter(date: string): this {
    this.validateDateFormat(date);
    this.modifiedAfter = date;
    return this;
  }

  public withModifiedBefore(date: string): this {
    this.validateDateFormat(date);
    this.modifiedBefore = date;
    return this;
  }

  public withTrashed(trashed: boolean): this {
    this.trashedFilter = trashed;
    return this;
  }

  public build(): string {
    const queryParts: string[] = [];

    if (this.customQuery) {
      queryParts.push(this.customQuery);
    }
    if (this.name !== undefined) {
      queryParts.push(`name = '${this.escapeValue(this.name)}'`);
    }
    if (this.nameContains !== undefined) {
      queryParts.push(`name contains '${this.escapeValue(this.nameContains)}'`);
    }
    if (this.mimeType) {
      queryParts.push(`mimeType = '${this.escapeValue(this.mimeType)}'`);
    }
    if (this.parentIds.length === 1) {
      queryParts.push(`'${this.escapeValue(this.parentIds[0])}' in parents`);
    } else if (this.parentIds.length > 1) {
      const parentConditions = this.parentIds.map(id => `'${this.escapeValue(id)}' in parents`);
      queryParts.push(`(${parentConditions.join(' or ')})`);
    }
    if (this.modifiedAfter) {
      queryParts.push(`modifiedTime > '${this.modifiedAfter}'`);
    }
    if (this.modifiedBefore) {
      queryParts.push(`modifiedTime < '${this.modifiedBefore}'`);
    }

    if (this.trashedFilter !== undefined) {
      queryParts.push(`trashed = ${this.trashedFilter}`);
    } else if (!this.options.includeTrashed && !this.containsTrashedCondition(this.customQuery ?? '')) {
      queryParts.push('trashed = false');
    }

    return queryParts.join(' and ');
  }

  private containsTrashedCondition(query: string): boolean {
    return /trashed\s*!?=/i.test(query);
  }

  private validateCustomQuery(query: string): void {
    const unquoted = query.replace(/'(?:[^'\\]|\\.)*'|"(?:[^"\\]|\\.)*"/g, "''");
    const fields = new Set<string>();
    for (const pattern of FIELD_PATTERNS) {
      for (const match of unquoted.matchAll(pattern)) {
        fields.add(match[1]);
      }
    }

    if (fields.size === 0) {
      throw new Error('Invalid query syntax');
    }

    const validFieldsLowerCase = VALID_FIELDS.map(f => f.toLowerCase());
    for (const field of fields) {
      if (!validFieldsLowerCase.includes(field.toLowerCase())) {
        throw new Error(`Invalid field name: ${field}`);
      }
    }
  }

  private validateDateFormat(date: string): void {
    if (!/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d{3})?Z?$/.test(date)) {
      throw new Error('Invalid date format');
    }
  }

  private escapeValue(value: string): string {
    return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
  }
}
