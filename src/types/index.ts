// Environment
export interface EnvironmentConfig {
  // Service Account Configuration
  GOOGLE_SERVICE_ACCOUNT_KEY_PATH?: string;

  // OAuth2 Configuration
  GOOGLE_AUTH_MODE?: 'service-account' | 'oauth2';
  GOOGLE_OAUTH_CLIENT_SECRET_PATH?: string;
  GOOGLE_OAUTH_CLIENT_ID?: string;
  GOOGLE_OAUTH_CLIENT_SECRET?: string;
  GOOGLE_OAUTH_REDIRECT_URI?: string;
  GOOGLE_OAUTH_SCOPES?: string[];
  GOOGLE_OAUTH_PORT?: number;
  GOOGLE_CREDENTIALS_DIRECTORY?: string;

  // Retry Configuration
  GOOGLE_RETRY_MAX_ATTEMPTS?: number;
  GOOGLE_RETRY_BASE_DELAY?: number;
  GOOGLE_RETRY_MAX_DELAY?: number;
  GOOGLE_RETRY_JITTER?: number;
  GOOGLE_RETRY_RETRIABLE_CODES?: number[];

  // Timeout Configuration
  GOOGLE_REQUEST_TIMEOUT?: number;
  GOOGLE_TOTAL_TIMEOUT?: number;

  // Sheets Configuration
  GOOGLE_SHEETS_DEFAULT_PARSE?: boolean;
}

// Cell values
export type CellValue = string | number | boolean;

/** Coordinate pair, 1-based `[row, col]`. `null` marks an unbounded part. */
export type AddressTuple = [number | null, number | null];

/** A value to write; `null` leaves the cell unchanged */
export type CellInput = CellValue | null;

/**
 * One range of a `values.batchUpdate` call
 */
export interface ValueRangeInput {
  /** A1 range including the sheet title */
  range: string;
  majorDimension?: Dimension;
  values: CellInput[][];
}

// Sheets API enums
export enum ValueRenderOption {
  FORMATTED_VALUE = 'FORMATTED_VALUE',
  UNFORMATTED_VALUE = 'UNFORMATTED_VALUE',
  FORMULA = 'FORMULA',
}

export enum DateTimeRenderOption {
  SERIAL_NUMBER = 'SERIAL_NUMBER',
  FORMATTED_STRING = 'FORMATTED_STRING',
}

export enum ValueInputOption {
  RAW = 'RAW',
  USER_ENTERED = 'USER_ENTERED',
}

/**
 * Number format types. `CUSTOM` has no API value: it only carries a pattern.
 */
export enum FormatType {
  CUSTOM = 'CUSTOM',
  TEXT = 'TEXT',
  NUMBER = 'NUMBER',
  PERCENT = 'PERCENT',
  CURRENCY = 'CURRENCY',
  DATE = 'DATE',
  TIME = 'TIME',
  DATE_TIME = 'DATE_TIME',
  SCIENTIFIC = 'SCIENTIFIC',
}

/**
 * Export formats as `mimeType:extension`
 */
export enum ExportType {
  XLS = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet:.xls',
  ODT = 'application/x-vnd.oasis.opendocument.spreadsheet:.odt',
  PDF = 'application/pdf:.pdf',
  CSV = 'text/csv:.csv',
  TSV = 'text/tab-separated-values:.tsv',
  HTML = 'application/zip:.zip',
}

export enum ChartType {
  BAR = 'BAR',
  LINE = 'LINE',
  AREA = 'AREA',
  COLUMN = 'COLUMN',
  SCATTER = 'SCATTER',
  COMBO = 'COMBO',
  STEPPED_AREA = 'STEPPED_AREA',
}

export type Dimension = 'ROWS' | 'COLUMNS';
export type WorksheetProperty = 'title' | 'id' | 'index';
export type SortOrder = 'ASCENDING' | 'DESCENDING';
export type MergeType = 'MERGE_ALL' | 'MERGE_COLUMNS' | 'MERGE_ROWS' | 'NONE';
export type CellDirection = 'right' | 'left' | 'top' | 'bottom';
export const LEGEND_POSITIONS = ['BOTTOM_LEGEND', 'LEFT_LEGEND', 'RIGHT_LEGEND', 'TOP_LEGEND', 'NO_LEGEND'] as const;
export type LegendPosition = (typeof LEGEND_POSITIONS)[number];

export const BORDER_STYLES = [
  'SOLID',
  'DOTTED',
  'DASHED',
  'SOLID_MEDIUM',
  'SOLID_THICK',
  'DOUBLE',
  'NONE',
] as const;
export type BorderStyle = (typeof BORDER_STYLES)[number];

// Drive permissions
export const PERMISSION_ROLES = ['organizer', 'owner', 'writer', 'commenter', 'reader'] as const;
export type PermissionRole = (typeof PERMISSION_ROLES)[number];

export const PERMISSION_TYPES = ['user', 'group', 'domain', 'anyone'] as const;
export type PermissionType = (typeof PERMISSION_TYPES)[number];

export interface DriveFileInfo {
  id: string;
  name: string;
  parents?: string[];
  modifiedTime?: string;
}

export interface Permission {
  id: string;
  type: string;
  role: string;
  emailAddress?: string;
  domain?: string;
  displayName?: string;
  expirationTime?: string;
}

/**
 * Configuration interface for retry behavior.
 * Used by GoogleService for handling transient failures.
 */
export interface RetryConfig {
  /** Maximum number of retry attempts (default: 3) */
  maxAttempts: number;

  /** Base delay in milliseconds between attempts (default: 1000) */
  baseDelay: number;

  /** Maximum delay in milliseconds (default: 30000) */
  maxDelay: number;

  /** Jitter factor to randomize delays (0-1, default: 0.1) */
  jitter: number;

  /** HTTP status codes that should trigger retry attempts */
  retriableCodes: number[];
}

// Authentication related types
export interface AuthInfo {
  isAuthenticated: boolean;
  /** Service account key file path or client ID (depending on provider type) */
  keyFile: string;
  scopes: string[];
  tokenInfo?: {
    expiresAt?: Date;
    hasToken: boolean;
  };
}
