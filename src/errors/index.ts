/**
 * Error class hierarchy for the spreadsheet client
 *
 * Every failure surfaced by the library is a subclass of GoogleWorkspaceError
 * and is returned through a neverthrow Result. The hierarchy is
 * flat: not found, bad address, auth failure and timeout are the categories
 * callers branch on.
 */

import { Result, Err, Ok } from 'neverthrow';

export * from './normalized-error.js';

import { extractGoogleApiError } from './normalized-error.js';
import { extractRetryAfterFromContext } from './retry-after.utils.js';

export type AuthType = 'service-account' | 'oauth2' | 'custom';

/**
 * Base error class for all Google API related errors
 */
export abstract class GoogleWorkspaceError extends Error {
  /**
   * Error code for programmatic identification
   */
  public readonly errorCode: string;

  public get code(): string {
    return this.errorCode;
  }

  /**
   * HTTP status code equivalent
   */
  public readonly statusCode: number;

  public readonly context?: Record<string, unknown>;

  public readonly timestamp: Date;

  constructor(
    message: string,
    errorCode: string,
    statusCode: number = 500,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message);
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.statusCode = statusCode;
    this.context = context;
    this.timestamp = new Date();

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }

    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Convert error to a structured object for logging/serialization
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      statusCode: this.statusCode,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
    };
  }

  /**
   * Check if this error should be retried
   */
  public abstract isRetryable(): boolean;
}

// Authentication errors

export class GoogleAuthError extends GoogleWorkspaceError {
  public readonly authType: AuthType;

  constructor(
    message: string,
    authType: AuthType = 'service-account',
    context?: Record<string, unknown>,
    cause?: Error,
    errorCode: string = 'GOOGLE_AUTH_ERROR',
    statusCode: number = 401
  ) {
    super(message, errorCode, statusCode, { authType, ...context }, cause);
    this.authType = authType;
  }

  public isRetryable(): boolean {
    // an expired token can be refreshed, everything else needs new credentials
    return this.errorCode === 'GOOGLE_AUTH_TOKEN_EXPIRED';
  }
}

export class GoogleAuthTokenExpiredError extends GoogleAuthError {
  constructor(authType: AuthType = 'service-account', context?: Record<string, unknown>) {
    super(
      'Authentication token has expired',
      authType,
      context,
      undefined,
      'GOOGLE_AUTH_TOKEN_EXPIRED',
      401
    );
  }

  public isRetryable(): boolean {
    return true;
  }
}

export class GoogleAuthInvalidCredentialsError extends GoogleAuthError {
  constructor(authType: AuthType = 'service-account', context?: Record<string, unknown>) {
    super(
      'Invalid authentication credentials provided',
      authType,
      context,
      undefined,
      'GOOGLE_AUTH_INVALID_CREDENTIALS',
      403
    );
  }

  public isRetryable(): boolean {
    return false;
  }
}

export class GoogleAuthMissingCredentialsError extends GoogleAuthError {
  constructor(authType: AuthType = 'service-account', context?: Record<string, unknown>) {
    super(
      'Missing required authentication credentials',
      authType,
      context,
      undefined,
      'GOOGLE_AUTH_MISSING_CREDENTIALS',
      401
    );
  }

  public isRetryable(): boolean {
    return false;
  }
}

type OAuth2Context = Record<string, unknown> & {
  redirectUri?: string;
  scopes?: string[];
};

/**
 * OAuth2 specific authentication errors
 */
export class GoogleOAuth2Error extends GoogleAuthError {
  public readonly redirectUri?: string;
  public readonly scopes?: string[];

  constructor(
    message: string,
    errorCode: string = 'GOOGLE_OAUTH2_ERROR',
    statusCode: number = 401,
    context?: OAuth2Context,
    cause?: Error
  ) {
    super(message, 'oauth2', context, cause, errorCode, statusCode);
    this.redirectUri = context?.redirectUri;
    this.scopes = context?.scopes;
  }

  public isRetryable(): boolean {
    return false;
  }
}

export class GoogleOAuth2UserDeniedError extends GoogleOAuth2Error {
  constructor(context?: OAuth2Context) {
    super(
      'User denied authorization request',
      'GOOGLE_OAUTH2_USER_DENIED',
      403,
      context
    );
  }
}

export class GoogleOAuth2TokenStorageError extends GoogleOAuth2Error {
  constructor(
    operation: 'save' | 'load' | 'delete',
    cause?: Error,
    context?: Record<string, unknown>
  ) {
    super(
      `Failed to ${operation} OAuth2 tokens`,
      'GOOGLE_OAUTH2_TOKEN_STORAGE_ERROR',
      500,
      { operation, ...context },
      cause
    );
  }

  public isRetryable(): boolean {
    return true;
  }
}

export class GoogleOAuth2RefreshTokenExpiredError extends GoogleOAuth2Error {
  constructor(context?: Record<string, unknown>) {
    super(
      'OAuth2 refresh token has expired and cannot be renewed',
      'GOOGLE_OAUTH2_REFRESH_TOKEN_EXPIRED',
      401,
      context
    );
  }
}

export class GoogleOAuth2NetworkError extends GoogleOAuth2Error {
  constructor(message: string, cause?: Error, context?: Record<string, unknown>) {
    super(
      `OAuth2 network error: ${message}`,
      'GOOGLE_OAUTH2_NETWORK_ERROR',
      503,
      context,
      cause
    );
  }

  public isRetryable(): boolean {
    return true;
  }
}

// Sheets errors

export class GoogleSheetsError extends GoogleWorkspaceError {
  public readonly spreadsheetId?: string;
  public readonly range?: string;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    spreadsheetId?: string,
    range?: string,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, code, statusCode, { spreadsheetId, range, ...context }, cause);
    this.spreadsheetId = spreadsheetId;
    this.range = range;
  }

  public isRetryable(): boolean {
    return (
      this.errorCode === 'GOOGLE_SHEETS_RATE_LIMIT' ||
      this.errorCode === 'GOOGLE_SHEETS_QUOTA_EXCEEDED' ||
      this.statusCode >= 500
    );
  }
}

export class GoogleSheetsNotFoundError extends GoogleSheetsError {
  constructor(spreadsheetId: string, context?: Record<string, unknown>) {
    super(
      `Spreadsheet with ID '${spreadsheetId}' not found`,
      'GOOGLE_SHEETS_NOT_FOUND',
      404,
      spreadsheetId,
      undefined,
      context
    );
  }

  public isRetryable(): boolean {
    return false;
  }
}

/**
 * Raised when opening a spreadsheet by title finds no match
 */
export class GoogleSheetsTitleNotFoundError extends GoogleSheetsError {
  public readonly title: string;

  constructor(title: string, context?: Record<string, unknown>) {
    super(
      `Could not find a spreadsheet with title ${title}.`,
      'GOOGLE_SHEETS_NOT_FOUND',
      404,
      undefined,
      undefined,
      { title, ...context }
    );
    this.title = title;
  }

  public isRetryable(): boolean {
    return false;
  }
}

export class GoogleSheetsWorksheetNotFoundError extends GoogleSheetsError {
  public readonly property: string;
  public readonly value: string | number;

  constructor(
    property: string,
    value: string | number,
    spreadsheetId?: string,
    context?: Record<string, unknown>
  ) {
    super(
      `Worksheet with ${property} ${value} not found`,
      'GOOGLE_SHEETS_WORKSHEET_NOT_FOUND',
      404,
      spreadsheetId,
      undefined,
      { property, value, ...context }
    );
    this.property = property;
    this.value = value;
  }

  public isRetryable(): boolean {
    return false;
  }
}

export class GoogleSheetsCellNotFoundError extends GoogleSheetsError {
  constructor(message: string, spreadsheetId?: string, range?: string, context?: Record<string, unknown>) {
    super(message, 'GOOGLE_SHEETS_CELL_NOT_FOUND', 404, spreadsheetId, range, context);
  }

  public isRetryable(): boolean {
    return false;
  }
}

export class GoogleSheetsRangeNotFoundError extends GoogleSheetsError {
  constructor(message: string, spreadsheetId?: string, context?: Record<string, unknown>) {
    super(message, 'GOOGLE_SHEETS_RANGE_NOT_FOUND', 404, spreadsheetId, undefined, context);
  }

  public isRetryable(): boolean {
    return false;
  }
}

export class GoogleSheetsPermissionError extends GoogleSheetsError {
  constructor(spreadsheetId?: string, range?: string, context?: Record<string, unknown>) {
    super(
      'Insufficient permissions to access the requested spreadsheet or range',
      'GOOGLE_SHEETS_PERMISSION_DENIED',
      403,
      spreadsheetId,
      range,
      context
    );
  }

  public isRetryable(): boolean {
    return false;
  }
}

export class GoogleSheetsRateLimitError extends GoogleSheetsError {
  public readonly retryAfterMs?: number;

  constructor(retryAfterMs?: number, context?: Record<string, unknown>) {
    super(
      'Rate limit exceeded for Google Sheets API',
      'GOOGLE_SHEETS_RATE_LIMIT',
      429,
      undefined,
      undefined,
      { retryAfterMs, ...context }
    );
    this.retryAfterMs = retryAfterMs;
  }

  public isRetryable(): boolean {
    return true;
  }
}

export class GoogleSheetsQuotaExceededError extends GoogleSheetsError {
  constructor(context?: Record<string, unknown>) {
    super(
      'Daily quota exceeded for Google Sheets API',
      'GOOGLE_SHEETS_QUOTA_EXCEEDED',
      429,
      undefined,
      undefined,
      context
    );
  }

  public isRetryable(): boolean {
    return true;
  }
}

export class GoogleSheetsInvalidRangeError extends GoogleSheetsError {
  constructor(range: string, spreadsheetId?: string, context?: Record<string, unknown>) {
    const reason = typeof context?.reason === 'string' ? context.reason : undefined;
    super(
      reason || `Invalid range specified: '${range}'`,
      'GOOGLE_SHEETS_INVALID_RANGE',
      400,
      spreadsheetId,
      range,
      context
    );
  }

  public isRetryable(): boolean {
    return false;
  }
}

/**
 * A cell label or coordinate pair that is not valid address notation
 */
export class GoogleSheetsInvalidAddressError extends GoogleSheetsError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'GOOGLE_SHEETS_INVALID_ADDRESS', 400, undefined, undefined, context);
  }

  public isRetryable(): boolean {
    return false;
  }
}

export class GoogleSheetsInvalidArgumentError extends GoogleSheetsError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'GOOGLE_SHEETS_INVALID_ARGUMENT', 400, undefined, undefined, context);
  }

  public isRetryable(): boolean {
    return false;
  }
}

export class GoogleSheetsNoValidUrlKeyError extends GoogleSheetsError {
  constructor(url: string) {
    super(
      `No valid spreadsheet key found in URL: ${url}`,
      'GOOGLE_SHEETS_NO_VALID_URL_KEY',
      400,
      undefined,
      undefined,
      { url }
    );
  }

  public isRetryable(): boolean {
    return false;
  }
}

/**
 * Operations that need the reply of their request cannot run in batch mode
 */
export class GoogleSheetsBatchModeError extends GoogleSheetsError {
  constructor(operation: string, spreadsheetId?: string) {
    super(
      `${operation} is not supported in batch mode`,
      'GOOGLE_SHEETS_BATCH_MODE',
      409,
      spreadsheetId,
      undefined,
      { operation }
    );
  }

  public isRetryable(): boolean {
    return false;
  }
}

// Other service errors

export class GoogleServiceError extends GoogleWorkspaceError {
  public readonly serviceName: string;

  constructor(
    message: string,
    serviceName: string,
    code: string,
    statusCode: number = 500,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, code, statusCode, { serviceName, ...context }, cause);
    this.serviceName = serviceName;
  }

  public isRetryable(): boolean {
    return this.statusCode >= 500;
  }
}

export class GoogleConfigError extends GoogleWorkspaceError {
  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super(message, 'GOOGLE_CONFIG_ERROR', 500, context, cause);
  }

  public isRetryable(): boolean {
    return false;
  }
}

/**
 * Raised when a single request or the whole retry sequence exceeds its
 * configured time limit
 */
export class GoogleTimeoutError extends GoogleWorkspaceError {
  public readonly timeoutType: 'request' | 'total';
  public readonly timeoutMs: number;

  constructor(
    message: string,
    timeoutType: 'request' | 'total',
    timeoutMs: number,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, 'TIMEOUT_ERROR', 408, context, cause);
    this.timeoutType = timeoutType;
    this.timeoutMs = timeoutMs;
  }

  public isRetryable(): boolean {
    return false;
  }

  public override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      timeoutType: this.timeoutType,
      timeoutMs: this.timeoutMs,
      timeout: true,
    };
  }
}

// Drive errors

export class GoogleDriveError extends GoogleWorkspaceError {
  public readonly fileId?: string;
  public readonly folderId?: string;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    fileId?: string,
    folderId?: string,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, code, statusCode, { fileId, folderId, ...context }, cause);
    this.fileId = fileId;
    this.folderId = folderId;
  }

  public isRetryable(): boolean {
    return (
      this.errorCode === 'GOOGLE_DRIVE_RATE_LIMIT' ||
      this.errorCode === 'GOOGLE_DRIVE_QUOTA_EXCEEDED' ||
      this.statusCode >= 500
    );
  }
}

export class GoogleDriveNotFoundError extends GoogleDriveError {
  constructor(fileId: string, context?: Record<string, unknown>, cause?: Error) {
    super(
      `File not found: ${fileId}`,
      'GOOGLE_DRIVE_FILE_NOT_FOUND',
      404,
      fileId,
      undefined,
      context,
      cause
    );
  }

  public isRetryable(): boolean {
    return false;
  }
}

export class GoogleDriveFolderNotFoundError extends GoogleDriveError {
  constructor(folderName: string, context?: Record<string, unknown>) {
    super(
      `Could not find a folder with name ${folderName}.`,
      'GOOGLE_DRIVE_FOLDER_NOT_FOUND',
      404,
      undefined,
      undefined,
      { folderName, ...context }
    );
  }

  public isRetryable(): boolean {
    return false;
  }
}

export class GoogleDrivePermissionError extends GoogleDriveError {
  constructor(
    fileId?: string,
    folderId?: string,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(
      `Permission denied for ${fileId || folderId || 'resource'}`,
      'GOOGLE_DRIVE_PERMISSION_DENIED',
      403,
      fileId,
      folderId,
      context,
      cause
    );
  }

  public isRetryable(): boolean {
    return false;
  }
}

export class GoogleDriveCannotRemoveOwnerError extends GoogleDriveError {
  constructor(fileId: string, permissionId: string, cause?: Error) {
    super(
      'The owner of a file cannot be removed.',
      'GOOGLE_DRIVE_CANNOT_REMOVE_OWNER',
      403,
      fileId,
      undefined,
      { permissionId },
      cause
    );
  }

  public isRetryable(): boolean {
    return false;
  }
}

export class GoogleDriveInvalidUserError extends GoogleDriveError {
  constructor(message: string, fileId?: string, cause?: Error) {
    super(message, 'GOOGLE_DRIVE_INVALID_USER', 400, fileId, undefined, undefined, cause);
  }

  public isRetryable(): boolean {
    return false;
  }
}

export class GoogleDriveRateLimitError extends GoogleDriveError {
  public readonly retryAfterMs?: number;

  constructor(retryAfterMs?: number, context?: Record<string, unknown>, cause?: Error) {
    super(
      'Rate limit exceeded for Google Drive API',
      'GOOGLE_DRIVE_RATE_LIMIT',
      429,
      undefined,
      undefined,
      { retryAfterMs, ...context },
      cause
    );
    this.retryAfterMs = retryAfterMs;
  }

  public isRetryable(): boolean {
    return true;
  }
}

export class GoogleDriveQuotaExceededError extends GoogleDriveError {
  constructor(context?: Record<string, unknown>, cause?: Error) {
    super(
      'Daily quota exceeded for Google Drive API',
      'GOOGLE_DRIVE_QUOTA_EXCEEDED',
      429,
      undefined,
      undefined,
      context,
      cause
    );
  }

  public isRetryable(): boolean {
    return true;
  }
}

/**
 * Result aliases
 */
export type GoogleWorkspaceResult<T> = Result<T, GoogleWorkspaceError>;
export type GoogleAuthResult<T> = Result<T, GoogleAuthError>;

export const googleOk = <T>(value: T): GoogleWorkspaceResult<T> => new Ok(value);
export const googleErr = (error: GoogleWorkspaceError): GoogleWorkspaceResult<never> =>
  new Err(error);

export const authOk = <T>(value: T): GoogleAuthResult<T> => new Ok(value);
export const authErr = (error: GoogleAuthError): GoogleAuthResult<never> => new Err(error);

/**
 * Replace the generic message of a freshly built error with the message the
 * API returned, when it says something more specific.
 */
function withApiMessage<T extends GoogleWorkspaceError>(
  instance: T,
  apiMessage: string | undefined,
  causeMessage: string
): T {
  if (apiMessage && apiMessage !== causeMessage) {
    instance.message = apiMessage;
  }
  return instance;
}

function isQuotaError(reason: string | undefined, domain: string | undefined, message: string): boolean {
  return (
    reason === 'quotaExceeded' ||
    domain === 'usageLimits' ||
    message.toLowerCase().includes('quota')
  );
}

function retryAfterFromMessage(message: string): number | undefined {
  const match = message.match(/retry after (\d+)/i);
  return match ? parseInt(match[1], 10) * 1000 : undefined;
}

/**
 * Error factory
 *
 * Classification priority:
 * 1. structured `reason` from the API error body
 * 2. HTTP status
 * 3. message matching, only when no structured data is available
 */
export class GoogleErrorFactory {
  /**
   * Create an authentication error from a generic error
   */
  static createAuthError(
    cause: Error | null | undefined,
    authType: AuthType = 'service-account',
    context?: Record<string, unknown>
  ): GoogleAuthError {
    const normalizedError = extractGoogleApiError(context?.originalGaxiosError ?? cause);
    const enrichedContext = { normalizedError, ...context };

    if (!cause) {
      return new GoogleAuthError('Unknown authentication error', authType, enrichedContext);
    }
    if (cause instanceof GoogleAuthError) {
      return cause;
    }

    const build = (
      ErrorClass: new (authType?: AuthType, context?: Record<string, unknown>) => GoogleAuthError
    ): GoogleAuthError =>
      withApiMessage(new ErrorClass(authType, enrichedContext), normalizedError.message, cause.message);

    switch (normalizedError.reason) {
      case 'authError':
      case 'expired':
      case 'tokenExpired':
        return build(GoogleAuthTokenExpiredError);
      case 'forbidden':
      case 'invalid':
      case 'invalidCredentials':
        return build(GoogleAuthInvalidCredentialsError);
      case 'required':
      case 'missing':
      case 'missingCredentials':
        return build(GoogleAuthMissingCredentialsError);
    }

    switch (normalizedError.httpStatus) {
      case 401: {
        const lower = normalizedError.message.toLowerCase();
        if (lower.includes('missing') || lower.includes('required')) {
          return build(GoogleAuthMissingCredentialsError);
        }
        return build(GoogleAuthTokenExpiredError);
      }
      case 403:
        return build(GoogleAuthInvalidCredentialsError);
    }

    if (!normalizedError.reason && cause.message) {
      const message = cause.message.toLowerCase();
      if (message.includes('token') && message.includes('expired')) {
        return new GoogleAuthTokenExpiredError(authType, enrichedContext);
      }
      if (message.includes('credential') || message.includes('invalid')) {
        return new GoogleAuthInvalidCredentialsError(authType, enrichedContext);
      }
      if (message.includes('missing') || message.includes('required')) {
        return new GoogleAuthMissingCredentialsError(authType, enrichedContext);
      }
    }

    return new GoogleAuthError(normalizedError.message, authType, enrichedContext, cause);
  }

  /**
   * Create a Sheets error from a generic error
   */
  static createSheetsError(
    cause: Error | null | undefined,
    spreadsheetId?: string,
    range?: string,
    context?: Record<string, unknown>
  ): GoogleSheetsError {
    const normalizedError = extractGoogleApiError(context?.originalGaxiosError ?? cause);
    const enrichedContext = { normalizedError, ...context };

    if (!cause) {
      return new GoogleSheetsError(
        'Unknown Sheets error',
        'GOOGLE_SHEETS_ERROR',
        500,
        spreadsheetId,
        range,
        enrichedContext
      );
    }
    if (cause instanceof GoogleSheetsError) {
      return cause;
    }

    const better = <T extends GoogleSheetsError>(instance: T): T =>
      withApiMessage(instance, normalizedError.message, cause.message);

    const serverError = (): GoogleSheetsError =>
      new GoogleSheetsError(
        normalizedError.message,
        'GOOGLE_SHEETS_SERVER_ERROR',
        normalizedError.httpStatus,
        spreadsheetId,
        range,
        enrichedContext,
        cause
      );

    const invalidRange = (): GoogleSheetsError =>
      better(
        new GoogleSheetsInvalidRangeError(
          range || normalizedError.location || 'unknown',
          spreadsheetId,
          enrichedContext
        )
      );

    switch (normalizedError.reason) {
      case 'notFound':
        return better(new GoogleSheetsNotFoundError(spreadsheetId || '', enrichedContext));
      case 'forbidden':
        return better(new GoogleSheetsPermissionError(spreadsheetId, range, enrichedContext));
      case 'rateLimitExceeded':
        return new GoogleSheetsRateLimitError(
          extractRetryAfterFromContext(context),
          enrichedContext
        );
      case 'quotaExceeded':
        return new GoogleSheetsQuotaExceededError(enrichedContext);
      case 'invalidParameter':
      case 'badRequest':
      case 'invalidRange':
        return invalidRange();
      case 'backendError':
      case 'internalServerError':
        return serverError();
    }

    switch (normalizedError.httpStatus) {
      case 404:
        return better(new GoogleSheetsNotFoundError(spreadsheetId || '', enrichedContext));
      case 403:
        return better(new GoogleSheetsPermissionError(spreadsheetId, range, enrichedContext));
      case 429:
        if (isQuotaError(normalizedError.reason, normalizedError.domain, normalizedError.message)) {
          return new GoogleSheetsQuotaExceededError(enrichedContext);
        }
        return new GoogleSheetsRateLimitError(
          extractRetryAfterFromContext(context),
          enrichedContext
        );
      case 400:
        return invalidRange();
      case 500:
      case 502:
      case 503:
      case 504:
        return serverError();
    }

    if (!normalizedError.reason && cause.message) {
      const message = cause.message.toLowerCase();
      if (message.includes('not found')) {
        return new GoogleSheetsNotFoundError(spreadsheetId || '', enrichedContext);
      }
      if (message.includes('permission')) {
        return new GoogleSheetsPermissionError(spreadsheetId, range, enrichedContext);
      }
      if (message.includes('rate limit')) {
        return new GoogleSheetsRateLimitError(retryAfterFromMessage(cause.message), enrichedContext);
      }
      if (message.includes('quota')) {
        return new GoogleSheetsQuotaExceededError(enrichedContext);
      }
    }

    return new GoogleSheetsError(
      normalizedError.message,
      'GOOGLE_SHEETS_ERROR',
      normalizedError.httpStatus,
      spreadsheetId,
      range,
      enrichedContext,
      cause
    );
  }

  /**
   * Create a Drive error from a generic error
   */
  static createDriveError(
    cause: Error | null | undefined,
    fileId?: string,
    folderId?: string,
    context?: Record<string, unknown>
  ): GoogleDriveError {
    if (!cause) {
      return new GoogleDriveError('Unknown Drive error', 'GOOGLE_DRIVE_ERROR', 500, fileId, folderId, context);
    }
    if (cause instanceof GoogleDriveError) {
      return cause;
    }
    if (cause instanceof GoogleAuthError) {
      return new GoogleDriveError(
        cause.message,
        'GOOGLE_DRIVE_AUTH_ERROR',
        cause.statusCode,
        fileId,
        folderId,
        { ...context, authType: cause.authType },
        cause
      );
    }

    const normalizedError = extractGoogleApiError(context?.originalGaxiosError ?? cause);
    const enrichedContext = { normalizedError, ...context };
    const better = <T extends GoogleDriveError>(instance: T): T =>
      withApiMessage(instance, normalizedError.message, cause.message);

    const serverError = (): GoogleDriveError =>
      new GoogleDriveError(
        normalizedError.message,
        'GOOGLE_DRIVE_SERVER_ERROR',
        normalizedError.httpStatus,
        fileId,
        folderId,
        enrichedContext,
        cause
      );

    switch (normalizedError.reason) {
      case 'notFound':
        return better(new GoogleDriveNotFoundError(fileId || folderId || 'unknown', enrichedContext));
      case 'forbidden':
        return better(new GoogleDrivePermissionError(fileId, folderId, enrichedContext));
      case 'rateLimitExceeded':
      case 'userRateLimitExceeded':
        return new GoogleDriveRateLimitError(extractRetryAfterFromContext(context), enrichedContext);
      case 'quotaExceeded':
        return new GoogleDriveQuotaExceededError(enrichedContext);
      case 'backendError':
      case 'internalServerError':
        return serverError();
    }

    switch (normalizedError.httpStatus) {
      case 404:
        return better(new GoogleDriveNotFoundError(fileId || folderId || 'unknown', enrichedContext));
      case 403:
        return better(new GoogleDrivePermissionError(fileId, folderId, enrichedContext));
      case 429:
        if (isQuotaError(normalizedError.reason, normalizedError.domain, normalizedError.message)) {
          return new GoogleDriveQuotaExceededError(enrichedContext);
        }
        return new GoogleDriveRateLimitError(extractRetryAfterFromContext(context), enrichedContext);
      case 400:
        return new GoogleDriveError(
          normalizedError.message,
          'GOOGLE_DRIVE_INVALID_REQUEST',
          400,
          fileId,
          folderId,
          enrichedContext,
          cause
        );
      case 500:
      case 502:
      case 503:
      case 504:
        return serverError();
    }

    if (!normalizedError.reason && cause.message) {
      const message = cause.message.toLowerCase();
      if (message.includes('not found')) {
        return new GoogleDriveNotFoundError(fileId || folderId || 'unknown', enrichedContext);
      }
      if (message.includes('permission') || message.includes('forbidden')) {
        return new GoogleDrivePermissionError(fileId, folderId, enrichedContext);
      }
      if (message.includes('rate limit')) {
        return new GoogleDriveRateLimitError(retryAfterFromMessage(cause.message), enrichedContext);
      }
      if (message.includes('quota')) {
        return new GoogleDriveQuotaExceededError(enrichedContext);
      }
    }

    return new GoogleDriveError(
      normalizedError.message,
      'GOOGLE_DRIVE_ERROR',
      normalizedError.httpStatus,
      fileId,
      folderId,
      enrichedContext,
      cause
    );
  }
}
