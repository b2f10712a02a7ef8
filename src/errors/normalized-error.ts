/**
 * Normalized error handling for Google API responses
 *
 * Extracts status, reason and detail information from the error objects that
 * googleapis (Gaxios) throws, so that error classification never needs to
 * inspect raw response bodies.
 */

/**
 * Single entry of the `errors` array in a Google API error body
 */
export interface GoogleApiErrorDetail {
  message: string;
  /** e.g. "global", "usageLimits" */
  domain: string;
  /** e.g. "forbidden", "notFound" */
  reason: string;
  location?: string;
  locationType?: string;
}

export interface GoogleApiMainError {
  code: number;
  message: string;
  /** gRPC status name such as "PERMISSION_DENIED" */
  status?: string;
  errors?: GoogleApiErrorDetail[];
}

export interface GoogleApiErrorResponse {
  error: GoogleApiMainError;
}

/**
 * Normalized representation of a Google API error
 */
export interface NormalizedGoogleApiError {
  httpStatus: number;
  message: string;
  status?: string;
  reason?: string;
  domain?: string;
  location?: string;
  locationType?: string;
  details: GoogleApiErrorDetail[];
  /** Whether this error is likely retryable based on status/reason */
  isRetryable: boolean;
  originalError: unknown;
}

/**
 * Structural view of a GaxiosError
 */
export interface GaxiosErrorLike {
  message: string;
  code?: string | number;
  status?: number;
  response?: {
    status: number;
    statusText?: string;
    headers?: Record<string, unknown>;
    data?: unknown;
  };
}

const RETRYABLE_REASONS = [
  'rateLimitExceeded',
  'quotaExceeded',
  'backendError',
  'internalServerError',
];

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isErrorDetail(value: unknown): value is GoogleApiErrorDetail {
  return (
    isRecord(value) &&
    typeof value.message === 'string' &&
    typeof value.reason === 'string'
  );
}

/**
 * Type guard for GaxiosError-like objects
 */
export function isGaxiosErrorLike(error: unknown): error is GaxiosErrorLike {
  if (!isRecord(error) || typeof error.message !== 'string') {
    return false;
  }
  if (
    error.code !== undefined &&
    typeof error.code !== 'string' &&
    typeof error.code !== 'number'
  ) {
    return false;
  }
  if (error.status !== undefined && typeof error.status !== 'number') {
    return false;
  }
  if (
    error.response !== undefined &&
    !(isRecord(error.response) && typeof error.response.status === 'number')
  ) {
    return false;
  }
  // Must have at least one of the distinguishing GaxiosError properties
  return 'code' in error || 'status' in error || 'response' in error;
}

/**
 * Type guard for a response body carrying a Google API error
 */
export function isGoogleApiErrorResponse(
  data: unknown
): data is GoogleApiErrorResponse {
  if (!isRecord(data) || !isRecord(data.error)) {
    return false;
  }
  const { code, message, errors } = data.error;
  return (
    typeof code === 'number' &&
    typeof message === 'string' &&
    (errors === undefined ||
      (Array.isArray(errors) && errors.every(isErrorDetail)))
  );
}

function isErrorRetryable(httpStatus: number, reason?: string): boolean {
  if (httpStatus >= 500 || httpStatus === 429) {
    return true;
  }
  return reason ? RETRYABLE_REASONS.includes(reason) : false;
}

function readNumericStatus(error: Record<string, unknown>): number | undefined {
  for (const key of ['statusCode', 'status', 'code']) {
    const value = error[key];
    if (typeof value === 'number') {
      return value;
    }
  }
  return undefined;
}

function parseStatusFromMessage(message: string): number | undefined {
  // "status 404", "code 500"
  const contextualMatch = message.match(/(?:status|code)\s+(\d{3})\b/i);
  if (contextualMatch) {
    const parsed = parseInt(contextualMatch[1], 10);
    return parsed >= 100 && parsed < 600 ? parsed : undefined;
  }

  const statusMatch = message.match(/\b(\d{3})\b/);
  if (statusMatch) {
    const parsed = parseInt(statusMatch[1], 10);
    // 2xx never describes a failure
    if (parsed >= 100 && parsed < 600 && (parsed < 200 || parsed >= 300)) {
      return parsed;
    }
  }
  return undefined;
}

/**
 * Extracts and normalizes Google API error information
 *
 * Priority:
 * 1. structured body (`response.data.error`)
 * 2. `response.status`
 * 3. `code`, then `status`
 * 4. a status code mentioned in the message
 */
export function extractGoogleApiError(
  error: unknown
): NormalizedGoogleApiError {
  const defaultError: NormalizedGoogleApiError = {
    httpStatus: 500,
    message: 'Unknown error occurred',
    details: [],
    isRetryable: true,
    originalError: error,
  };

  if (error == null) {
    return defaultError;
  }

  if (!isRecord(error)) {
    return {
      ...defaultError,
      message: String(error),
      isRetryable: false,
    };
  }

  if (error instanceof Error) {
    const plainMessage = error.message;
    const statusCode = readNumericStatus(error);
    if (!isGaxiosErrorLike(error)) {
      return {
        ...defaultError,
        httpStatus: statusCode ?? 500,
        message: plainMessage,
        // plain errors without a status are programming errors, not transient
        isRetryable:
          statusCode !== undefined ? isErrorRetryable(statusCode) : false,
      };
    }
  }

  let httpStatus = 500;
  let message =
    typeof error.message === 'string' ? error.message : defaultError.message;
  let status: string | undefined;
  let reason: string | undefined;
  let domain: string | undefined;
  let location: string | undefined;
  let locationType: string | undefined;
  let details: GoogleApiErrorDetail[] = [];

  const response = isRecord(error.response) ? error.response : undefined;

  if (response && isGoogleApiErrorResponse(response.data)) {
    const apiError = response.data.error;
    httpStatus = apiError.code;
    message = apiError.message;
    status = apiError.status;

    if (apiError.errors && apiError.errors.length > 0) {
      details = apiError.errors;
      const primary = apiError.errors[0];
      reason = primary.reason;
      domain = primary.domain;
      location = primary.location;
      locationType = primary.locationType;
    }
  } else if (response && typeof response.status === 'number') {
    httpStatus = response.status;
  } else if (typeof error.code === 'number' || typeof error.code === 'string') {
    const codeNumber =
      typeof error.code === 'number' ? error.code : parseInt(error.code, 10);
    if (!isNaN(codeNumber) && codeNumber >= 100 && codeNumber < 600) {
      httpStatus = codeNumber;
    }
  } else if (typeof error.status === 'number') {
    httpStatus = error.status;
  }

  if (httpStatus === 500 && message) {
    httpStatus = parseStatusFromMessage(message) ?? httpStatus;
  }

  return {
    httpStatus,
    message,
    status,
    reason,
    domain,
    location,
    locationType,
    details,
    isRetryable: isErrorRetryable(httpStatus, reason),
    originalError: error,
  };
}
