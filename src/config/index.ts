import { z } from 'zod';
import type { EnvironmentConfig } from '../types/index.js';

/**
 * Environment variable schema.
 * Validates and transforms the variables that configure authentication,
 * retry behavior, timeouts and value parsing.
 */
const envSchema = z
  .object({
    // Service Account Configuration
    GOOGLE_SERVICE_ACCOUNT_KEY_PATH: z.string().optional(),

    // OAuth2 Configuration
    GOOGLE_AUTH_MODE: z.enum(['service-account', 'oauth2']).optional(),
    GOOGLE_OAUTH_CLIENT_SECRET_PATH: z.string().optional(),
    GOOGLE_OAUTH_CLIENT_ID: z.string().optional(),
    GOOGLE_OAUTH_CLIENT_SECRET: z.string().optional(),
    GOOGLE_OAUTH_REDIRECT_URI: z.string().optional(),
    GOOGLE_OAUTH_SCOPES: z.string().optional(),
    GOOGLE_OAUTH_PORT: z.string().optional(),
    GOOGLE_CREDENTIALS_DIRECTORY: z.string().optional(),

    // Retry Configuration
    GOOGLE_RETRY_MAX_ATTEMPTS: z.string().optional(),
    GOOGLE_RETRY_BASE_DELAY: z.string().optional(),
    GOOGLE_RETRY_MAX_DELAY: z.string().optional(),
    GOOGLE_RETRY_JITTER: z.string().optional(),
    GOOGLE_RETRY_RETRIABLE_CODES: z.string().optional(),

    // Timeout Configuration
    GOOGLE_REQUEST_TIMEOUT: z.string().optional(),
    GOOGLE_TOTAL_TIMEOUT: z.string().optional(),

    // Sheets Configuration
    GOOGLE_SHEETS_DEFAULT_PARSE: z.string().optional(),
  })
  .transform(
    (data): EnvironmentConfig => ({
      GOOGLE_SERVICE_ACCOUNT_KEY_PATH: data.GOOGLE_SERVICE_ACCOUNT_KEY_PATH,

      GOOGLE_AUTH_MODE: data.GOOGLE_AUTH_MODE,
      GOOGLE_OAUTH_CLIENT_SECRET_PATH: data.GOOGLE_OAUTH_CLIENT_SECRET_PATH,
      GOOGLE_OAUTH_CLIENT_ID: data.GOOGLE_OAUTH_CLIENT_ID,
      GOOGLE_OAUTH_CLIENT_SECRET: data.GOOGLE_OAUTH_CLIENT_SECRET,
      GOOGLE_OAUTH_REDIRECT_URI: data.GOOGLE_OAUTH_REDIRECT_URI,
      GOOGLE_OAUTH_SCOPES: parseStringArrayEnvVar(
        data.GOOGLE_OAUTH_SCOPES,
        'GOOGLE_OAUTH_SCOPES'
      ),
      GOOGLE_OAUTH_PORT: parseIntegerEnvVar(
        data.GOOGLE_OAUTH_PORT,
        'GOOGLE_OAUTH_PORT'
      ),
      GOOGLE_CREDENTIALS_DIRECTORY: data.GOOGLE_CREDENTIALS_DIRECTORY,

      GOOGLE_RETRY_MAX_ATTEMPTS: parseIntegerEnvVar(
        data.GOOGLE_RETRY_MAX_ATTEMPTS,
        'GOOGLE_RETRY_MAX_ATTEMPTS'
      ),
      GOOGLE_RETRY_BASE_DELAY: parseIntegerEnvVar(
        data.GOOGLE_RETRY_BASE_DELAY,
        'GOOGLE_RETRY_BASE_DELAY'
      ),
      GOOGLE_RETRY_MAX_DELAY: parseIntegerEnvVar(
        data.GOOGLE_RETRY_MAX_DELAY,
        'GOOGLE_RETRY_MAX_DELAY'
      ),
      GOOGLE_RETRY_JITTER: parseFloatEnvVar(
        data.GOOGLE_RETRY_JITTER,
        'GOOGLE_RETRY_JITTER'
      ),
      GOOGLE_RETRY_RETRIABLE_CODES: parseRetryCodesEnvVar(
        data.GOOGLE_RETRY_RETRIABLE_CODES,
        'GOOGLE_RETRY_RETRIABLE_CODES'
      ),

      GOOGLE_REQUEST_TIMEOUT: parseIntegerEnvVar(
        data.GOOGLE_REQUEST_TIMEOUT,
        'GOOGLE_REQUEST_TIMEOUT'
      ),
      GOOGLE_TOTAL_TIMEOUT: parseIntegerEnvVar(
        data.GOOGLE_TOTAL_TIMEOUT,
        'GOOGLE_TOTAL_TIMEOUT'
      ),

      GOOGLE_SHEETS_DEFAULT_PARSE: parseBooleanEnvVar(
        data.GOOGLE_SHEETS_DEFAULT_PARSE,
        'GOOGLE_SHEETS_DEFAULT_PARSE'
      ),
    })
  )
  .refine(data => {
    validateRetryConfig(data);
    validateTimeoutConfig(data);
    validateAuthConfig(data);
    return true;
  });

function parseIntegerEnvVar(
  value: string | undefined,
  name: string
): number | undefined {
  if (!value) return undefined;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new Error(`${name} must be a valid integer, got: ${value}`);
  }
  return parsed;
}

function parseFloatEnvVar(
  value: string | undefined,
  name: string
): number | undefined {
  if (!value) return undefined;
  const parsed = parseFloat(value);
  if (isNaN(parsed)) {
    throw new Error(`${name} must be a valid number, got: ${value}`);
  }
  return parsed;
}

/**
 * Parse a comma-separated list of HTTP status codes.
 */
function parseRetryCodesEnvVar(
  value: string | undefined,
  name: string
): number[] | undefined {
  if (!value) return undefined;

  return value.split(',').map(code => {
    const trimmed = code.trim();
    const parsed = parseInt(trimmed, 10);
    if (isNaN(parsed)) {
      throw new Error(`${name} contains invalid code: ${trimmed}`);
    }
    return parsed;
  });
}

function parseStringArrayEnvVar(
  value: string | undefined,
  name: string
): string[] | undefined {
  if (!value || value.trim() === '') return undefined;

  return value.split(',').map(item => {
    const trimmed = item.trim();
    if (!trimmed) {
      throw new Error(`${name} contains empty value`);
    }
    return trimmed;
  });
}

function parseBooleanEnvVar(
  value: string | undefined,
  name: string
): boolean | undefined {
  if (!value) return undefined;

  const lowerValue = value.toLowerCase();
  if (lowerValue === 'true' || lowerValue === '1') return true;
  if (lowerValue === 'false' || lowerValue === '0') return false;

  throw new Error(`${name} must be 'true', 'false', '1', or '0', got: ${value}`);
}

function validateRetryConfig(data: EnvironmentConfig): void {
  const {
    GOOGLE_RETRY_MAX_ATTEMPTS,
    GOOGLE_RETRY_BASE_DELAY,
    GOOGLE_RETRY_MAX_DELAY,
    GOOGLE_RETRY_JITTER,
  } = data;

  if (GOOGLE_RETRY_MAX_ATTEMPTS !== undefined && GOOGLE_RETRY_MAX_ATTEMPTS <= 0) {
    throw new Error('GOOGLE_RETRY_MAX_ATTEMPTS must be a positive number');
  }

  if (GOOGLE_RETRY_BASE_DELAY !== undefined && GOOGLE_RETRY_BASE_DELAY <= 0) {
    throw new Error('GOOGLE_RETRY_BASE_DELAY must be a positive number');
  }

  if (GOOGLE_RETRY_MAX_DELAY !== undefined && GOOGLE_RETRY_MAX_DELAY <= 0) {
    throw new Error('GOOGLE_RETRY_MAX_DELAY must be a positive number');
  }

  if (
    GOOGLE_RETRY_JITTER !== undefined &&
    (GOOGLE_RETRY_JITTER < 0 || GOOGLE_RETRY_JITTER > 1)
  ) {
    throw new Error('GOOGLE_RETRY_JITTER must be a number between 0 and 1');
  }

  if (
    GOOGLE_RETRY_BASE_DELAY !== undefined &&
    GOOGLE_RETRY_MAX_DELAY !== undefined &&
    GOOGLE_RETRY_MAX_DELAY < GOOGLE_RETRY_BASE_DELAY
  ) {
    throw new Error(
      'GOOGLE_RETRY_MAX_DELAY must be greater than or equal to GOOGLE_RETRY_BASE_DELAY'
    );
  }
}

function validateTimeoutConfig(data: EnvironmentConfig): void {
  const { GOOGLE_REQUEST_TIMEOUT, GOOGLE_TOTAL_TIMEOUT } = data;

  if (GOOGLE_REQUEST_TIMEOUT !== undefined && GOOGLE_REQUEST_TIMEOUT <= 0) {
    throw new Error('GOOGLE_REQUEST_TIMEOUT must be a positive number');
  }
  if (GOOGLE_TOTAL_TIMEOUT !== undefined && GOOGLE_TOTAL_TIMEOUT <= 0) {
    throw new Error('GOOGLE_TOTAL_TIMEOUT must be a positive number');
  }
  if (
    GOOGLE_REQUEST_TIMEOUT !== undefined &&
    GOOGLE_TOTAL_TIMEOUT !== undefined &&
    GOOGLE_TOTAL_TIMEOUT < GOOGLE_REQUEST_TIMEOUT
  ) {
    throw new Error(
      'GOOGLE_TOTAL_TIMEOUT must be greater than or equal to GOOGLE_REQUEST_TIMEOUT'
    );
  }
}

/**
 * Validates authentication configuration values.
 * Credentials are optional here: `authorize()` falls back to a
 * `client_secret.json` in the working directory.
 */
function validateAuthConfig(data: EnvironmentConfig): void {
  const {
    GOOGLE_AUTH_MODE,
    GOOGLE_SERVICE_ACCOUNT_KEY_PATH,
    GOOGLE_OAUTH_CLIENT_SECRET_PATH,
    GOOGLE_OAUTH_CLIENT_ID,
    GOOGLE_OAUTH_CLIENT_SECRET,
    GOOGLE_OAUTH_PORT,
  } = data;

  if (GOOGLE_AUTH_MODE === 'service-account' && !GOOGLE_SERVICE_ACCOUNT_KEY_PATH) {
    throw new Error(
      'GOOGLE_SERVICE_ACCOUNT_KEY_PATH is required when GOOGLE_AUTH_MODE is "service-account"'
    );
  }

  if (
    GOOGLE_AUTH_MODE === 'oauth2' &&
    !GOOGLE_OAUTH_CLIENT_SECRET_PATH &&
    !(GOOGLE_OAUTH_CLIENT_ID && GOOGLE_OAUTH_CLIENT_SECRET)
  ) {
    throw new Error(
      'GOOGLE_OAUTH_CLIENT_SECRET_PATH or both GOOGLE_OAUTH_CLIENT_ID and GOOGLE_OAUTH_CLIENT_SECRET are required when GOOGLE_AUTH_MODE is "oauth2"'
    );
  }

  if (GOOGLE_OAUTH_CLIENT_SECRET && !GOOGLE_OAUTH_CLIENT_ID) {
    throw new Error('GOOGLE_OAUTH_CLIENT_SECRET requires GOOGLE_OAUTH_CLIENT_ID');
  }
  if (GOOGLE_OAUTH_CLIENT_ID && !GOOGLE_OAUTH_CLIENT_SECRET) {
    throw new Error('GOOGLE_OAUTH_CLIENT_ID requires GOOGLE_OAUTH_CLIENT_SECRET');
  }

  if (
    GOOGLE_OAUTH_PORT !== undefined &&
    (GOOGLE_OAUTH_PORT <= 0 || GOOGLE_OAUTH_PORT > 65535)
  ) {
    throw new Error('GOOGLE_OAUTH_PORT must be a valid port number (1-65535)');
  }
}

/**
 * Loads and validates the environment configuration.
 * @throws Error if configuration is invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): EnvironmentConfig {
  try {
    return envSchema.parse(env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const firstError = error.issues[0];
      throw new Error(
        `Configuration validation failed: ${firstError?.message || 'Unknown error'}`
      );
    }
    throw error;
  }
}

/**
 * Default scopes: read/write spreadsheets, and Drive for listing, sharing,
 * copying and exporting them.
 */
export const GOOGLE_SCOPES = [
  'https://www.googleapis.com/auth/spreadsheets',
  'https://www.googleapis.com/auth/drive',
] as const;

export type GoogleScope = (typeof GOOGLE_SCOPES)[number];

/** Cells per `values.batchUpdate` call before a write is split */
export const CELL_UPDATE_LIMIT = 50000;
