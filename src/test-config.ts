/**
 * Retry settings for tests: 10ms -> 15ms instead of 1s -> 2s -> 4s
 */

import type { GoogleServiceRetryConfig } from './services/base/google-service.js';

export const TEST_RETRY_CONFIG: GoogleServiceRetryConfig = {
  maxAttempts: 2,
  initialDelayMs: 10,
  maxDelayMs: 50,
  backoffMultiplier: 1.5,
  jitterFactor: 0,
  retriableCodes: [429, 500, 502, 503, 504],
};

/** No retries at all */
export const NO_RETRY_CONFIG: GoogleServiceRetryConfig = {
  ...TEST_RETRY_CONFIG,
  maxAttempts: 1,
};

/**
 * An error shaped like the ones googleapis throws for a failed request
 */
export function createApiError(status: number, message: string, reason?: string): Error {
  return Object.assign(new Error(message), {
    code: status,
    response: {
      status,
      data: {
        error: {
          code: status,
          message,
          errors: reason ? [{ message, domain: 'global', reason }] : undefined,
        },
      },
    },
  });
}
