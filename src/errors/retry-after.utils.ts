/**
 * Retry-after header extraction shared by the error factory methods
 */

import { isGaxiosErrorLike } from './normalized-error.js';

/**
 * Read the `retry-after` header (seconds) of a Gaxios error stored in an
 * error context and convert it to milliseconds.
 */
export function extractRetryAfterFromContext(
  context?: Record<string, unknown>
): number | undefined {
  const gaxiosError = context?.originalGaxiosError;
  if (!isGaxiosErrorLike(gaxiosError)) {
    return undefined;
  }
  const header = gaxiosError.response?.headers?.['retry-after'];
  if (typeof header === 'string' || typeof header === 'number') {
    const seconds = parseInt(String(header), 10);
    return isNaN(seconds) ? undefined : seconds * 1000;
  }
  return undefined;
}
