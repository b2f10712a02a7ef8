/**
 * Jest test setup
 *
 * Keeps retries fast and log output quiet.
 */

if (!process.env.NODE_ENV) {
  process.env.NODE_ENV = 'test';
}

process.env.DEBUG = 'false';
process.env.GOOGLE_SERVICE_ACCOUNT_KEY_PATH = '/mock/service-account.json';

// Fast retries; timeouts stay unset so their defaults are exercised
process.env.GOOGLE_RETRY_MAX_ATTEMPTS = '2';
process.env.GOOGLE_RETRY_BASE_DELAY = '10';
process.env.GOOGLE_RETRY_MAX_DELAY = '50';
process.env.GOOGLE_RETRY_JITTER = '0';
process.env.GOOGLE_RETRY_RETRIABLE_CODES = '429,500,502,503,504';
delete process.env.GOOGLE_REQUEST_TIMEOUT;
delete process.env.GOOGLE_TOTAL_TIMEOUT;

import { logger, LogLevel, DEFAULT_LOGGER_CONFIG } from './utils/logger.js';

const silent = (): void => {};

DEFAULT_LOGGER_CONFIG.level = LogLevel.ERROR;
DEFAULT_LOGGER_CONFIG.outputFn = silent;
logger.updateConfig({
  level: LogLevel.ERROR,
  debugMode: false,
  prettyPrint: false,
  outputFn: silent,
});

console.debug = silent;
console.info = silent;
console.warn = silent;
