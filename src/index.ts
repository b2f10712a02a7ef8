import { SheetsClient } from './client.js';
import type { SheetsClientOptions } from './client.js';
import { loadConfig } from './config/index.js';
import { GoogleConfigError, googleErr, googleOk } from './errors/index.js';
import type { GoogleWorkspaceResult } from './errors/index.js';
import { AuthFactory } from './services/auth/auth-factory.js';
import type { AuthorizeOptions } from './services/auth/auth-factory.js';
import { createRetryConfigFromEnv, createTimeoutConfigFromEnv } from './services/base/google-service.js';
import { AuthService } from './services/auth.service.js';
import type { EnvironmentConfig } from './types/index.js';
import { createServiceLogger } from './utils/logger.js';

export { SheetsClient } from './client.js';
export type { CreateSpreadsheetOptions, SheetsClientOptions } from './client.js';
export { Address, GridRange, parseAddress } from './models/address.js';
export type { AddressInput, WorksheetRef } from './models/address.js';
export { Cell } from './models/cell.js';
export type { NeighbourPosition, NumberFormat } from './models/cell.js';
export { Chart } from './models/chart.js';
export type { ChartOptions, RangePair } from './models/chart.js';
export { DataRange } from './models/data-range.js';
export type { BorderOptions, DataRangeOptions } from './models/data-range.js';
export { DeveloperMetadata, metadataFilter } from './models/developer-metadata.js';
export { Spreadsheet } from './models/spreadsheet.js';
export type { DispatchOutcome, ExportOptions, ReplaceOptions, ShareOptions } from './models/spreadsheet.js';
export { Worksheet } from './models/worksheet.js';
export type { FindOptions, GetValuesOptions, UpdateValuesOptions } from './models/worksheet.js';
export { RequestQueue } from './services/batch/request-queue.js';
export type { FlushSummary } from './services/batch/request-queue.js';
export { SheetsService } from './services/sheets.service.js';
export { DriveService } from './services/drive.service.js';
export { AuthService } from './services/auth.service.js';
export type { AuthorizeOptions } from './services/auth/auth-factory.js';
export { loadConfig, GOOGLE_SCOPES } from './config/index.js';
export * from './errors/index.js';
export * from './types/index.js';

const logger = createServiceLogger('authorize');

/**
 * Authenticate and return a client.
 *
 * Without options, settings come from the environment (see `loadConfig`).
 * Custom credentials win over a service account file, which wins over the
 * OAuth2 flow.
 *
 * @example
 * ```typescript
 * const client = (await authorize({ clientSecret: './client_secret.json' }))._unsafeUnwrap();
 * const titles = await client.spreadsheetTitles();
 * ```
 */
export async function authorize(
  options?: AuthorizeOptions,
  clientOptions: SheetsClientOptions = {}
): Promise<GoogleWorkspaceResult<SheetsClient>> {
  let authOptions: AuthorizeOptions;
  let defaults: SheetsClientOptions = {};
  if (options) {
    authOptions = options;
  } else {
    let config: EnvironmentConfig;
    try {
      config = loadConfig();
    } catch (error) {
      return googleErr(
        new GoogleConfigError(error instanceof Error ? error.message : String(error), undefined, error instanceof Error ? error : undefined)
      );
    }
    authOptions = AuthFactory.optionsFromConfig(config);
    defaults = {
      retryConfig: createRetryConfigFromEnv(),
      timeoutConfig: createTimeoutConfigFromEnv(),
      defaultParse: config.GOOGLE_SHEETS_DEFAULT_PARSE,
    };
  }

  const auth = new AuthService({ retryConfig: defaults.retryConfig, ...authOptions }, clientOptions.logger);
  const initialized = await auth.initialize();
  if (initialized.isErr()) {
    logger.error('Authorization failed', { authMode: authOptions.authMode }, initialized.error);
    return googleErr(initialized.error);
  }
  return googleOk(new SheetsClient(auth, { ...defaults, ...clientOptions }));
}
