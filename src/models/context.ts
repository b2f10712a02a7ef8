import type { DriveService } from '../services/drive.service.js';
import type { SheetsService } from '../services/sheets.service.js';
import type { Logger } from '../utils/logger.js';

/**
 * Services shared by every model opened through one client
 */
export interface ClientContext {
  readonly sheets: SheetsService;
  readonly drive: DriveService;
  readonly logger: Logger;
}
