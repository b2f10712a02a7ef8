import type { sheets_v4 } from 'googleapis';

import type { GoogleWorkspaceResult } from '../../errors/index.js';
import { googleErr, googleOk } from '../../errors/index.js';
import type { ValueInputOption, ValueRangeInput } from '../../types/index.js';
import type { SheetsService } from '../sheets.service.js';

export type BatchSender = Pick<SheetsService, 'batchUpdate' | 'valuesBatchUpdate'>;

export interface FlushSummary {
  /** Structural requests sent in the single batchUpdate call */
  requests: number;
  /** Value update calls made, one per input option */
  valueCalls: number;
}

/**
 * Requests collected while a spreadsheet is in batch mode.
 *
 * Structural requests keep their order and go out as one batchUpdate.
 * Value writes are grouped by input option.
 */
export class RequestQueue {
  private requests: sheets_v4.Schema$Request[] = [];
  private values = new Map<ValueInputOption, ValueRangeInput[]>();

  enqueue(...requests: sheets_v4.Schema$Request[]): void {
    this.requests.push(...requests);
  }

  enqueueValues(inputOption: ValueInputOption, ...updates: ValueRangeInput[]): void {
    const pending = this.values.get(inputOption) ?? [];
    pending.push(...updates);
    this.values.set(inputOption, pending);
  }

  get size(): number {
    let total = this.requests.length;
    for (const updates of this.values.values()) {
      total += updates.length;
    }
    return total;
  }

  isEmpty(): boolean {
    return this.size === 0;
  }

  clear(): void {
    this.requests = [];
    this.values = new Map();
  }

  /**
   * Send everything queued and empty the queue. Sending stops at the first
   * failed call; what was not sent yet is dropped with the rest.
   */
  async flush(spreadsheetId: string, sender: BatchSender): Promise<GoogleWorkspaceResult<FlushSummary>> {
    const requests = this.requests;
    const values = this.values;
    this.clear();

    if (requests.length > 0) {
      const result = await sender.batchUpdate(spreadsheetId, requests);
      if (result.isErr()) {
        return googleErr(result.error);
      }
    }

    let valueCalls = 0;
    for (const [inputOption, updates] of values) {
      const result = await sender.valuesBatchUpdate(spreadsheetId, updates, inputOption);
      if (result.isErr()) {
        return googleErr(result.error);
      }
      valueCalls += 1;
    }

    return googleOk({ requests: requests.length, valueCalls });
  }
}
