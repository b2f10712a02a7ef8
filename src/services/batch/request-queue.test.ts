import { RequestQueue } from './request-queue.js';
import type { BatchSender } from './request-queue.js';
import { GoogleSheetsNotFoundError, googleErr, googleOk } from '../../errors/index.js';
import { ValueInputOption } from '../../types/index.js';

function createSender() {
  return {
    batchUpdate: jest.fn<ReturnType<BatchSender['batchUpdate']>, Parameters<BatchSender['batchUpdate']>>(
      async () => googleOk({})
    ),
    valuesBatchUpdate: jest.fn<
      ReturnType<BatchSender['valuesBatchUpdate']>,
      Parameters<BatchSender['valuesBatchUpdate']>
    >(async () => googleOk([])),
  };
}

describe('RequestQueue', () => {
  it('counts structural requests and value writes', () => {
    const queue = new RequestQueue();

    queue.enqueue({ deleteSheet: { sheetId: 1 } }, { deleteSheet: { sheetId: 2 } });
    queue.enqueueValues(ValueInputOption.RAW, { range: 'A1', values: [[1]] });

    expect(queue.size).toBe(3);
    expect(queue.isEmpty()).toBe(false);
  });

  it('empties on clear', () => {
    const queue = new RequestQueue();
    queue.enqueue({ deleteSheet: { sheetId: 1 } });

    queue.clear();

    expect(queue.isEmpty()).toBe(true);
  });

  it('sends requests in order and one value call per input option', async () => {
    const queue = new RequestQueue();
    const sender = createSender();
    queue.enqueue({ deleteSheet: { sheetId: 1 } });
    queue.enqueueValues(ValueInputOption.USER_ENTERED, { range: 'A1', values: [['=1+1']] });
    queue.enqueue({ deleteSheet: { sheetId: 2 } });
    queue.enqueueValues(ValueInputOption.RAW, { range: 'B1', values: [['x']] });
    queue.enqueueValues(ValueInputOption.USER_ENTERED, { range: 'C1', values: [[3]] });

    const summary = (await queue.flush('sheet-1', sender))._unsafeUnwrap();

    expect(summary).toEqual({ requests: 2, valueCalls: 2 });
    expect(sender.batchUpdate).toHaveBeenCalledWith('sheet-1', [
      { deleteSheet: { sheetId: 1 } },
      { deleteSheet: { sheetId: 2 } },
    ]);
    expect(sender.valuesBatchUpdate).toHaveBeenNthCalledWith(
      1,
      'sheet-1',
      [
        { range: 'A1', values: [['=1+1']] },
        { range: 'C1', values: [[3]] },
      ],
      'USER_ENTERED'
    );
    expect(sender.valuesBatchUpdate).toHaveBeenNthCalledWith(2, 'sheet-1', [{ range: 'B1', values: [['x']] }], 'RAW');
    expect(queue.isEmpty()).toBe(true);
  });

  it('skips the structural call when only values are queued', async () => {
    const queue = new RequestQueue();
    const sender = createSender();
    queue.enqueueValues(ValueInputOption.RAW, { range: 'A1', values: [[1]] });

    await queue.flush('sheet-1', sender);

    expect(sender.batchUpdate).not.toHaveBeenCalled();
  });

  it('stops at the first error and stays empty', async () => {
    const queue = new RequestQueue();
    const sender = createSender();
    sender.batchUpdate.mockResolvedValueOnce(googleErr(new GoogleSheetsNotFoundError('sheet-1')));
    queue.enqueue({ deleteSheet: { sheetId: 1 } });
    queue.enqueueValues(ValueInputOption.RAW, { range: 'A1', values: [[1]] });

    const result = await queue.flush('sheet-1', sender);

    expect(result._unsafeUnwrapErr()).toBeInstanceOf(GoogleSheetsNotFoundError);
    expect(sender.valuesBatchUpdate).not.toHaveBeenCalled();
    expect(queue.isEmpty()).toBe(true);
  });
});
