import { Logger, LogLevel, LogEntry, resolveLogLevel, formatErrorForLog } from './logger.js';
import { GoogleSheetsNotFoundError } from '../errors/index.js';

describe('Logger', () => {
  let entries: LogEntry[];
  let log: Logger;

  beforeEach(() => {
    entries = [];
    log = new Logger({
      level: LogLevel.INFO,
      serviceName: 'test-service',
      outputFn: entry => entries.push(entry),
    });
  });

  it('drops entries below the configured level', () => {
    log.debug('hidden');
    log.info('shown', { spreadsheetId: 'abc' });

    expect(entries).toHaveLength(1);
    expect(entries[0].levelName).toBe('INFO');
    expect(entries[0].message).toBe('shown');
    expect(entries[0].context).toEqual({ spreadsheetId: 'abc' });
    expect(entries[0].source.service).toBe('test-service');
  });

  it('lifts operation and requestId into the source', () => {
    log.warn('slow', { operation: 'batchUpdate', requestId: 'req-1' });
    expect(entries[0].source).toEqual({
      service: 'test-service',
      operation: 'batchUpdate',
      requestId: 'req-1',
    });
  });

  it('keeps parent context in child loggers', () => {
    log.addContext({ spreadsheetId: 'abc' });
    const child = log.child({ worksheetId: 7 });
    child.info('child entry');

    expect(entries[0].context).toEqual({ spreadsheetId: 'abc', worksheetId: 7 });
  });

  it('serializes library errors with code and status', () => {
    log.error('failed', undefined, new GoogleSheetsNotFoundError('abc'));

    expect(entries[0].error).toMatchObject({
      name: 'GoogleSheetsNotFoundError',
      message: "Spreadsheet with ID 'abc' not found",
      code: 'GOOGLE_SHEETS_NOT_FOUND',
      statusCode: 404,
    });
  });

  it('rethrows from measureAsync', async () => {
    await expect(
      log.measureAsync('op', async () => {
        throw new Error('nope');
      })
    ).rejects.toThrow('nope');
  });
});

describe('resolveLogLevel', () => {
  it('prefers LOG_LEVEL over NODE_ENV', () => {
    expect(resolveLogLevel({ LOG_LEVEL: 'warn', NODE_ENV: 'production' })).toBe(LogLevel.WARN);
  });

  it('derives the level from NODE_ENV', () => {
    expect(resolveLogLevel({ NODE_ENV: 'production' })).toBe(LogLevel.INFO);
    expect(resolveLogLevel({ NODE_ENV: 'test' })).toBe(LogLevel.ERROR);
    expect(resolveLogLevel({})).toBe(LogLevel.DEBUG);
  });

  it('ignores an unknown LOG_LEVEL', () => {
    expect(resolveLogLevel({ LOG_LEVEL: 'loud', NODE_ENV: 'test' })).toBe(LogLevel.ERROR);
  });
});

describe('formatErrorForLog', () => {
  it('includes context of library errors', () => {
    const formatted = formatErrorForLog(new GoogleSheetsNotFoundError('abc'));
    expect(formatted.code).toBe('GOOGLE_SHEETS_NOT_FOUND');
    expect(formatted.context).toEqual({ spreadsheetId: 'abc', range: undefined });
  });
});
