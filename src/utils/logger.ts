/**
 * Structured logging
 *
 * JSON log entries written to stderr, with levels, persistent context for
 * child loggers and simple duration timers. The minimum level follows
 * `NODE_ENV` and can be overridden with `LOG_LEVEL` (DEBUG, INFO, WARN,
 * ERROR, FATAL).
 */

import { GoogleWorkspaceError } from '../errors/index.js';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  FATAL = 4,
}

export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  levelName: string;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
    code?: string;
    statusCode?: number;
  };
  source: {
    service: string;
    operation?: string;
    requestId?: string;
  };
}

export interface LoggerConfig {
  /** Minimum log level to output */
  level: LogLevel;
  /** Include stack traces in serialized errors */
  debugMode: boolean;
  serviceName: string;
  prettyPrint: boolean;
  /** Custom output function (defaults to console) */
  outputFn?: (entry: LogEntry) => void;
}

export const LOG_LEVEL_NAMES = Object.keys(LogLevel).filter(key =>
  isNaN(Number(key))
);

function isLogLevelName(name: string): name is keyof typeof LogLevel {
  return LOG_LEVEL_NAMES.includes(name);
}

/**
 * Resolve the minimum level from `LOG_LEVEL`, then `NODE_ENV`
 */
export function resolveLogLevel(env: Record<string, string | undefined> = process.env): LogLevel {
  const override = env.LOG_LEVEL?.toUpperCase();
  if (override && isLogLevelName(override)) {
    return LogLevel[override];
  }
  switch (env.NODE_ENV) {
    case 'production':
      return LogLevel.INFO;
    case 'test':
      return LogLevel.ERROR;
    default:
      return LogLevel.DEBUG;
  }
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: resolveLogLevel(),
  debugMode: process.env.DEBUG === 'true' || process.env.NODE_ENV === 'development',
  serviceName: 'sheets-model-client',
  prettyPrint: false,
  outputFn: (entry: LogEntry) => {
    // stdout belongs to the host application
    process.stderr.write(JSON.stringify(entry) + '\n');
  },
};

interface PerformanceTimer {
  start: bigint;
  label: string;
}

function stringField(context: Record<string, unknown>, key: string): string | undefined {
  const value = context[key];
  return typeof value === 'string' ? value : undefined;
}

export class Logger {
  private readonly config: LoggerConfig;
  private readonly performanceTimers: Map<string, PerformanceTimer> = new Map();
  private readonly additionalContext: Record<string, unknown> = {};

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_LOGGER_CONFIG, ...config };
  }

  /**
   * Create a child logger that carries this logger's context plus `context`
   */
  public child(context: Record<string, unknown>): Logger {
    const childLogger = new Logger(this.config);
    childLogger.addContext({ ...this.additionalContext, ...context });
    return childLogger;
  }

  public addContext(context: Record<string, unknown>): void {
    Object.assign(this.additionalContext, context);
  }

  public debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  public info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context);
  }

  public warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, context);
  }

  public error(message: string, context?: Record<string, unknown>, error?: Error): void {
    this.log(LogLevel.ERROR, message, context, error);
  }

  public fatal(message: string, context?: Record<string, unknown>, error?: Error): void {
    this.log(LogLevel.FATAL, message, context, error);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (level < this.config.level) {
      return;
    }

    const mergedContext = { ...this.additionalContext, ...context };

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      levelName: LogLevel[level],
      message,
      context: Object.keys(mergedContext).length > 0 ? mergedContext : undefined,
      source: {
        service: this.config.serviceName,
        operation: stringField(mergedContext, 'operation'),
        requestId: stringField(mergedContext, 'requestId'),
      },
    };

    if (error) {
      entry.error = this.serializeError(error);
    }

    this.output(entry);
  }

  private serializeError(error: Error): LogEntry['error'] {
    const serialized: LogEntry['error'] = {
      name: error.name,
      message: error.message,
      stack: this.config.debugMode ? error.stack : undefined,
    };

    if (error instanceof GoogleWorkspaceError) {
      serialized.code = error.code;
      serialized.statusCode = error.statusCode;
    }

    return serialized;
  }

  private output(entry: LogEntry): void {
    if (this.config.outputFn) {
      this.config.outputFn(entry);
      return;
    }

    const output = this.config.prettyPrint
      ? JSON.stringify(entry, null, 2)
      : JSON.stringify(entry);

    switch (entry.level) {
      case LogLevel.DEBUG:
        console.debug(output);
        break;
      case LogLevel.INFO:
        console.info(output);
        break;
      case LogLevel.WARN:
        console.warn(output);
        break;
      case LogLevel.ERROR:
      case LogLevel.FATAL:
        console.error(output);
        break;
    }
  }

  public startTimer(label: string): void {
    this.performanceTimers.set(label, { start: process.hrtime.bigint(), label });
  }

  /**
   * End a timer and log its duration in milliseconds at DEBUG level
   */
  public endTimer(label: string, message?: string, context?: Record<string, unknown>): number | undefined {
    const timer = this.performanceTimers.get(label);
    if (!timer) {
      this.warn(`Performance timer '${label}' not found`);
      return undefined;
    }

    const duration = Number(process.hrtime.bigint() - timer.start) / 1_000_000;
    this.performanceTimers.delete(label);

    this.debug(message || `Operation '${label}' completed`, {
      ...context,
      performance: { duration, label },
    });
    return duration;
  }

  /**
   * Measure and log the execution time of an async operation
   */
  public async measureAsync<T>(
    label: string,
    operation: () => Promise<T>,
    context?: Record<string, unknown>
  ): Promise<T> {
    this.startTimer(label);
    try {
      const result = await operation();
      this.endTimer(label, `Async operation '${label}' completed successfully`, context);
      return result;
    } catch (error) {
      this.endTimer(label, `Async operation '${label}' failed`, {
        ...context,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  public isLevelEnabled(level: LogLevel): boolean {
    return level >= this.config.level;
  }

  public getConfig(): Readonly<LoggerConfig> {
    return { ...this.config };
  }

  public updateConfig(updates: Partial<LoggerConfig>): void {
    Object.assign(this.config, updates);
  }
}

/**
 * Default logger instance
 */
export const logger = new Logger();

/**
 * Create a logger for a specific service
 */
export function createServiceLogger(serviceName: string, config?: Partial<LoggerConfig>): Logger {
  return new Logger({
    ...DEFAULT_LOGGER_CONFIG,
    ...config,
    serviceName,
  });
}

export function formatErrorForLog(error: Error): Record<string, unknown> {
  const formatted: Record<string, unknown> = {
    name: error.name,
    message: error.message,
    stack: error.stack,
  };

  if (error instanceof GoogleWorkspaceError) {
    formatted.code = error.code;
    formatted.statusCode = error.statusCode;
    formatted.context = error.context;
    formatted.timestamp = error.timestamp.toISOString();
  }

  return formatted;
}
