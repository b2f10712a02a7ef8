/**
 * Abstract base class for the REST service wrappers and auth providers
 *
 * Provides the behaviour shared by every component that talks to a Google API:
 * - OAuth2Client management
 * - Retry logic with exponential backoff
 * - Per-request and total timeouts
 * - Structured error conversion and logging
 */

import { OAuth2Client } from 'google-auth-library';
import { ResultAsync } from 'neverthrow';
import {
  GoogleWorkspaceError,
  GoogleServiceError,
  GoogleTimeoutError,
  GoogleErrorFactory,
  GoogleWorkspaceResult,
  googleOk,
  googleErr,
  extractGoogleApiError,
} from '../../errors/index.js';
import { Logger } from '../../utils/logger.js';
import { loadConfig } from '../../config/index.js';

/**
 * Retry configuration used by GoogleService.
 * The env-facing RetryConfig is normalized into this shape.
 */
export interface GoogleServiceRetryConfig {
  /** Maximum number of attempts, including the first one */
  maxAttempts: number;
  /** Delay before the first retry in milliseconds */
  initialDelayMs: number;
  /** Upper bound for a computed delay */
  maxDelayMs: number;
  backoffMultiplier: number;
  /** Random share of the delay added on top (0-1) */
  jitterFactor: number;
  /** HTTP status codes that trigger a retry */
  retriableCodes: number[];
}

export interface GoogleServiceTimeoutConfig {
  /** Limit for a single attempt, in milliseconds */
  requestTimeoutMs?: number;
  /** Limit for all attempts together, in milliseconds */
  totalTimeoutMs?: number;
}

export const DEFAULT_RETRY_CONFIG: GoogleServiceRetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  jitterFactor: 0.1,
  retriableCodes: [429, 500, 502, 503, 504],
};

const RETRIABLE_HTTP_CODES = [429, 500, 502, 503, 504];

/**
 * Build the retry configuration from GOOGLE_RETRY_* environment variables,
 * falling back to the defaults for anything unset.
 */
export function createRetryConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env
): GoogleServiceRetryConfig {
  try {
    const config = loadConfig(env);
    return {
      maxAttempts: config.GOOGLE_RETRY_MAX_ATTEMPTS ?? DEFAULT_RETRY_CONFIG.maxAttempts,
      initialDelayMs: config.GOOGLE_RETRY_BASE_DELAY ?? DEFAULT_RETRY_CONFIG.initialDelayMs,
      maxDelayMs: config.GOOGLE_RETRY_MAX_DELAY ?? DEFAULT_RETRY_CONFIG.maxDelayMs,
      backoffMultiplier: DEFAULT_RETRY_CONFIG.backoffMultiplier,
      jitterFactor: config.GOOGLE_RETRY_JITTER ?? DEFAULT_RETRY_CONFIG.jitterFactor,
      retriableCodes: config.GOOGLE_RETRY_RETRIABLE_CODES ?? DEFAULT_RETRY_CONFIG.retriableCodes,
    };
  } catch {
    // Broken environment: retry server errors only
    return { ...DEFAULT_RETRY_CONFIG, retriableCodes: [500, 502, 503, 504] };
  }
}

export function createTimeoutConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env
): GoogleServiceTimeoutConfig {
  try {
    const config = loadConfig(env);
    return {
      requestTimeoutMs: config.GOOGLE_REQUEST_TIMEOUT,
      totalTimeoutMs: config.GOOGLE_TOTAL_TIMEOUT,
    };
  } catch {
    // Broken environment: no timeouts
    return {};
  }
}

/**
 * Validate a retry configuration and drop status codes that are never retriable
 *
 * @throws Error if a numeric setting is out of range
 */
export function normalizeRetryConfig(config: GoogleServiceRetryConfig): GoogleServiceRetryConfig {
  if (config.maxAttempts <= 0) {
    throw new Error('Invalid retry configuration: maxAttempts must be positive');
  }
  if (config.initialDelayMs <= 0) {
    throw new Error('Invalid retry configuration: initialDelayMs must be positive');
  }
  if (config.maxDelayMs <= 0) {
    throw new Error('Invalid retry configuration: maxDelayMs must be positive');
  }
  if (config.backoffMultiplier <= 0) {
    throw new Error('Invalid retry configuration: backoffMultiplier must be positive');
  }
  if (config.jitterFactor < 0 || config.jitterFactor > 1) {
    throw new Error('Invalid retry configuration: jitterFactor must be between 0 and 1');
  }

  return {
    ...config,
    retriableCodes: config.retriableCodes.filter(code => RETRIABLE_HTTP_CODES.includes(code)),
  };
}

/**
 * Service operation context for logging and error handling
 */
export interface ServiceContext {
  /** Operation identifier (e.g. 'batchUpdate', 'valuesGet') */
  operation: string;
  data?: Record<string, unknown>;
  /** Request ID for tracing */
  requestId?: string;
}

function hasRetryOverride(error: Error): error is Error & { isRetryable: () => boolean } {
  return 'isRetryable' in error && typeof error.isRetryable === 'function';
}

/**
 * Abstract base class for API-facing services
 */
export abstract class GoogleService {
  protected auth: OAuth2Client;
  protected readonly logger: Logger;
  protected readonly retryConfig: GoogleServiceRetryConfig;
  protected readonly timeoutConfig: GoogleServiceTimeoutConfig;

  constructor(
    auth: OAuth2Client,
    logger: Logger,
    retryConfig?: GoogleServiceRetryConfig,
    timeoutConfig?: GoogleServiceTimeoutConfig
  ) {
    this.auth = auth;
    this.logger = logger;
    this.retryConfig = normalizeRetryConfig(retryConfig ?? createRetryConfigFromEnv());
    this.timeoutConfig = timeoutConfig ?? createTimeoutConfigFromEnv();

    this.logger.debug(`${this.constructor.name}: Retry configuration initialized`, {
      ...this.retryConfig,
      ...this.timeoutConfig,
    });
  }

  public abstract getServiceName(): string;

  public abstract getServiceVersion(): string;

  /**
   * Set up API clients and validate credentials
   */
  public abstract initialize(): Promise<GoogleWorkspaceResult<void>>;

  public abstract healthCheck(): Promise<GoogleWorkspaceResult<boolean>>;

  /**
   * Decide whether an error should be retried.
   *
   * Priority order:
   * 1. an explicit isRetryable() on the original error that says no
   * 2. HTTP status in the configured retriable codes
   * 3. other 4xx statuses are final (429 always retries)
   * 4. the normalized error's retryable flag
   * 5. the converted error's isRetryable()
   */
  protected shouldRetryError(
    error: Error,
    customError: GoogleWorkspaceError
  ): { shouldRetry: boolean; reason: string } {
    if (customError instanceof GoogleTimeoutError) {
      return { shouldRetry: false, reason: 'timeout' };
    }

    const normalizedError = extractGoogleApiError(error);
    const statusCode = this.extractStatusCode(error, customError);

    if (hasRetryOverride(error) && !error.isRetryable()) {
      return { shouldRetry: false, reason: 'error_override_not_retryable' };
    }

    if (statusCode && this.retryConfig.retriableCodes.includes(statusCode)) {
      return { shouldRetry: true, reason: 'retriable_http_status' };
    }

    if (statusCode && statusCode >= 400 && statusCode < 500) {
      if (statusCode === 429) {
        return { shouldRetry: true, reason: 'rate_limit_retryable' };
      }
      return { shouldRetry: false, reason: `non_retriable_http_status:${statusCode}` };
    }

    if (normalizedError.isRetryable) {
      return {
        shouldRetry: true,
        reason: `normalized_retryable:${normalizedError.reason ?? 'status_' + statusCode}`,
      };
    }

    if (!customError.isRetryable()) {
      return { shouldRetry: false, reason: 'error_not_retryable' };
    }
    return { shouldRetry: true, reason: 'error_is_retryable' };
  }

  protected extractStatusCode(error: Error, customError: GoogleWorkspaceError): number | null {
    if (error instanceof GoogleWorkspaceError) {
      return error.statusCode;
    }
    return extractGoogleApiError(error).httpStatus || customError.statusCode || null;
  }

  /**
   * Execute an operation with retry, timeouts and error conversion.
   * Never rejects: every failure ends up in the returned Result.
   */
  protected async executeWithRetry<T>(
    operation: () => Promise<T>,
    context: ServiceContext
  ): Promise<GoogleWorkspaceResult<T>> {
    const { operation: operationName, data, requestId } = context;
    const service = this.getServiceName();
    const startedAt = Date.now();
    const { totalTimeoutMs } = this.timeoutConfig;

    this.logger.debug(`${service}: Starting operation '${operationName}'`, {
      service,
      operation: operationName,
      requestId,
      data,
    });

    let lastError: Error = new Error(`Operation '${operationName}' was not attempted`);

    for (let attempt = 1; attempt <= this.retryConfig.maxAttempts; attempt++) {
      try {
        const result = await this.withRequestTimeout(operation, context);
        this.logger.debug(`${service}: Operation '${operationName}' succeeded`, {
          service,
          operation: operationName,
          attempt,
          requestId,
        });
        return googleOk(result);
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
      }

      const customError = this.convertError(lastError, context);
      const isFinalAttempt = attempt >= this.retryConfig.maxAttempts;
      const { shouldRetry, reason } = this.shouldRetryError(lastError, customError);

      this.logger.warn(`${service}: Attempt ${attempt} failed`, {
        service,
        operation: operationName,
        attempt,
        isFinalAttempt,
        requestId,
        error: lastError.message,
        retryReason: reason,
      });

      if (!shouldRetry) {
        this.logger.error(`${service}: Non-retryable error encountered`, {
          service,
          operation: operationName,
          requestId,
          errorCode: customError.code,
          statusCode: customError.statusCode,
          retrySkippedReason: reason,
        });
        return googleErr(customError);
      }

      if (isFinalAttempt) {
        break;
      }

      const delay = this.calculateRetryDelay(attempt, customError);
      if (totalTimeoutMs !== undefined && Date.now() - startedAt + delay > totalTimeoutMs) {
        return googleErr(
          new GoogleTimeoutError(
            `Operation '${operationName}' exceeded total timeout of ${totalTimeoutMs}ms`,
            'total',
            totalTimeoutMs,
            { service, operation: operationName, requestId, attempts: attempt },
            lastError
          )
        );
      }

      this.logger.info(`${service}: Retrying in ${delay}ms`, {
        service,
        operation: operationName,
        attempt,
        maxAttempts: this.retryConfig.maxAttempts,
        delayMs: delay,
        requestId,
      });
      await this.sleep(delay);
    }

    const finalError = this.convertError(lastError, context);
    this.logger.error(`${service}: All retry attempts exhausted`, {
      service,
      operation: operationName,
      attempts: this.retryConfig.maxAttempts,
      finalError: finalError.toJSON(),
      requestId,
    });
    return googleErr(finalError);
  }

  /**
   * Execute an operation wrapped in ResultAsync
   */
  protected executeAsyncWithRetry<T>(
    operation: () => Promise<T>,
    context: ServiceContext
  ): ResultAsync<T, GoogleWorkspaceError> {
    return ResultAsync.fromPromise(this.executeWithRetry(operation, context), error =>
      error instanceof GoogleWorkspaceError
        ? error
        : this.convertError(error instanceof Error ? error : new Error(String(error)), context)
    ).andThen(result => result);
  }

  private async withRequestTimeout<T>(
    operation: () => Promise<T>,
    context: ServiceContext
  ): Promise<T> {
    const { requestTimeoutMs } = this.timeoutConfig;
    if (requestTimeoutMs === undefined) {
      return operation();
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () =>
          reject(
            new GoogleTimeoutError(
              `Request '${context.operation}' timed out after ${requestTimeoutMs}ms`,
              'request',
              requestTimeoutMs,
              { service: this.getServiceName(), operation: context.operation, requestId: context.requestId }
            )
          ),
        requestTimeoutMs
      );
    });

    try {
      return await Promise.race([operation(), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Convert an arbitrary error into a GoogleWorkspaceError
   */
  protected convertError(error: Error, context: ServiceContext): GoogleWorkspaceError {
    if (error instanceof GoogleWorkspaceError) {
      return error;
    }

    const serviceError = this.convertServiceSpecificError(error, context);
    if (serviceError) {
      return serviceError;
    }

    const normalizedError = extractGoogleApiError(error);
    const enrichedContext = { normalizedError, ...context.data };

    const authReasons = ['authError', 'expired', 'tokenExpired', 'required', 'missing'];
    if (normalizedError.reason && authReasons.includes(normalizedError.reason)) {
      return GoogleErrorFactory.createAuthError(error, 'service-account', enrichedContext);
    }
    if (normalizedError.httpStatus === 401) {
      return GoogleErrorFactory.createAuthError(error, 'service-account', enrichedContext);
    }

    const genericServiceError = new GoogleServiceError(
      normalizedError.message,
      this.getServiceName(),
      'GOOGLE_SERVICE_ERROR',
      normalizedError.httpStatus || 500,
      enrichedContext,
      error
    );

    if (hasRetryOverride(error)) {
      const originalIsRetryable = error.isRetryable();
      genericServiceError.isRetryable = () => originalIsRetryable;
    }

    return genericServiceError;
  }

  /**
   * Service-specific conversion; subclasses override
   */
  protected convertServiceSpecificError(
    _error: Error,
    _context: ServiceContext
  ): GoogleWorkspaceError | null {
    return null;
  }

  /**
   * Exponential backoff with jitter. A retry-after hint from the error wins
   * and is not capped.
   */
  protected calculateRetryDelay(attempt: number, error: GoogleWorkspaceError): number {
    if ('retryAfterMs' in error && typeof error.retryAfterMs === 'number') {
      return error.retryAfterMs;
    }

    const exponentialDelay =
      this.retryConfig.initialDelayMs * Math.pow(this.retryConfig.backoffMultiplier, attempt - 1);
    const cappedDelay = Math.min(exponentialDelay, this.retryConfig.maxDelayMs);
    const jitter = cappedDelay * this.retryConfig.jitterFactor * Math.random();

    return Math.floor(cappedDelay + jitter);
  }

  protected sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  /**
   * Unique request ID: serviceName-timestamp-random
   */
  protected generateRequestId(): string {
    return `${this.getServiceName()}-${Date.now()}-${Math.random().toString(36).substring(2, 11)}`;
  }

  protected createContext(operation: string, data?: Record<string, unknown>): ServiceContext {
    return {
      operation,
      data,
      requestId: this.generateRequestId(),
    };
  }
}
