import { OAuth2Client } from 'google-auth-library';
import { GoogleService } from './base/google-service.js';
import {
  GoogleWorkspaceResult,
  GoogleAuthResult,
  GoogleAuthError,
  GoogleErrorFactory,
  googleOk,
  googleErr,
  authOk,
  authErr,
} from '../errors/index.js';
import type { AuthInfo } from '../types/index.js';
import { Logger, createServiceLogger } from '../utils/logger.js';
import { AuthFactory, AuthorizeOptions } from './auth/auth-factory.js';
import type { AuthProvider } from './auth/auth-provider.interface.js';

/**
 * Facade over the AuthProvider implementations.
 *
 * The provider is created by AuthFactory on first use; every method then
 * delegates to it after making sure it is initialized.
 */
export class AuthService extends GoogleService {
  private readonly options: AuthorizeOptions;
  private provider: AuthProvider | null = null;
  private providerPromise: Promise<AuthProvider> | null = null;

  constructor(options: AuthorizeOptions = {}, logger?: Logger) {
    super(new OAuth2Client(), logger ?? createServiceLogger('auth-service'), options.retryConfig);
    this.options = options;
  }

  public getServiceName(): string {
    return 'AuthService';
  }

  public getServiceVersion(): string {
    return 'v1';
  }

  /** The selected provider type, known after the first call */
  public get authType(): AuthProvider['authType'] | undefined {
    return this.provider?.authType;
  }

  public async initialize(): Promise<GoogleWorkspaceResult<void>> {
    const provider = await this.ensureProvider();
    if (provider.isErr()) {
      return googleErr(provider.error);
    }

    const result = await provider.value.initialize();
    if (result.isOk()) {
      this.logger.info('Authentication service initialized successfully', {
        service: this.getServiceName(),
        providerType: provider.value.authType,
      });
    }
    return result;
  }

  public async getAuthClient(): Promise<GoogleAuthResult<OAuth2Client>> {
    const provider = await this.initializedProvider();
    if (provider.isErr()) {
      return authErr(provider.error);
    }

    const client = await provider.value.getAuthClient();
    if (client.isOk()) {
      this.auth = client.value;
    }
    return client;
  }

  /** Initialization failures read as "not valid" */
  public async validateAuth(): Promise<GoogleAuthResult<boolean>> {
    const provider = await this.initializedProvider();
    if (provider.isErr()) {
      this.logger.warn('Auth initialization failed during validation', {
        service: this.getServiceName(),
        error: provider.error.message,
      });
      return authOk(false);
    }
    return provider.value.validateAuth();
  }

  public async refreshToken(): Promise<GoogleAuthResult<void>> {
    const provider = await this.initializedProvider();
    if (provider.isErr()) {
      return authErr(provider.error);
    }

    const result = await provider.value.refreshToken();
    if (result.isOk()) {
      this.logger.info('Token refreshed successfully', {
        service: this.getServiceName(),
        providerType: provider.value.authType,
      });
    }
    return result;
  }

  public async getAuthInfo(): Promise<GoogleAuthResult<AuthInfo>> {
    const provider = await this.initializedProvider();
    if (provider.isErr()) {
      return authErr(provider.error);
    }
    return provider.value.getAuthInfo();
  }

  public async healthCheck(): Promise<GoogleWorkspaceResult<boolean>> {
    const provider = await this.initializedProvider();
    if (provider.isErr()) {
      this.logger.warn('Provider initialization failed during health check', {
        service: this.getServiceName(),
        error: provider.error.message,
      });
      return googleOk(false);
    }
    return provider.value.healthCheck();
  }

  private async initializedProvider(): Promise<GoogleAuthResult<AuthProvider>> {
    const provider = await this.ensureProvider();
    if (provider.isErr()) {
      return provider;
    }

    const initResult = await provider.value.initialize();
    if (initResult.isErr()) {
      return authErr(this.toAuthError(initResult.error, provider.value.authType));
    }
    return provider;
  }

  /**
   * Create the provider once; concurrent callers share the same promise
   */
  private async ensureProvider(): Promise<GoogleAuthResult<AuthProvider>> {
    if (this.provider) {
      return authOk(this.provider);
    }

    this.providerPromise ??= AuthFactory.createAuthProvider(this.options, this.logger);
    try {
      this.provider = await this.providerPromise;
      this.logger.info('Authentication provider created', {
        service: this.getServiceName(),
        providerType: this.provider.authType,
      });
      return authOk(this.provider);
    } catch (error) {
      this.logger.error('Failed to create authentication provider', {
        service: this.getServiceName(),
        error: error instanceof Error ? error.message : String(error),
      });
      return authErr(this.toAuthError(error, AuthFactory.determineAuthType(this.options)));
    } finally {
      this.providerPromise = null;
    }
  }

  private toAuthError(error: unknown, authType: AuthProvider['authType']): GoogleAuthError {
    if (error instanceof GoogleAuthError) {
      return error;
    }
    return GoogleErrorFactory.createAuthError(
      error instanceof Error ? error : new Error(String(error)),
      authType,
      { service: this.getServiceName() }
    );
  }
}
