/**
 * @fileoverview Service account authentication from a JSON key file.
 */

import { promises as fs } from 'fs';
import { JWT } from 'google-auth-library';
import type { OAuth2Client } from 'google-auth-library';
import { z } from 'zod';
import type { AuthInfo } from '../../types/index.js';
import { GOOGLE_SCOPES } from '../../config/index.js';
import { GoogleService, GoogleServiceRetryConfig } from '../base/google-service.js';
import type { AuthProvider, AuthProviderType } from './auth-provider.interface.js';
import {
  GoogleWorkspaceResult,
  GoogleWorkspaceError,
  GoogleAuthResult,
  GoogleAuthError,
  GoogleAuthMissingCredentialsError,
  GoogleAuthInvalidCredentialsError,
  GoogleErrorFactory,
  googleOk,
  authOk,
  authErr,
} from '../../errors/index.js';
import { Logger, createServiceLogger } from '../../utils/logger.js';

const serviceAccountKeySchema = z.object({
  type: z.literal('service_account'),
  client_email: z.string().min(1),
  private_key: z.string().min(1),
  private_key_id: z.string().optional(),
});

/**
 * Authenticates as a service account. The key file is read and validated
 * on initialize; tokens are fetched lazily by the JWT client.
 *
 * @example
 * ```typescript
 * const provider = new ServiceAccountAuthProvider('./service-account.json');
 * const client = await provider.getAuthClient();
 * ```
 */
export class ServiceAccountAuthProvider extends GoogleService implements AuthProvider {
  readonly authType: AuthProviderType = 'service-account';

  private readonly keyFile: string;
  private readonly scopes: string[];
  private authenticatedClient?: JWT;

  constructor(
    keyFile: string,
    scopes: readonly string[] = GOOGLE_SCOPES,
    logger?: Logger,
    retryConfig?: GoogleServiceRetryConfig
  ) {
    if (!keyFile) {
      throw new GoogleAuthMissingCredentialsError('service-account', {
        reason: 'Service account key path is required',
      });
    }

    const serviceLogger = logger ?? createServiceLogger('service-account-auth');
    super(new JWT(), serviceLogger, retryConfig);
    this.keyFile = keyFile;
    this.scopes = [...scopes];
  }

  public getServiceName(): string {
    return 'ServiceAccountAuthProvider';
  }

  public getServiceVersion(): string {
    return 'v1';
  }

  /**
   * Check the key file exists and holds a service account key, then build
   * the JWT client from it
   */
  public async initialize(): Promise<GoogleWorkspaceResult<void>> {
    const context = this.createContext('initialize', { keyFile: this.keyFile });

    return this.executeWithRetry(async () => {
      let raw: string;
      try {
        raw = await fs.readFile(this.keyFile, 'utf8');
      } catch (error) {
        throw new GoogleAuthMissingCredentialsError('service-account', {
          filePath: this.keyFile,
          error: error instanceof Error ? error.message : String(error),
        });
      }

      const key = this.parseKey(raw);
      this.authenticatedClient = new JWT({
        email: key.client_email,
        key: key.private_key,
        keyId: key.private_key_id,
        scopes: this.scopes,
      });
      this.auth = this.authenticatedClient;

      this.logger.info('Service account authentication initialized', {
        service: this.getServiceName(),
        keyFile: this.keyFile,
        clientEmail: key.client_email,
        scopes: this.scopes,
      });
    }, context);
  }

  public async getAuthClient(): Promise<GoogleAuthResult<OAuth2Client>> {
    if (!this.authenticatedClient) {
      const initResult = await this.initialize();
      if (initResult.isErr()) {
        return authErr(this.toAuthError(initResult.error));
      }
    }

    if (!this.authenticatedClient) {
      return authErr(
        new GoogleAuthError('Auth provider not properly initialized', 'service-account', {
          service: this.getServiceName(),
        })
      );
    }

    return authOk(this.authenticatedClient);
  }

  /**
   * Fetch an access token to prove the key works. Failures read as "not valid".
   */
  public async validateAuth(): Promise<GoogleAuthResult<boolean>> {
    const clientResult = await this.getAuthClient();
    if (clientResult.isErr()) {
      this.logger.warn('Failed to get auth client during validation', {
        error: clientResult.error.toJSON(),
      });
      return authOk(false);
    }

    try {
      const accessToken = await clientResult.value.getAccessToken();
      return authOk(!!accessToken.token);
    } catch (error) {
      const authError = GoogleErrorFactory.createAuthError(
        error instanceof Error ? error : new Error(String(error)),
        'service-account',
        { service: this.getServiceName() }
      );
      this.logger.warn('Auth token validation failed', { error: authError.toJSON() });
      return authOk(false);
    }
  }

  public async refreshToken(): Promise<GoogleAuthResult<void>> {
    if (!this.authenticatedClient) {
      return authErr(
        new GoogleAuthError('Cannot refresh token: auth client not initialized', 'service-account', {
          service: this.getServiceName(),
        })
      );
    }

    try {
      await this.authenticatedClient.authorize();
      return authOk(undefined);
    } catch (error) {
      return authErr(
        GoogleErrorFactory.createAuthError(
          error instanceof Error ? error : new Error(String(error)),
          'service-account',
          { service: this.getServiceName(), operation: 'refreshToken' }
        )
      );
    }
  }

  public async getAuthInfo(): Promise<GoogleAuthResult<AuthInfo>> {
    const credentials = this.authenticatedClient?.credentials;
    const hasToken = !!credentials?.access_token;

    return authOk({
      isAuthenticated: hasToken,
      keyFile: this.keyFile,
      scopes: this.scopes,
      tokenInfo: {
        hasToken,
        expiresAt: credentials?.expiry_date ? new Date(credentials.expiry_date) : undefined,
      },
    });
  }

  public async healthCheck(): Promise<GoogleWorkspaceResult<boolean>> {
    return googleOk(this.authenticatedClient !== undefined);
  }

  private parseKey(raw: string): z.infer<typeof serviceAccountKeySchema> {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new GoogleAuthInvalidCredentialsError('service-account', {
        filePath: this.keyFile,
        reason: 'Key file is not valid JSON',
        error: error instanceof Error ? error.message : String(error),
      });
    }

    const parsed = serviceAccountKeySchema.safeParse(json);
    if (!parsed.success) {
      throw new GoogleAuthInvalidCredentialsError('service-account', {
        filePath: this.keyFile,
        reason: 'Key file is not a service account key',
      });
    }
    return parsed.data;
  }

  private toAuthError(error: GoogleWorkspaceError): GoogleAuthError {
    return error instanceof GoogleAuthError
      ? error
      : GoogleErrorFactory.createAuthError(error, 'service-account', { service: this.getServiceName() });
  }
}
