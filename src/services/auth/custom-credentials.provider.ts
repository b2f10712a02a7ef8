/**
 * @fileoverview Wraps an already authenticated client supplied by the caller.
 */

import type { OAuth2Client } from 'google-auth-library';
import type { AuthProvider, AuthProviderType } from './auth-provider.interface.js';
import type { AuthInfo } from '../../types/index.js';
import {
  GoogleWorkspaceResult,
  GoogleAuthResult,
  GoogleErrorFactory,
  googleOk,
  authOk,
  authErr,
} from '../../errors/index.js';
import { Logger, createServiceLogger } from '../../utils/logger.js';

export class CustomCredentialsAuthProvider implements AuthProvider {
  readonly authType: AuthProviderType = 'custom';

  private readonly client: OAuth2Client;
  private readonly logger: Logger;

  constructor(client: OAuth2Client, logger?: Logger) {
    this.client = client;
    this.logger = logger ?? createServiceLogger('custom-credentials-auth');
  }

  public async initialize(): Promise<GoogleWorkspaceResult<void>> {
    return googleOk(undefined);
  }

  public async getAuthClient(): Promise<GoogleAuthResult<OAuth2Client>> {
    return authOk(this.client);
  }

  public async validateAuth(): Promise<GoogleAuthResult<boolean>> {
    const { access_token, refresh_token } = this.client.credentials;
    return authOk(!!access_token || !!refresh_token);
  }

  /** Only clients holding a refresh token can be refreshed */
  public async refreshToken(): Promise<GoogleAuthResult<void>> {
    if (!this.client.credentials.refresh_token) {
      this.logger.debug('Custom credentials carry no refresh token, skipping refresh', {
        operation: 'refreshToken',
      });
      return authOk(undefined);
    }

    try {
      await this.client.getAccessToken();
      return authOk(undefined);
    } catch (error) {
      return authErr(
        GoogleErrorFactory.createAuthError(
          error instanceof Error ? error : new Error(String(error)),
          'custom',
          { operation: 'refreshToken' }
        )
      );
    }
  }

  public async getAuthInfo(): Promise<GoogleAuthResult<AuthInfo>> {
    const credentials = this.client.credentials;
    const hasToken = !!credentials.access_token;
    return authOk({
      isAuthenticated: hasToken,
      keyFile: 'custom',
      scopes: credentials.scope ? credentials.scope.split(' ') : [],
      tokenInfo: {
        hasToken,
        expiresAt: credentials.expiry_date ? new Date(credentials.expiry_date) : undefined,
      },
    });
  }

  public async healthCheck(): Promise<GoogleWorkspaceResult<boolean>> {
    return googleOk(true);
  }
}
