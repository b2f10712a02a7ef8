/**
 * @fileoverview AuthProvider interface shared by the service account, OAuth2
 * and custom credential providers.
 */

import type { OAuth2Client } from 'google-auth-library';
import type { GoogleWorkspaceResult, GoogleAuthResult, AuthType } from '../../errors/index.js';
import type { AuthInfo } from '../../types/index.js';

export type AuthProviderType = AuthType;

/**
 * Unified API over the supported authentication methods.
 * Every method reports failures through a Result.
 */
export interface AuthProvider {
  readonly authType: AuthProviderType;

  /**
   * Prepare the provider.
   *
   * For Service Account: checks the key file and builds the JWT client.
   * For OAuth2: builds the OAuth2Client and loads a stored token.
   */
  initialize(): Promise<GoogleWorkspaceResult<void>>;

  /**
   * Get an authenticated client for API calls.
   *
   * For OAuth2 this may run the interactive authorization flow when no
   * stored token exists.
   */
  getAuthClient(): Promise<GoogleAuthResult<OAuth2Client>>;

  /**
   * Whether the provider currently holds usable credentials
   */
  validateAuth(): Promise<GoogleAuthResult<boolean>>;

  /**
   * Refresh the access token. A no-op for providers without refresh tokens.
   */
  refreshToken(): Promise<GoogleAuthResult<void>>;

  getAuthInfo(): Promise<GoogleAuthResult<AuthInfo>>;

  healthCheck(): Promise<GoogleWorkspaceResult<boolean>>;
}

/**
 * What the API services need from authentication
 */
export type AuthClientSource = Pick<AuthProvider, 'getAuthClient'>;
