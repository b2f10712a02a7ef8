/**
 * @fileoverview AuthFactory for creating the AuthProvider that matches the
 * given credentials.
 */

import type { OAuth2Client } from 'google-auth-library';
import type { AuthProvider, AuthProviderType } from './auth-provider.interface.js';
import type { OAuth2Config } from './types.js';
import type { EnvironmentConfig } from '../../types/index.js';
import type { Logger } from '../../utils/logger.js';
import type { GoogleServiceRetryConfig } from '../base/google-service.js';

import { ServiceAccountAuthProvider } from './service-account-auth.provider.js';
import { OAuth2AuthProvider } from './oauth2-auth.provider.js';
import { CustomCredentialsAuthProvider } from './custom-credentials.provider.js';
import { TokenStorageService } from './token-storage.service.js';
import { readClientSecret } from './client-secret.js';
import { GOOGLE_SCOPES } from '../../config/index.js';
import { GoogleAuthError } from '../../errors/index.js';

export const DEFAULT_CLIENT_SECRET_FILE = 'client_secret.json';

/**
 * Inputs of {@link authorize}. Every field is optional; with none set the
 * OAuth2 flow runs with `client_secret.json` from the working directory.
 */
export interface AuthorizeOptions {
  /** Path of the OAuth2 client secret JSON */
  clientSecret?: string;
  /** OAuth2 client id and secret given directly instead of a file */
  oauthClient?: { clientId: string; clientSecret: string };
  serviceAccountFile?: string;
  /** Where the OAuth2 token file lives. `'global'` means `~/.credentials` */
  credentialsDirectory?: string;
  scopes?: readonly string[];
  /** An authenticated client, used as is */
  customCredentials?: OAuth2Client;
  redirectUri?: string;
  port?: number;
  /** Force a method instead of picking one from the fields above */
  authMode?: 'service-account' | 'oauth2';
  retryConfig?: GoogleServiceRetryConfig;
}

/**
 * Factory for AuthProvider instances.
 *
 * @example
 * ```typescript
 * const provider = await AuthFactory.createAuthProvider({ serviceAccountFile: './key.json' });
 * const client = await provider.getAuthClient();
 * ```
 */
export class AuthFactory {
  /**
   * Create the provider for the given options.
   *
   * @throws {GoogleAuthMissingCredentialsError} When the chosen method lacks its credential file
   * @throws {GoogleAuthInvalidCredentialsError} When a credential file cannot be parsed
   */
  static async createAuthProvider(options: AuthorizeOptions = {}, logger?: Logger): Promise<AuthProvider> {
    const authType = this.determineAuthType(options);
    logger?.info('AuthFactory: Creating authentication provider', {
      authType,
      explicitAuthMode: options.authMode,
    });

    const scopes = options.scopes ?? GOOGLE_SCOPES;

    try {
      switch (authType) {
        case 'custom':
          if (!options.customCredentials) {
            throw new GoogleAuthError('Custom credentials are missing', 'custom');
          }
          return new CustomCredentialsAuthProvider(options.customCredentials, logger);

        case 'service-account':
          return new ServiceAccountAuthProvider(
            options.serviceAccountFile ?? '',
            scopes,
            logger,
            options.retryConfig
          );

        case 'oauth2': {
          const oauth2Config = await this.resolveOAuth2Config(options, scopes);
          logger?.debug('AuthFactory: OAuth2 configuration', {
            clientId: oauth2Config.clientId,
            redirectUri: oauth2Config.redirectUri,
            scopes: oauth2Config.scopes,
            port: oauth2Config.port,
          });
          return new OAuth2AuthProvider(oauth2Config, {
            tokenStorage: new TokenStorageService(options.credentialsDirectory, logger),
            logger,
            retryConfig: options.retryConfig,
          });
        }
      }
    } catch (error) {
      logger?.error('AuthFactory: Provider creation failed', {
        authType,
        error: error instanceof Error ? error.message : String(error),
      });

      if (error instanceof GoogleAuthError) {
        throw error;
      }
      throw new GoogleAuthError(
        `Failed to create ${authType} authentication provider: ${error instanceof Error ? error.message : String(error)}`,
        authType,
        { operation: 'AUTH_FACTORY_ERROR' }
      );
    }
  }

  /**
   * Custom credentials win, then an explicit mode, then a service account
   * file. Everything else goes through OAuth2.
   */
  static determineAuthType(options: AuthorizeOptions): AuthProviderType {
    if (options.customCredentials) {
      return 'custom';
    }
    if (options.authMode) {
      return options.authMode;
    }
    if (options.serviceAccountFile) {
      return 'service-account';
    }
    return 'oauth2';
  }

  /**
   * Map the environment configuration onto authorize options
   */
  static optionsFromConfig(config: EnvironmentConfig): AuthorizeOptions {
    return {
      authMode: config.GOOGLE_AUTH_MODE,
      serviceAccountFile: config.GOOGLE_SERVICE_ACCOUNT_KEY_PATH,
      clientSecret: config.GOOGLE_OAUTH_CLIENT_SECRET_PATH,
      oauthClient:
        config.GOOGLE_OAUTH_CLIENT_ID && config.GOOGLE_OAUTH_CLIENT_SECRET
          ? { clientId: config.GOOGLE_OAUTH_CLIENT_ID, clientSecret: config.GOOGLE_OAUTH_CLIENT_SECRET }
          : undefined,
      credentialsDirectory: config.GOOGLE_CREDENTIALS_DIRECTORY,
      scopes: config.GOOGLE_OAUTH_SCOPES,
      redirectUri: config.GOOGLE_OAUTH_REDIRECT_URI,
      port: config.GOOGLE_OAUTH_PORT,
    };
  }

  private static async resolveOAuth2Config(
    options: AuthorizeOptions,
    scopes: readonly string[]
  ): Promise<OAuth2Config> {
    const client =
      options.oauthClient && !options.clientSecret
        ? options.oauthClient
        : await readClientSecret(options.clientSecret ?? DEFAULT_CLIENT_SECRET_FILE);

    return {
      clientId: client.clientId,
      clientSecret: client.clientSecret,
      redirectUri: options.redirectUri,
      scopes: [...scopes],
      port: options.port,
    };
  }
}
