/**
 * @fileoverview OAuth2 authorization code flow with PKCE over a loopback
 * redirect.
 *
 * - stored tokens are reused when they belong to the same client id
 * - without tokens a local callback server is started and the consent page
 *   opened in the browser
 * - refreshed tokens are written back to storage
 */

import { OAuth2Client, CodeChallengeMethod } from 'google-auth-library';
import type { Credentials } from 'google-auth-library';
import { createServer, Server } from 'http';
import { URL } from 'url';
import { randomBytes } from 'crypto';
import enableDestroy from 'server-destroy';

import type { AuthProvider, AuthProviderType } from './auth-provider.interface.js';
import type { OAuth2Config, OAuth2StoredCredentials, TokenStorage } from './types.js';
import { TokenStorageService } from './token-storage.service.js';
import { generateCodeVerifier, generateCodeChallenge } from './pkce-utils.js';
import { GoogleService, GoogleServiceRetryConfig } from '../base/google-service.js';
import { Logger, createServiceLogger } from '../../utils/logger.js';
import type { AuthInfo } from '../../types/index.js';
import {
  GoogleWorkspaceResult,
  GoogleAuthResult,
  googleOk,
  authOk,
  authErr,
  GoogleOAuth2Error,
  GoogleOAuth2UserDeniedError,
  GoogleOAuth2TokenStorageError,
  GoogleOAuth2RefreshTokenExpiredError,
  GoogleOAuth2NetworkError,
} from '../../errors/index.js';

export const DEFAULT_OAUTH_PORT = 3000;
export const DEFAULT_REDIRECT_URI = `http://localhost:${DEFAULT_OAUTH_PORT}/oauth2callback`;

export interface OAuth2ProviderOptions {
  tokenStorage?: TokenStorage;
  logger?: Logger;
  retryConfig?: GoogleServiceRetryConfig;
  /** Opens the consent page; defaults to the system browser */
  openBrowser?: (authUrl: string) => Promise<void>;
  /** How long to wait for the redirect (default: 5 minutes, 5 seconds under test) */
  callbackTimeoutMs?: number;
}

interface CallbackServer {
  /** `destroy` is attached by server-destroy */
  server: Server & { destroy?: () => void };
  redirectUri: string;
  result: Promise<CallbackResult>;
}

interface CallbackResult {
  code?: string;
  error?: string;
  state?: string;
}

interface AuthFlowState {
  state: string;
  codeVerifier: string;
  redirectUri: string;
  scopes: string[];
}

const CALLBACK_PAGES = {
  success:
    '<html><head><title>Authorization Successful</title></head><body><h1>Authorization Successful</h1><p>You can close this tab and return to the application.</p></body></html>',
  failure:
    '<html><head><title>Authorization Failed</title></head><body><h1>Authorization Failed</h1><p>You can close this tab and try again.</p></body></html>',
};

async function openInSystemBrowser(authUrl: string): Promise<void> {
  const { default: open } = await import('open');
  await open(authUrl);
}

export class OAuth2AuthProvider extends GoogleService implements AuthProvider {
  public readonly authType: AuthProviderType = 'oauth2';

  private readonly config: Required<OAuth2Config>;
  private readonly tokenStorage: TokenStorage;
  private readonly openBrowser?: (authUrl: string) => Promise<void>;
  private readonly callbackTimeoutMs: number;
  private oauth2Client?: OAuth2Client;
  private initializingPromise?: Promise<GoogleWorkspaceResult<void>>;
  private authFlowPromise?: Promise<OAuth2Client>;

  constructor(config: OAuth2Config, options: OAuth2ProviderOptions = {}) {
    const logger = options.logger ?? createServiceLogger('oauth2-auth');
    super(new OAuth2Client(), logger, options.retryConfig);

    this.config = OAuth2AuthProvider.validateConfig(config);
    this.tokenStorage = options.tokenStorage ?? new TokenStorageService(undefined, logger);
    this.openBrowser = options.openBrowser;
    this.callbackTimeoutMs =
      options.callbackTimeoutMs ?? (process.env.NODE_ENV === 'test' ? 5000 : 300000);
  }

  public getServiceName(): string {
    return 'OAuth2AuthProvider';
  }

  public getServiceVersion(): string {
    return 'v2';
  }

  /**
   * Build the OAuth2Client and load stored tokens. Concurrent calls share
   * one initialization.
   */
  public async initialize(): Promise<GoogleWorkspaceResult<void>> {
    if (this.oauth2Client) {
      return googleOk(undefined);
    }
    if (this.initializingPromise) {
      return this.initializingPromise;
    }

    this.initializingPromise = this.performInitialization();
    try {
      return await this.initializingPromise;
    } finally {
      this.initializingPromise = undefined;
    }
  }

  /**
   * Return a client with usable credentials, running the browser flow when
   * nothing is stored
   */
  public async getAuthClient(): Promise<GoogleAuthResult<OAuth2Client>> {
    const initResult = await this.initialize();
    if (initResult.isErr()) {
      return authErr(this.convertAuthError(initResult.error));
    }

    const validation = await this.validateAuth();
    if (validation.isErr()) {
      return authErr(validation.error);
    }
    if (validation.value && this.oauth2Client) {
      return authOk(this.oauth2Client);
    }

    try {
      return authOk(await this.performAuthFlow());
    } catch (error) {
      return authErr(this.convertAuthError(error));
    }
  }

  /**
   * Credentials are usable when an access token or a refresh token is held;
   * the client refreshes expired access tokens on its own.
   */
  public async validateAuth(): Promise<GoogleAuthResult<boolean>> {
    if (!this.oauth2Client) {
      return authOk(false);
    }
    const { access_token, refresh_token, expiry_date } = this.oauth2Client.credentials;
    if (refresh_token) {
      return authOk(true);
    }
    return authOk(!!access_token && (!expiry_date || expiry_date > Date.now()));
  }

  public async refreshToken(): Promise<GoogleAuthResult<void>> {
    const client = this.oauth2Client;
    const refreshToken = client?.credentials.refresh_token;
    if (!client || !refreshToken) {
      return authErr(
        new GoogleOAuth2RefreshTokenExpiredError({
          operation: 'refreshToken',
          clientId: this.config.clientId,
        })
      );
    }

    try {
      // dropping the access token makes the client fetch a new one
      client.setCredentials({ refresh_token: refreshToken });
      await client.getAccessToken();
      return authOk(undefined);
    } catch (error) {
      this.logger.error('Failed to refresh OAuth2 tokens', {
        service: this.getServiceName(),
        operation: 'refreshToken',
        error: error instanceof Error ? error.message : String(error),
      });
      return authErr(
        new GoogleOAuth2RefreshTokenExpiredError({
          operation: 'refreshToken',
          clientId: this.config.clientId,
          error: error instanceof Error ? error.message : String(error),
        })
      );
    }
  }

  public async getAuthInfo(): Promise<GoogleAuthResult<AuthInfo>> {
    const credentials: Credentials = this.oauth2Client?.credentials ?? {};
    const hasToken = !!credentials.access_token;

    return authOk({
      isAuthenticated: hasToken,
      keyFile: this.config.clientId,
      scopes: credentials.scope ? credentials.scope.split(' ') : this.config.scopes,
      tokenInfo: hasToken
        ? {
            hasToken,
            expiresAt: credentials.expiry_date ? new Date(credentials.expiry_date) : undefined,
          }
        : undefined,
    });
  }

  public async healthCheck(): Promise<GoogleWorkspaceResult<boolean>> {
    if (!this.oauth2Client) {
      return googleOk(false);
    }
    try {
      await this.tokenStorage.hasTokens();
      return googleOk(true);
    } catch (error) {
      this.logger.error('OAuth2AuthProvider health check failed', {
        service: this.getServiceName(),
        operation: 'healthCheck',
        error: error instanceof Error ? error.message : String(error),
      });
      return googleOk(false);
    }
  }

  private async performInitialization(): Promise<GoogleWorkspaceResult<void>> {
    const context = this.createContext('initialize', { clientId: this.config.clientId });

    return this.executeWithRetry(async () => {
      const client = new OAuth2Client({
        clientId: this.config.clientId,
        clientSecret: this.config.clientSecret,
        redirectUri: this.config.redirectUri,
      });

      client.on('tokens', tokens => {
        this.logger.debug('OAuth2 tokens updated', {
          service: this.getServiceName(),
          operation: 'tokenRefresh',
          hasRefreshToken: !!tokens.refresh_token,
        });
        this.saveCurrentTokens(client).catch(error => {
          this.logger.error('Failed to save refreshed tokens', {
            service: this.getServiceName(),
            operation: 'tokenRefresh',
            error: error instanceof Error ? error.message : String(error),
          });
        });
      });

      await this.loadStoredTokens(client);
      this.oauth2Client = client;
      this.auth = client;
    }, context);
  }

  private static validateConfig(config: OAuth2Config): Required<OAuth2Config> {
    if (!config.clientId) {
      throw new GoogleOAuth2Error('OAuth2Config: clientId is required', 'GOOGLE_OAUTH2_INVALID_CONFIG', 400);
    }
    if (!config.clientSecret) {
      throw new GoogleOAuth2Error('OAuth2Config: clientSecret is required', 'GOOGLE_OAUTH2_INVALID_CONFIG', 400);
    }
    if (config.scopes.length === 0) {
      throw new GoogleOAuth2Error(
        'OAuth2Config: scopes must be a non-empty array',
        'GOOGLE_OAUTH2_INVALID_CONFIG',
        400
      );
    }

    const port = config.port ?? DEFAULT_OAUTH_PORT;
    const redirectUri = config.redirectUri ?? `http://localhost:${port}/oauth2callback`;
    try {
      new URL(redirectUri);
    } catch {
      throw new GoogleOAuth2Error(
        'OAuth2Config: redirectUri must be a valid URL',
        'GOOGLE_OAUTH2_INVALID_CONFIG',
        400,
        { redirectUri }
      );
    }

    return { ...config, port, redirectUri };
  }

  private async loadStoredTokens(client: OAuth2Client): Promise<void> {
    const stored = await this.tokenStorage.getTokens();
    if (!stored) {
      return;
    }

    if (stored.clientConfig.clientId !== this.config.clientId) {
      this.logger.warn('Stored tokens are for a different client, ignoring', {
        service: this.getServiceName(),
        operation: 'loadStoredTokens',
        storedClientId: stored.clientConfig.clientId,
        currentClientId: this.config.clientId,
      });
      return;
    }

    client.setCredentials(stored.tokens);
    this.logger.info('Loaded stored OAuth2 tokens', {
      service: this.getServiceName(),
      operation: 'loadStoredTokens',
      hasRefreshToken: !!stored.tokens.refresh_token,
      storedAt: new Date(stored.storedAt).toISOString(),
    });
  }

  private async saveCurrentTokens(client: OAuth2Client): Promise<void> {
    if (!client.credentials.access_token) {
      return;
    }

    const credentials: OAuth2StoredCredentials = {
      tokens: client.credentials,
      clientConfig: { clientId: this.config.clientId, scopes: this.config.scopes },
      storedAt: Date.now(),
    };

    try {
      await this.tokenStorage.saveTokens(credentials);
    } catch (error) {
      throw error instanceof GoogleOAuth2TokenStorageError
        ? error
        : new GoogleOAuth2TokenStorageError('save', error instanceof Error ? error : new Error(String(error)), {
            clientId: this.config.clientId,
          });
    }
  }

  private async performAuthFlow(): Promise<OAuth2Client> {
    if (!this.authFlowPromise) {
      this.authFlowPromise = this.executeAuthFlow().finally(() => {
        this.authFlowPromise = undefined;
      });
    }
    return this.authFlowPromise;
  }

  private async executeAuthFlow(): Promise<OAuth2Client> {
    const client = this.oauth2Client;
    if (!client) {
      throw new GoogleOAuth2Error('OAuth2Client not initialized', 'OAUTH2_CLIENT_NOT_INITIALIZED', 500, {
        operation: 'executeAuthFlow',
      });
    }

    const codeVerifier = generateCodeVerifier();
    if (codeVerifier.isErr()) {
      throw codeVerifier.error;
    }
    const codeChallenge = generateCodeChallenge(codeVerifier.value);
    if (codeChallenge.isErr()) {
      throw codeChallenge.error;
    }

    const callbackServer = await this.startCallbackServer();
    try {
      const flow: AuthFlowState = {
        state: randomBytes(32).toString('hex'),
        codeVerifier: codeVerifier.value,
        redirectUri: callbackServer.redirectUri,
        scopes: this.config.scopes,
      };

      const authUrl = client.generateAuthUrl({
        access_type: 'offline',
        scope: flow.scopes,
        state: flow.state,
        prompt: 'consent',
        redirect_uri: flow.redirectUri,
        code_challenge: codeChallenge.value,
        code_challenge_method: CodeChallengeMethod.S256,
      });

      this.logger.info('Starting OAuth2 authorization flow with PKCE', {
        service: this.getServiceName(),
        operation: 'executeAuthFlow',
        redirectUri: flow.redirectUri,
        scopes: flow.scopes,
      });

      await this.openForConsent(authUrl);
      const code = await this.waitForAuthCallback(callbackServer, flow);

      const { tokens } = await client.getToken({
        code,
        codeVerifier: flow.codeVerifier,
        redirect_uri: flow.redirectUri,
      });
      client.setCredentials(tokens);
      await this.saveCurrentTokens(client);

      this.logger.info('OAuth2 authorization flow completed', {
        service: this.getServiceName(),
        operation: 'executeAuthFlow',
        hasRefreshToken: !!tokens.refresh_token,
      });
      return client;
    } finally {
      callbackServer.server.destroy?.();
    }
  }

  /**
   * Listen on the redirect port. Port 0 picks a free port.
   */
  private startCallbackServer(): Promise<CallbackServer> {
    const redirect = new URL(this.config.redirectUri);
    const callbackPath = redirect.pathname;
    const listenPort = redirect.port !== '' ? Number(redirect.port) : this.config.port;
    let settle: (result: CallbackResult) => void = () => {};
    const result = new Promise<CallbackResult>(resolve => {
      settle = resolve;
    });

    const server = createServer((req, res) => {
      const url = new URL(req.url ?? '/', 'http://localhost');
      if (url.pathname !== callbackPath) {
        res.writeHead(404);
        res.end('Not Found');
        return;
      }

      const callback: CallbackResult = {
        code: url.searchParams.get('code') ?? undefined,
        error: url.searchParams.get('error') ?? undefined,
        state: url.searchParams.get('state') ?? undefined,
      };
      const succeeded = !!callback.code && !callback.error;
      res.writeHead(succeeded ? 200 : 400, { 'Content-Type': 'text/html' });
      res.end(succeeded ? CALLBACK_PAGES.success : CALLBACK_PAGES.failure);
      settle(callback);
    });
    enableDestroy(server);

    return new Promise((resolve, reject) => {
      server.once('error', error => {
        reject(
          new GoogleOAuth2NetworkError(`Failed to start callback server on port ${listenPort}`, error, {
            port: listenPort,
            operation: 'startCallbackServer',
          })
        );
      });

      server.listen(listenPort, redirect.hostname, () => {
        const address = server.address();
        redirect.port = String(address !== null && typeof address === 'object' ? address.port : listenPort);
        resolve({ server, redirectUri: redirect.toString(), result });
      });
    });
  }

  private async openForConsent(authUrl: string): Promise<void> {
    if (this.openBrowser) {
      await this.openBrowser(authUrl);
      return;
    }
    if (process.env.NODE_ENV === 'test') {
      return;
    }

    try {
      await openInSystemBrowser(authUrl);
    } catch (error) {
      this.logger.warn('Failed to open browser automatically', {
        service: this.getServiceName(),
        operation: 'openForConsent',
        error: error instanceof Error ? error.message : String(error),
      });
      console.error(`Please go to this URL and finish the authentication flow: ${authUrl}`);
    }
  }

  private waitForAuthCallback(callbackServer: CallbackServer, flow: AuthFlowState): Promise<string> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () =>
          reject(
            new GoogleOAuth2NetworkError(`Authorization timeout after ${this.callbackTimeoutMs}ms`, undefined, {
              operation: 'waitForAuthCallback',
              timeoutMs: this.callbackTimeoutMs,
            })
          ),
        this.callbackTimeoutMs
      );
    });

    const code = callbackServer.result.then(callback => {
      if (callback.error === 'access_denied') {
        throw new GoogleOAuth2UserDeniedError({
          operation: 'waitForAuthCallback',
          redirectUri: flow.redirectUri,
          scopes: flow.scopes,
        });
      }
      if (callback.error || !callback.code) {
        throw new GoogleOAuth2NetworkError(`Authorization error: ${callback.error ?? 'no code received'}`, undefined, {
          operation: 'waitForAuthCallback',
        });
      }
      if (callback.state !== flow.state) {
        throw new GoogleOAuth2NetworkError('State parameter mismatch - possible CSRF attack', undefined, {
          operation: 'waitForAuthCallback',
        });
      }
      return callback.code;
    });

    return Promise.race([code, timeout]).finally(() => clearTimeout(timer));
  }

  private convertAuthError(error: unknown): GoogleOAuth2Error {
    if (error instanceof GoogleOAuth2Error) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    const cause = error instanceof Error ? error : new Error(message);

    if (message.includes('invalid_grant') || message.includes('refresh token')) {
      return new GoogleOAuth2RefreshTokenExpiredError({ operation: 'convertAuthError', originalError: message });
    }
    if (message.includes('access_denied')) {
      return new GoogleOAuth2UserDeniedError({ operation: 'convertAuthError' });
    }
    if (message.includes('ECONNREFUSED') || message.includes('network') || message.includes('timeout')) {
      return new GoogleOAuth2NetworkError(message, cause, { operation: 'convertAuthError' });
    }
    return new GoogleOAuth2Error(message, 'GOOGLE_OAUTH2_ERROR', 401, { operation: 'convertAuthError' }, cause);
  }
}
