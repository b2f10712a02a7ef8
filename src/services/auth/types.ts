/**
 * @fileoverview OAuth2 authentication type definitions.
 */

/**
 * OAuth2 client settings, read from a client secret file or the environment
 */
export interface OAuth2Config {
  readonly clientId: string;
  readonly clientSecret: string;
  /** Loopback redirect (default: http://localhost:3000/oauth2callback) */
  readonly redirectUri?: string;
  readonly scopes: string[];
  /** Port for the local callback server (default: 3000) */
  readonly port?: number;
}

/**
 * OAuth2 token as returned by the token endpoint
 */
export interface OAuth2Token {
  readonly access_token?: string | null;
  readonly refresh_token?: string | null;
  readonly id_token?: string | null;
  /** Milliseconds since epoch */
  readonly expiry_date?: number | null;
  readonly token_type?: string | null;
  readonly scope?: string;
}

/**
 * Token file contents
 */
export interface OAuth2StoredCredentials {
  readonly tokens: OAuth2Token;
  readonly clientConfig: Pick<OAuth2Config, 'clientId' | 'scopes'>;
  /** Timestamp when tokens were stored */
  readonly storedAt: number;
}

/**
 * Persistence for OAuth2 credentials
 */
export interface TokenStorage {
  saveTokens(credentials: OAuth2StoredCredentials): Promise<void>;
  /** Resolves to null when nothing is stored */
  getTokens(): Promise<OAuth2StoredCredentials | null>;
  deleteTokens(): Promise<void>;
  hasTokens(): Promise<boolean>;
}
