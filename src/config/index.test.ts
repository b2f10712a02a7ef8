/**
 * @fileoverview Environment configuration loading and validation.
 */

import { loadConfig, GOOGLE_SCOPES } from './index.js';

describe('Config Loading', () => {
  let originalEnv: NodeJS.ProcessEnv;

  beforeEach(() => {
    originalEnv = { ...process.env };
    Object.keys(process.env).forEach(key => {
      if (key.startsWith('GOOGLE_')) {
        delete process.env[key];
      }
    });
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it('accepts an empty environment', () => {
    const config = loadConfig();

    expect(config.GOOGLE_AUTH_MODE).toBeUndefined();
    expect(config.GOOGLE_SERVICE_ACCOUNT_KEY_PATH).toBeUndefined();
    expect(config.GOOGLE_SHEETS_DEFAULT_PARSE).toBeUndefined();
  });

  describe('Service Account Configuration', () => {
    it('should validate service account configuration', () => {
      process.env.GOOGLE_AUTH_MODE = 'service-account';
      process.env.GOOGLE_SERVICE_ACCOUNT_KEY_PATH = '/path/to/service-account.json';

      const config = loadConfig();

      expect(config.GOOGLE_AUTH_MODE).toBe('service-account');
      expect(config.GOOGLE_SERVICE_ACCOUNT_KEY_PATH).toBe('/path/to/service-account.json');
    });

    it('should throw when the key path is missing for service-account mode', () => {
      process.env.GOOGLE_AUTH_MODE = 'service-account';

      expect(() => loadConfig()).toThrow(
        'GOOGLE_SERVICE_ACCOUNT_KEY_PATH is required when GOOGLE_AUTH_MODE is "service-account"'
      );
    });
  });

  describe('OAuth2 Configuration', () => {
    it('accepts a client secret file in oauth2 mode', () => {
      process.env.GOOGLE_AUTH_MODE = 'oauth2';
      process.env.GOOGLE_OAUTH_CLIENT_SECRET_PATH = './client_secret.json';
      process.env.GOOGLE_CREDENTIALS_DIRECTORY = 'global';

      const config = loadConfig();

      expect(config.GOOGLE_OAUTH_CLIENT_SECRET_PATH).toBe('./client_secret.json');
      expect(config.GOOGLE_CREDENTIALS_DIRECTORY).toBe('global');
    });

    it('accepts client id and secret with scopes and port', () => {
      process.env.GOOGLE_OAUTH_CLIENT_ID = 'test-client-id';
      process.env.GOOGLE_OAUTH_CLIENT_SECRET = 'test-secret';
      process.env.GOOGLE_OAUTH_SCOPES = 'scope-a, scope-b';
      process.env.GOOGLE_OAUTH_PORT = '8080';

      const config = loadConfig();

      expect(config.GOOGLE_OAUTH_SCOPES).toEqual(['scope-a', 'scope-b']);
      expect(config.GOOGLE_OAUTH_PORT).toBe(8080);
    });

    it('requires credentials in oauth2 mode', () => {
      process.env.GOOGLE_AUTH_MODE = 'oauth2';
      expect(() => loadConfig()).toThrow(
        'GOOGLE_OAUTH_CLIENT_SECRET_PATH or both GOOGLE_OAUTH_CLIENT_ID and GOOGLE_OAUTH_CLIENT_SECRET are required when GOOGLE_AUTH_MODE is "oauth2"'
      );
    });

    it('requires the client id with a secret', () => {
      process.env.GOOGLE_OAUTH_CLIENT_SECRET = 'test-secret';
      expect(() => loadConfig()).toThrow('GOOGLE_OAUTH_CLIENT_SECRET requires GOOGLE_OAUTH_CLIENT_ID');
    });

    it('rejects an out of range port', () => {
      process.env.GOOGLE_OAUTH_PORT = '70000';
      expect(() => loadConfig()).toThrow('GOOGLE_OAUTH_PORT must be a valid port number (1-65535)');
    });

    it('rejects an unknown auth mode', () => {
      process.env.GOOGLE_AUTH_MODE = 'api-key';
      expect(() => loadConfig()).toThrow('Configuration validation failed');
    });
  });

  describe('Retry and timeout configuration', () => {
    it('parses retry settings', () => {
      process.env.GOOGLE_RETRY_MAX_ATTEMPTS = '5';
      process.env.GOOGLE_RETRY_BASE_DELAY = '200';
      process.env.GOOGLE_RETRY_MAX_DELAY = '4000';
      process.env.GOOGLE_RETRY_JITTER = '0.25';
      process.env.GOOGLE_RETRY_RETRIABLE_CODES = '429, 503';

      const config = loadConfig();

      expect(config.GOOGLE_RETRY_MAX_ATTEMPTS).toBe(5);
      expect(config.GOOGLE_RETRY_BASE_DELAY).toBe(200);
      expect(config.GOOGLE_RETRY_MAX_DELAY).toBe(4000);
      expect(config.GOOGLE_RETRY_JITTER).toBe(0.25);
      expect(config.GOOGLE_RETRY_RETRIABLE_CODES).toEqual([429, 503]);
    });

    it('rejects a non numeric value', () => {
      process.env.GOOGLE_RETRY_MAX_ATTEMPTS = 'many';
      expect(() => loadConfig()).toThrow('GOOGLE_RETRY_MAX_ATTEMPTS must be a valid integer, got: many');
    });

    it('rejects jitter above one', () => {
      process.env.GOOGLE_RETRY_JITTER = '1.5';
      expect(() => loadConfig()).toThrow('GOOGLE_RETRY_JITTER must be a number between 0 and 1');
    });

    it('rejects a max delay below the base delay', () => {
      process.env.GOOGLE_RETRY_BASE_DELAY = '500';
      process.env.GOOGLE_RETRY_MAX_DELAY = '100';
      expect(() => loadConfig()).toThrow(
        'GOOGLE_RETRY_MAX_DELAY must be greater than or equal to GOOGLE_RETRY_BASE_DELAY'
      );
    });

    it('rejects a total timeout below the request timeout', () => {
      process.env.GOOGLE_REQUEST_TIMEOUT = '5000';
      process.env.GOOGLE_TOTAL_TIMEOUT = '1000';
      expect(() => loadConfig()).toThrow(
        'GOOGLE_TOTAL_TIMEOUT must be greater than or equal to GOOGLE_REQUEST_TIMEOUT'
      );
    });
  });

  it('parses the default parse flag', () => {
    expect(loadConfig({ GOOGLE_SHEETS_DEFAULT_PARSE: '0' }).GOOGLE_SHEETS_DEFAULT_PARSE).toBe(false);
    expect(() => loadConfig({ GOOGLE_SHEETS_DEFAULT_PARSE: 'yes' })).toThrow(
      "GOOGLE_SHEETS_DEFAULT_PARSE must be 'true', 'false', '1', or '0', got: yes"
    );
  });

  it('exposes spreadsheet and drive scopes', () => {
    expect(GOOGLE_SCOPES).toEqual([
      'https://www.googleapis.com/auth/spreadsheets',
      'https://www.googleapis.com/auth/drive',
    ]);
  });
});
