import { promises as fs } from 'fs';
import { homedir, tmpdir } from 'os';
import { join } from 'path';
import {
  TokenStorageService,
  TOKEN_FILE_NAME,
  resolveCredentialsDirectory,
} from './token-storage.service.js';
import type { OAuth2StoredCredentials } from './types.js';

const credentials: OAuth2StoredCredentials = {
  tokens: {
    access_token: 'test-access-token',
    refresh_token: 'test-refresh-token',
    expiry_date: 1700000000000,
    token_type: 'Bearer',
  },
  clientConfig: { clientId: 'test-client-id', scopes: ['scope-a'] },
  storedAt: 1690000000000,
};

describe('resolveCredentialsDirectory', () => {
  it('defaults to the working directory', () => {
    expect(resolveCredentialsDirectory()).toBe(process.cwd());
    expect(resolveCredentialsDirectory('')).toBe(process.cwd());
  });

  it('maps global to ~/.credentials', () => {
    expect(resolveCredentialsDirectory('global')).toBe(join(homedir(), '.credentials'));
  });

  it('keeps explicit directories', () => {
    expect(resolveCredentialsDirectory('/srv/tokens')).toBe('/srv/tokens');
  });
});

describe('TokenStorageService', () => {
  let directory: string;
  let storage: TokenStorageService;

  beforeEach(async () => {
    directory = await fs.mkdtemp(join(tmpdir(), 'token-storage-'));
    storage = new TokenStorageService(join(directory, 'nested'));
  });

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  it('returns null when nothing is stored', async () => {
    expect(await storage.getTokens()).toBeNull();
    expect(await storage.hasTokens()).toBe(false);
  });

  it('round-trips credentials through the token file', async () => {
    await storage.saveTokens(credentials);

    expect(storage.filePath).toBe(join(directory, 'nested', TOKEN_FILE_NAME));
    expect(await storage.getTokens()).toEqual(credentials);
    expect(await storage.hasTokens()).toBe(true);
  });

  it('writes the file readable by the owner only', async () => {
    await storage.saveTokens(credentials);
    const stats = await fs.stat(storage.filePath);
    expect(stats.mode & 0o777).toBe(0o600);
  });

  it('moves a corrupted file aside', async () => {
    await fs.mkdir(storage.directory, { recursive: true });
    await fs.writeFile(storage.filePath, '{ not json');

    expect(await storage.getTokens()).toBeNull();

    const files = await fs.readdir(storage.directory);
    expect(files).toHaveLength(1);
    expect(files[0]).toMatch(/^sheets\.googleapis\.com-token\.json\.corrupt-\d+$/);
  });

  it('deletes tokens and tolerates a missing file', async () => {
    await storage.saveTokens(credentials);
    await storage.deleteTokens();
    await storage.deleteTokens();

    expect(await storage.getTokens()).toBeNull();
  });
});
