import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { parseClientSecret, readClientSecret } from './client-secret.js';
import { GoogleAuthInvalidCredentialsError, GoogleAuthMissingCredentialsError } from '../../errors/index.js';

describe('parseClientSecret', () => {
  it('reads desktop client files', () => {
    const raw = JSON.stringify({
      installed: {
        client_id: 'test-client-id',
        client_secret: 'test-secret',
        redirect_uris: ['http://localhost'],
      },
    });

    expect(parseClientSecret(raw)).toEqual({
      clientId: 'test-client-id',
      clientSecret: 'test-secret',
      redirectUris: ['http://localhost'],
    });
  });

  it('reads web client files', () => {
    const raw = JSON.stringify({ web: { client_id: 'web-id', client_secret: 'test-secret' } });
    expect(parseClientSecret(raw)).toEqual({
      clientId: 'web-id',
      clientSecret: 'test-secret',
      redirectUris: [],
    });
  });

  it('rejects files without a client entry', () => {
    expect(() => parseClientSecret(JSON.stringify({ other: {} }))).toThrow(GoogleAuthInvalidCredentialsError);
    expect(() => parseClientSecret('nope')).toThrow(GoogleAuthInvalidCredentialsError);
  });
});

describe('readClientSecret', () => {
  it('reports a missing file as missing credentials', async () => {
    await expect(readClientSecret(join(tmpdir(), 'does-not-exist-client-secret.json'))).rejects.toBeInstanceOf(
      GoogleAuthMissingCredentialsError
    );
  });

  it('reads a file from disk', async () => {
    const directory = await fs.mkdtemp(join(tmpdir(), 'client-secret-'));
    const filePath = join(directory, 'client_secret.json');
    await fs.writeFile(filePath, JSON.stringify({ installed: { client_id: 'id', client_secret: 'test-secret' } }));

    try {
      expect((await readClientSecret(filePath)).clientId).toBe('id');
    } finally {
      await fs.rm(directory, { recursive: true, force: true });
    }
  });
});
