import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { OAuth2Client } from 'google-auth-library';
import { AuthService } from '../../src/services/auth.service';
import { GoogleAuthMissingCredentialsError } from '../../src/errors/index';
import { NO_RETRY_CONFIG } from '../../src/test-config';

describe('AuthService', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await fs.mkdtemp(join(tmpdir(), 'auth-service-'));
  });

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  it('hands out custom credentials unchanged', async () => {
    const client = new OAuth2Client();
    client.setCredentials({ access_token: 'test-access' });
    const service = new AuthService({ customCredentials: client });

    expect((await service.getAuthClient())._unsafeUnwrap()).toBe(client);
    expect(service.authType).toBe('custom');
    expect((await service.validateAuth())._unsafeUnwrap()).toBe(true);
    expect((await service.healthCheck())._unsafeUnwrap()).toBe(true);
  });

  it('authenticates with a service account key', async () => {
    const keyFile = join(directory, 'key.json');
    await fs.writeFile(
      keyFile,
      JSON.stringify({
        type: 'service_account',
        client_email: 'robot@example.iam.gserviceaccount.com',
        private_key: 'test-private-key',
      })
    );
    const service = new AuthService({ serviceAccountFile: keyFile, retryConfig: NO_RETRY_CONFIG });

    expect((await service.initialize()).isOk()).toBe(true);
    expect(service.authType).toBe('service-account');
    expect((await service.getAuthInfo())._unsafeUnwrap().keyFile).toBe(keyFile);
  });

  it('reports a missing key file', async () => {
    const service = new AuthService({
      serviceAccountFile: join(directory, 'missing.json'),
      retryConfig: NO_RETRY_CONFIG,
    });

    const error = (await service.getAuthClient())._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(GoogleAuthMissingCredentialsError);
    expect((await service.validateAuth())._unsafeUnwrap()).toBe(false);
    expect((await service.healthCheck())._unsafeUnwrap()).toBe(false);
  });

  it('reports a missing client secret file', async () => {
    const service = new AuthService({ clientSecret: join(directory, 'client_secret.json') });

    const error = (await service.initialize())._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(GoogleAuthMissingCredentialsError);
    expect(service.authType).toBeUndefined();
  });
});
