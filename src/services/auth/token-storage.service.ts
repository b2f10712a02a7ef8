/**
 * @fileoverview File-based OAuth2 token persistence.
 *
 * Tokens live in a JSON file inside the credentials directory, written with
 * owner-only permissions (600). An unreadable file is moved aside and treated
 * as missing, so the next authorization starts a fresh flow.
 */

import { promises as fs } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import type { TokenStorage, OAuth2StoredCredentials } from './types.js';
import { GoogleOAuth2TokenStorageError } from '../../errors/index.js';
import { Logger, createServiceLogger } from '../../utils/logger.js';

export const TOKEN_FILE_NAME = 'sheets.googleapis.com-token.json';

const storedCredentialsSchema = z.object({
  tokens: z.object({
    access_token: z.string().nullish(),
    refresh_token: z.string().nullish(),
    id_token: z.string().nullish(),
    expiry_date: z.number().nullish(),
    token_type: z.string().nullish(),
    scope: z.string().optional(),
  }),
  clientConfig: z.object({
    clientId: z.string(),
    scopes: z.array(z.string()),
  }),
  storedAt: z.number(),
});

/**
 * Resolve where the token file goes.
 *
 * - unset or empty: the working directory
 * - `'global'`: `~/.credentials`
 * - anything else: used as given
 */
export function resolveCredentialsDirectory(directory?: string): string {
  if (!directory) {
    return process.cwd();
  }
  if (directory === 'global') {
    return join(homedir(), '.credentials');
  }
  return directory;
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class TokenStorageService implements TokenStorage {
  public readonly directory: string;
  public readonly filePath: string;
  private readonly logger: Logger;

  constructor(credentialsDirectory?: string, logger?: Logger) {
    this.directory = resolveCredentialsDirectory(credentialsDirectory);
    this.filePath = join(this.directory, TOKEN_FILE_NAME);
    this.logger = logger ?? createServiceLogger('token-storage');
  }

  public async saveTokens(credentials: OAuth2StoredCredentials): Promise<void> {
    try {
      await fs.mkdir(this.directory, { recursive: true, mode: 0o700 });
      const temporaryPath = `${this.filePath}.tmp`;
      await fs.writeFile(temporaryPath, JSON.stringify(credentials, null, 2), {
        encoding: 'utf8',
        mode: 0o600,
      });
      await fs.rename(temporaryPath, this.filePath);

      this.logger.debug('Saved OAuth2 tokens', {
        operation: 'saveTokens',
        filePath: this.filePath,
      });
    } catch (error) {
      throw new GoogleOAuth2TokenStorageError(
        'save',
        error instanceof Error ? error : new Error(String(error)),
        { filePath: this.filePath }
      );
    }
  }

  public async getTokens(): Promise<OAuth2StoredCredentials | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFileError(error)) {
        return null;
      }
      throw new GoogleOAuth2TokenStorageError(
        'load',
        error instanceof Error ? error : new Error(String(error)),
        { filePath: this.filePath }
      );
    }

    const parsed = this.parse(raw);
    if (parsed) {
      return parsed;
    }

    await this.quarantine();
    return null;
  }

  public async deleteTokens(): Promise<void> {
    try {
      await fs.unlink(this.filePath);
    } catch (error) {
      if (isMissingFileError(error)) {
        return;
      }
      throw new GoogleOAuth2TokenStorageError(
        'delete',
        error instanceof Error ? error : new Error(String(error)),
        { filePath: this.filePath }
      );
    }
  }

  public async hasTokens(): Promise<boolean> {
    return (await this.getTokens()) !== null;
  }

  private parse(raw: string): OAuth2StoredCredentials | null {
    try {
      const result = storedCredentialsSchema.safeParse(JSON.parse(raw));
      return result.success ? result.data : null;
    } catch {
      // not JSON
      return null;
    }
  }

  private async quarantine(): Promise<void> {
    const backupPath = `${this.filePath}.corrupt-${Date.now()}`;
    this.logger.warn('Token file is corrupted, moving it aside', {
      operation: 'getTokens',
      filePath: this.filePath,
      backupPath,
    });
    try {
      await fs.rename(this.filePath, backupPath);
    } catch (error) {
      throw new GoogleOAuth2TokenStorageError(
        'load',
        error instanceof Error ? error : new Error(String(error)),
        { filePath: this.filePath, backupPath }
      );
    }
  }
}
