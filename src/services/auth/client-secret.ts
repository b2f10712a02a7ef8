/**
 * @fileoverview Reads the OAuth2 client secret file downloaded from the
 * Cloud console. Desktop clients store their settings under `installed`,
 * web clients under `web`.
 */

import { promises as fs } from 'fs';
import { z } from 'zod';
import { GoogleAuthMissingCredentialsError, GoogleAuthInvalidCredentialsError } from '../../errors/index.js';

const clientEntrySchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  redirect_uris: z.array(z.string()).optional(),
});

const clientSecretFileSchema = z.union([
  z.object({ installed: clientEntrySchema }).transform(file => file.installed),
  z.object({ web: clientEntrySchema }).transform(file => file.web),
]);

export interface ClientSecret {
  clientId: string;
  clientSecret: string;
  redirectUris: string[];
}

export function parseClientSecret(raw: string, filePath = '<inline>'): ClientSecret {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new GoogleAuthInvalidCredentialsError('oauth2', {
      filePath,
      reason: 'Client secret file is not valid JSON',
      error: error instanceof Error ? error.message : String(error),
    });
  }

  const parsed = clientSecretFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new GoogleAuthInvalidCredentialsError('oauth2', {
      filePath,
      reason: "Client secret file needs an 'installed' or 'web' entry with client_id and client_secret",
    });
  }

  return {
    clientId: parsed.data.client_id,
    clientSecret: parsed.data.client_secret,
    redirectUris: parsed.data.redirect_uris ?? [],
  };
}

export async function readClientSecret(filePath: string): Promise<ClientSecret> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new GoogleAuthMissingCredentialsError('oauth2', {
      filePath,
      error: error instanceof Error ? error.message : String(error),
    });
  }
  return parseClientSecret(raw, filePath);
}
