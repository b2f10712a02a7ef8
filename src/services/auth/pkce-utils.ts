/**
 * @fileoverview PKCE (RFC 7636) helpers for the OAuth2 loopback flow.
 */

import { randomBytes, createHash } from 'crypto';
import { GoogleAuthResult, authOk, authErr, GoogleOAuth2Error } from '../../errors/index.js';

/**
 * base64url (RFC 4648 section 5), no padding
 */
const toBase64Url = (buffer: Buffer): string =>
  buffer.toString('base64').replace(/\+/g, '-').replace(/\//g, '_').replace(/=/g, '');

/**
 * 43-character verifier from 32 random bytes
 */
export function generateCodeVerifier(): GoogleAuthResult<string> {
  try {
    return authOk(toBase64Url(randomBytes(32)));
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown crypto error';
    return authErr(
      new GoogleOAuth2Error(
        `Failed to generate PKCE code verifier: ${message}`,
        'GOOGLE_OAUTH2_PKCE_VERIFIER_GENERATION_ERROR',
        500,
        { operation: 'generateCodeVerifier' },
        error instanceof Error ? error : undefined
      )
    );
  }
}

/**
 * S256 challenge: base64url(sha256(ascii(verifier)))
 */
export function generateCodeChallenge(verifier: string): GoogleAuthResult<string> {
  if (!verifier) {
    return authErr(
      new GoogleOAuth2Error(
        'Code verifier must be a non-empty string',
        'GOOGLE_OAUTH2_PKCE_INVALID_VERIFIER',
        400,
        { operation: 'generateCodeChallenge' }
      )
    );
  }

  if (!/^[A-Za-z0-9._~-]+$/.test(verifier)) {
    return authErr(
      new GoogleOAuth2Error(
        'Code verifier contains invalid characters',
        'GOOGLE_OAUTH2_PKCE_INVALID_VERIFIER_FORMAT',
        400,
        { operation: 'generateCodeChallenge', verifierLength: verifier.length }
      )
    );
  }

  const hash = createHash('sha256').update(verifier, 'ascii').digest();
  return authOk(toBase64Url(hash));
}
