import { generateCodeVerifier, generateCodeChallenge } from './pkce-utils.js';
import { GoogleOAuth2Error } from '../../errors/index.js';

describe('PKCE Utils', () => {
  describe('generateCodeVerifier', () => {
    it('generates a 43-character base64url verifier', () => {
      const verifier = generateCodeVerifier()._unsafeUnwrap();
      expect(verifier).toHaveLength(43);
      expect(verifier).toMatch(/^[A-Za-z0-9_-]+$/);
    });

    it('generates a new verifier on every call', () => {
      expect(generateCodeVerifier()._unsafeUnwrap()).not.toBe(generateCodeVerifier()._unsafeUnwrap());
    });
  });

  describe('generateCodeChallenge', () => {
    it('matches the RFC 7636 appendix B example', () => {
      const result = generateCodeChallenge('dBjftJeZ4CVP-mJ92K27uhbUJU1p1r_wW1gFWFOEjXk');
      expect(result._unsafeUnwrap()).toBe('E9Melhoa2OwvFrEMTJguCHaoeK1t8URWbuGJSstw-cM');
    });

    it('rejects an empty verifier', () => {
      const error = generateCodeChallenge('')._unsafeUnwrapErr();
      expect(error).toBeInstanceOf(GoogleOAuth2Error);
      expect(error.code).toBe('GOOGLE_OAUTH2_PKCE_INVALID_VERIFIER');
    });

    it('rejects characters outside the unreserved set', () => {
      const error = generateCodeChallenge('abc+def/')._unsafeUnwrapErr();
      expect(error.code).toBe('GOOGLE_OAUTH2_PKCE_INVALID_VERIFIER_FORMAT');
      expect(error.statusCode).toBe(400);
    });
  });
});
