/**
 * Unit tests for PKCE (Proof Key for Code Exchange) generation
 */

import assert from 'assert';
import { createHash } from 'node:crypto';
import { deriveCodeChallenge, generatePkce } from '../../../src/auth/pkce.ts';

describe('unit/auth/pkce', () => {
  describe('generatePkce', () => {
    it('should generate valid PKCE parameters', () => {
      const pkce = generatePkce();

      assert.ok(pkce.codeVerifier, 'Should have code verifier');
      assert.ok(pkce.codeChallenge, 'Should have code challenge');
      assert.strictEqual(pkce.codeChallengeMethod, 'S256', 'Should use S256 method');
    });

    it('should generate code verifier with correct length', () => {
      const pkce = generatePkce();

      // RFC 7636 § 4.1: code verifier must be 43-128 characters
      assert.strictEqual(pkce.codeVerifier.length, 43);
    });

    it('should generate URL-safe strings without padding', () => {
      const pkce = generatePkce();

      // RFC 7636: unreserved characters [A-Z] / [a-z] / [0-9] / "-" / "." / "_" / "~"
      const urlSafePattern = /^[A-Za-z0-9\-._~]+$/;

      assert.ok(urlSafePattern.test(pkce.codeVerifier), 'Code verifier should be URL-safe');
      assert.ok(urlSafePattern.test(pkce.codeChallenge), 'Code challenge should be URL-safe');
      assert.ok(!pkce.codeChallenge.includes('='), 'Code challenge should not be padded');
    });

    it('should generate unique values on each call', () => {
      const pkce1 = generatePkce();
      const pkce2 = generatePkce();

      assert.notStrictEqual(pkce1.codeVerifier, pkce2.codeVerifier, 'Code verifiers should be different');
      assert.notStrictEqual(pkce1.codeChallenge, pkce2.codeChallenge, 'Code challenges should be different');
    });

    it('should re-derive exactly the generated challenge from the verifier', () => {
      for (let i = 0; i < 25; i++) {
        const pkce = generatePkce();
        const expected = createHash('sha256').update(pkce.codeVerifier, 'ascii').digest('base64url');

        assert.strictEqual(deriveCodeChallenge(pkce.codeVerifier), pkce.codeChallenge);
        assert.strictEqual(pkce.codeChallenge, expected);
      }
    });
  });

  describe('deriveCodeChallenge', () => {
    it('should match the RFC 7636 Appendix B example', () => {
      assert.strictEqual(deriveCodeChallenge('dBjftJeZ4CVP-mB92K27uhbUJU1p1r_wW1gFWFOEjXk'), 'E9Melhoa2OwvFrEMTJguCHaoeK1t8URWbuGJSstw-cM');
    });
  });
});
