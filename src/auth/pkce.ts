/**
 * PKCE (Proof Key for Code Exchange) utilities
 * Implements RFC 7636 for the desktop authorization code flow
 */

import { createHash, randomBytes } from 'node:crypto';
import type { PkceParams } from './types.ts';

/**
 * Generate random code verifier for PKCE (RFC 7636 Section 4.1)
 * 32 random bytes -> 43 base64url characters, all within the unreserved set
 */
function generateRandomCodeVerifier(): string {
  return randomBytes(32).toString('base64url');
}

/**
 * Calculate PKCE code challenge from code verifier (RFC 7636 Section 4.2)
 * S256: BASE64URL(SHA256(ASCII(code_verifier))), no padding
 */
export function deriveCodeChallenge(codeVerifier: string): string {
  return createHash('sha256').update(codeVerifier, 'ascii').digest('base64url');
}

/**
 * Generate PKCE parameters for one sign-in attempt
 *
 * @example
 * const pkce = generatePkce();
 * // pkce.codeChallenge goes into the authorization URL,
 * // pkce.codeVerifier into the token exchange of the same attempt
 */
export function generatePkce(): PkceParams {
  const codeVerifier = generateRandomCodeVerifier();

  return {
    codeVerifier,
    codeChallenge: deriveCodeChallenge(codeVerifier),
    codeChallengeMethod: 'S256',
  };
}
