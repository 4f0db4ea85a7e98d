import { randomBytes } from 'node:crypto';

/**
 * Generate the anti-CSRF state token for one sign-in attempt (256 bits, base64url)
 */
export function generateState(): string {
  return randomBytes(32).toString('base64url');
}
