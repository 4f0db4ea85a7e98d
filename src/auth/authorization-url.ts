/**
 * Authorization URL construction for the desktop authorization code flow
 */

import { OPENID_SCOPE } from './constants.ts';
import type { NormalizedSignInConfig, PkceParams } from './types.ts';

/**
 * Deduplicate scopes in request order and make sure `openid` is requested when an ID token is wanted
 *
 * @example
 * normalizeScopes(['email', 'profile', 'email'], true) // → ['openid', 'email', 'profile']
 * normalizeScopes(['email'], false) // → ['email']
 */
export function normalizeScopes(scopes: readonly string[], requestIdToken: boolean): string[] {
  const unique = [...new Set(scopes)];
  if (requestIdToken && !unique.includes(OPENID_SCOPE)) {
    unique.unshift(OPENID_SCOPE);
  }
  return unique;
}

/**
 * Build the URL the user is sent to
 *
 * Requests offline access with forced consent so the provider issues a refresh token on every
 * sign-in, not only the first. `redirectUri` must be the exact string later sent to the token endpoint.
 *
 * @param authorizationEndpoint - Provider authorization endpoint (existing query parameters are kept)
 * @param config - Normalized sign-in configuration
 * @param redirectUri - Loopback redirect URI of the running listener
 * @param state - Anti-CSRF state of this attempt
 * @param pkce - PKCE pair of this attempt; only the challenge leaves the process
 */
export function buildAuthorizationUrl(
  authorizationEndpoint: string,
  config: Pick<NormalizedSignInConfig, 'clientId' | 'scopes' | 'hostedDomain' | 'loginHint'>,
  redirectUri: string,
  state: string,
  pkce: Pick<PkceParams, 'codeChallenge' | 'codeChallengeMethod'>
): URL {
  const authUrl = new URL(authorizationEndpoint);
  authUrl.searchParams.set('response_type', 'code');
  authUrl.searchParams.set('client_id', config.clientId);
  authUrl.searchParams.set('redirect_uri', redirectUri);
  authUrl.searchParams.set('scope', [...new Set(config.scopes)].join(' '));
  authUrl.searchParams.set('state', state);
  authUrl.searchParams.set('code_challenge', pkce.codeChallenge);
  authUrl.searchParams.set('code_challenge_method', pkce.codeChallengeMethod);
  authUrl.searchParams.set('access_type', 'offline');
  authUrl.searchParams.set('prompt', 'consent');

  if (config.hostedDomain) {
    authUrl.searchParams.set('hd', config.hostedDomain);
  }
  if (config.loginHint) {
    authUrl.searchParams.set('login_hint', config.loginHint);
  }

  return authUrl;
}
