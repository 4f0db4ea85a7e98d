import type { ProviderEndpoints } from './types.ts';

// Google OAuth2 endpoints
export const DEFAULT_PROVIDER_ENDPOINTS: ProviderEndpoints = {
  authorizationEndpoint: 'https://accounts.google.com/o/oauth2/auth',
  tokenEndpoint: 'https://oauth2.googleapis.com/token',
  revocationEndpoint: 'https://oauth2.googleapis.com/revoke',
};

/** 5 minutes */
export const DEFAULT_REDIRECT_TIMEOUT_MS = 300000;

export const OPENID_SCOPE = 'openid';

// Redirect `error` codes that mean the user backed out rather than refused
export const USER_CANCELLED_ERRORS: ReadonlySet<string> = new Set(['user_cancelled', 'user_canceled']);
