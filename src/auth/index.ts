/**
 * Authentication Module
 * Exports public API for the desktop authorization code flow
 */

export { buildAuthorizationUrl, normalizeScopes } from './authorization-url.ts';
export { DEFAULT_PROVIDER_ENDPOINTS, DEFAULT_REDIRECT_TIMEOUT_MS } from './constants.ts';
export * from './errors.ts';
export { deriveCodeChallenge, generatePkce } from './pkce.ts';
export type { RedirectListenerOptions, RedirectOutcome, RedirectParams, WaitForRedirectOptions } from './redirect-listener.ts';
export { RedirectListener } from './redirect-listener.ts';
export { SignInOrchestrator } from './sign-in-orchestrator.ts';
export { isTerminalStatus, SignInSession } from './sign-in-session.ts';
export { generateState } from './state.ts';
export type { ExchangeCodeParams, RefreshTokenParams, RevokeOutcome, TokenClientOptions } from './token-client.ts';
export { parseOAuthErrorCode, TokenClient, toTokenResult } from './token-client.ts';
export type {
  BrowserLauncher,
  NormalizedSignInConfig,
  PkceParams,
  ProviderEndpoints,
  RawTokenPayload,
  SignInConfig,
  SignInOptions,
  SignInOrchestratorOptions,
  SignInStatus,
  SignOutResult,
  TerminalSignInStatus,
  TokenResult,
} from './types.ts';
