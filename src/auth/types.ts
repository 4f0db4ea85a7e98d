/**
 * Shared types for the desktop authorization-code flow
 */

import type { Logger } from '../utils/logger.ts';

/**
 * Sign-in configuration supplied by the caller (validated against schemas/sign-in-config.schema.json)
 */
export interface SignInConfig {
  /** OAuth client ID */
  clientId: string;
  /** OAuth client secret - the token endpoint requires confidential-client authentication */
  clientSecret?: string;
  /** Requested scopes, at least one */
  scopes?: string[];
  /** Prepend `openid` to the scopes when absent (default true) */
  requestIdToken?: boolean;
  /** Restrict the account chooser to a hosted domain (sent as `hd`) */
  hostedDomain?: string;
  /** Pre-fill the account chooser (sent as `login_hint`) */
  loginHint?: string;
  /**
   * Loopback redirect URI, e.g. http://localhost:8080/callback. Port and path are optional.
   * Without a port one is assigned by the OS; a bare origin or `/` path listens on `/callback`.
   * Any other path, trailing slash included, is sent to the provider as given.
   */
  redirectUri?: string;
  /** HTML served to the browser once the redirect has been captured */
  successHtmlResponse?: string;
  /** How long to wait for the redirect (milliseconds) */
  timeoutMs?: number;
}

/**
 * SignInConfig after validation, with defaults resolved and the redirect URI taken apart
 */
export interface NormalizedSignInConfig {
  clientId: string;
  clientSecret: string;
  /** Deduplicated, in request order */
  scopes: string[];
  hostedDomain?: string;
  loginHint?: string;
  /** Host written into the redirect URI (localhost or 127.0.0.1) */
  redirectHost: string;
  /** Explicit listener port; undefined means OS-assigned */
  port?: number;
  callbackPath: string;
  successHtmlResponse?: string;
  timeoutMs: number;
}

/**
 * Provider endpoints used by one orchestrator
 */
export interface ProviderEndpoints {
  authorizationEndpoint: string;
  tokenEndpoint: string;
  revocationEndpoint: string;
}

/**
 * PKCE (Proof Key for Code Exchange) parameters (RFC 7636)
 */
export interface PkceParams {
  /** Code verifier - cryptographically random string (43-128 characters) */
  codeVerifier: string;
  /** Code challenge - BASE64URL(SHA256(verifier)) */
  codeChallenge: string;
  codeChallengeMethod: 'S256';
}

/**
 * Token endpoint response as sent by the provider
 */
export interface RawTokenPayload {
  access_token: string;
  id_token?: string;
  refresh_token?: string;
  /** Lifetime of the access token in seconds */
  expires_in?: number;
  /** Space-separated granted scopes */
  scope?: string;
  token_type?: string;
}

/**
 * Tokens returned to callers
 */
export interface TokenResult {
  accessToken: string;
  /** Present when the openid scope was granted */
  idToken?: string;
  /** Present when offline access was granted (or carried over on refresh) */
  refreshToken?: string;
  /** Granted scopes, may differ from the requested ones */
  scopes: string[];
  /** Timestamp when the access token expires (milliseconds since epoch) */
  expiresAt?: number;
}

export interface SignOutResult {
  /** Always true - local sign-out never fails */
  success: true;
  /** Whether the provider confirmed the token is no longer valid */
  revoked: boolean;
}

export type SignInStatus = 'pending' | 'awaiting_redirect' | 'exchanging' | 'completed' | 'failed' | 'cancelled' | 'timed_out';

export type TerminalSignInStatus = Extract<SignInStatus, 'completed' | 'failed' | 'cancelled' | 'timed_out'>;

export interface SignInOptions {
  /** Aborting cancels the attempt in whatever state it is in */
  signal?: AbortSignal;
  /** Called after every status transition */
  onStatusChange?: (status: SignInStatus) => void;
}

/**
 * Opens the authorization URL for the user. Launching a browser is left to the host application
 */
export interface BrowserLauncher {
  open(url: string): Promise<void>;
}

export interface SignInOrchestratorOptions {
  /** Override provider endpoints (defaults to Google) */
  endpoints?: Partial<ProviderEndpoints>;
  /** Defaults to the system browser launcher */
  browser?: BrowserLauncher;
  /** Optional logger for debug output (defaults to singleton logger) */
  logger?: Logger;
}
