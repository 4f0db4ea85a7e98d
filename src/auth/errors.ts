/**
 * Sign-in error taxonomy
 * Every failure surfaced by the desktop flow is a SignInError subclass with a stable `code`
 */

export type SignInErrorCode =
  | 'configuration_error'
  | 'bind_error'
  | 'browser_launch_error'
  | 'timeout'
  | 'user_cancelled'
  | 'access_denied'
  | 'state_mismatch'
  | 'sign_in_in_progress'
  | 'exchange_error'
  | 'refresh_error'
  | 'revoke_error';

export class SignInError extends Error {
  readonly code: SignInErrorCode;

  constructor(code: SignInErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SignInError';
    this.code = code;
  }
}

/**
 * Missing or invalid caller configuration. Raised before any socket or network call.
 */
export class ConfigurationError extends SignInError {
  readonly errors: string[];

  constructor(message: string, errors: string[] = []) {
    super('configuration_error', errors.length > 0 ? `${message}: ${errors.join('; ')}` : message);
    this.name = 'ConfigurationError';
    this.errors = errors;
  }
}

export class BindError extends SignInError {
  readonly port: number;
  /** errno code from the socket layer, e.g. EADDRINUSE */
  readonly errno?: string;

  constructor(port: number, cause: unknown) {
    const errno = getErrnoCode(cause);
    super('bind_error', `Failed to bind redirect listener to port ${port}${errno ? ` (${errno})` : ''}`, { cause });
    this.name = 'BindError';
    this.port = port;
    if (errno) {
      this.errno = errno;
    }
  }
}

export class BrowserLaunchError extends SignInError {
  constructor(cause: unknown) {
    super('browser_launch_error', `Failed to open browser: ${describeCause(cause)}`, { cause });
    this.name = 'BrowserLaunchError';
  }
}

export class TimeoutError extends SignInError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super('timeout', `Authorization timeout - no redirect received within ${timeoutMs / 1000} seconds`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * The attempt was abandoned, either by the caller (abort signal / cancel()) or by the
 * user at the provider's consent screen.
 */
export class UserCancelledError extends SignInError {
  readonly source: 'caller' | 'provider';

  constructor(source: 'caller' | 'provider') {
    super('user_cancelled', source === 'caller' ? 'Sign-in was cancelled' : 'User cancelled the sign-in flow');
    this.name = 'UserCancelledError';
    this.source = source;
  }
}

export class AccessDeniedError extends SignInError {
  /** OAuth error code from the redirect, e.g. access_denied */
  readonly error: string;
  readonly errorDescription?: string;

  constructor(error: string, errorDescription?: string) {
    super('access_denied', errorDescription ? `Authorization failed: ${error}: ${errorDescription}` : `Authorization failed: ${error}`);
    this.name = 'AccessDeniedError';
    this.error = error;
    if (errorDescription) {
      this.errorDescription = errorDescription;
    }
  }
}

export class StateMismatchError extends SignInError {
  constructor() {
    super('state_mismatch', 'State parameter in redirect does not match this sign-in attempt');
    this.name = 'StateMismatchError';
  }
}

export class SignInInProgressError extends SignInError {
  constructor() {
    super('sign_in_in_progress', 'A sign-in attempt is already in progress');
    this.name = 'SignInInProgressError';
  }
}

/**
 * Shared shape for failed calls to the provider's endpoints.
 * `status` is absent when the request never produced an HTTP response.
 */
abstract class ProviderResponseError extends SignInError {
  readonly status?: number;
  /** Response body, verbatim */
  readonly body?: string;

  constructor(code: SignInErrorCode, message: string, details: { status?: number; body?: string; cause?: unknown }) {
    super(code, message, { cause: details.cause });
    if (details.status !== undefined) {
      this.status = details.status;
    }
    if (details.body !== undefined) {
      this.body = details.body;
    }
  }
}

export class ExchangeError extends ProviderResponseError {
  constructor(message: string, details: { status?: number; body?: string; cause?: unknown } = {}) {
    super('exchange_error', message, details);
    this.name = 'ExchangeError';
  }
}

export class RefreshError extends ProviderResponseError {
  /** OAuth error code parsed from the response body, e.g. invalid_grant */
  readonly errorCode?: string;

  constructor(message: string, details: { status?: number; body?: string; errorCode?: string; cause?: unknown } = {}) {
    super('refresh_error', message, details);
    this.name = 'RefreshError';
    if (details.errorCode) {
      this.errorCode = details.errorCode;
    }
  }

  /** True when only a fresh interactive sign-in can recover */
  get requiresReauthentication(): boolean {
    return false;
  }
}

/**
 * The refresh token was revoked, expired or otherwise rejected (invalid_grant).
 */
export class RefreshTokenInvalidError extends RefreshError {
  constructor(message: string, details: { status?: number; body?: string; errorCode?: string; cause?: unknown } = {}) {
    super(message, details);
    this.name = 'RefreshTokenInvalidError';
  }

  override get requiresReauthentication(): boolean {
    return true;
  }
}

export class RevokeError extends ProviderResponseError {
  constructor(message: string, details: { status?: number; body?: string; cause?: unknown } = {}) {
    super('revoke_error', message, details);
    this.name = 'RevokeError';
  }
}

export function isSignInError(value: unknown): value is SignInError {
  return value instanceof SignInError;
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

function getErrnoCode(cause: unknown): string | undefined {
  if (typeof cause === 'object' && cause !== null && 'code' in cause && typeof cause.code === 'string') {
    return cause.code;
  }
  return undefined;
}
