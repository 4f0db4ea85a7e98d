/**
 * Desktop sign-in orchestration
 * Drives one authorization code + PKCE attempt through its state machine
 */

import { SystemBrowserLauncher } from '../browser/browser-launcher.ts';
import { assertSignInConfig, resolveProviderEndpoints } from '../config/validate-config.ts';
import { createDeferred } from '../lib/deferred.ts';
import { logger as defaultLogger, type Logger } from '../utils/logger.ts';
import { buildAuthorizationUrl } from './authorization-url.ts';
import { USER_CANCELLED_ERRORS } from './constants.ts';
import {
  AccessDeniedError,
  BrowserLaunchError,
  ConfigurationError,
  describeCause,
  SignInInProgressError,
  StateMismatchError,
  TimeoutError,
  UserCancelledError,
} from './errors.ts';
import { RedirectListener } from './redirect-listener.ts';
import { SignInSession } from './sign-in-session.ts';
import { type RevokeOutcome, TokenClient, toTokenResult } from './token-client.ts';
import type {
  BrowserLauncher,
  NormalizedSignInConfig,
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

type BrowserLaunchOutcome = { type: 'opened' } | { type: 'failed'; error: unknown } | { type: 'timeout' } | { type: 'cancelled' };

function terminalStatusFor(error: unknown): TerminalSignInStatus {
  if (error instanceof UserCancelledError) {
    return 'cancelled';
  }
  if (error instanceof TimeoutError) {
    return 'timed_out';
  }
  return 'failed';
}

/**
 * SignInOrchestrator runs the desktop authorization code flow
 *
 * One instance holds at most one active attempt; a second signIn() while one is
 * pending is rejected. Refresh and sign-out are independent and never touch the listener.
 *
 * @example
 * const orchestrator = new SignInOrchestrator();
 * const tokens = await orchestrator.signIn({
 *   clientId: 'client-id',
 *   clientSecret: 'client-secret',
 *   scopes: ['openid', 'email'],
 * });
 */
export class SignInOrchestrator {
  private readonly endpoints: ProviderEndpoints;
  private readonly browser: BrowserLauncher;
  private readonly tokenClient: TokenClient;
  private readonly logger: Logger;
  private activeSession: SignInSession | undefined;

  constructor(options: SignInOrchestratorOptions = {}) {
    this.endpoints = resolveProviderEndpoints(options.endpoints);
    this.browser = options.browser ?? new SystemBrowserLauncher();
    this.logger = options.logger ?? defaultLogger;
    this.tokenClient = new TokenClient({ endpoints: this.endpoints, logger: this.logger });
  }

  /**
   * Status of the attempt in flight, if any
   */
  get status(): SignInStatus | undefined {
    return this.activeSession?.status;
  }

  /**
   * Cancel the attempt in flight
   * @returns false when no attempt was active
   */
  cancel(): boolean {
    if (!this.activeSession) {
      return false;
    }
    this.activeSession.abortController.abort();
    return true;
  }

  /**
   * Perform the interactive sign-in
   *
   * @param input - Sign-in configuration (validated before any socket is bound)
   * @param options - Abort signal and status observer
   * @returns Tokens granted by the provider
   *
   * @throws ConfigurationError, SignInInProgressError, BindError, BrowserLaunchError,
   * TimeoutError, UserCancelledError, AccessDeniedError, StateMismatchError or ExchangeError
   */
  async signIn(input: SignInConfig, options: SignInOptions = {}): Promise<TokenResult> {
    const { config, warnings } = assertSignInConfig(input);
    for (const warning of warnings) {
      this.logger.debug(warning);
    }

    if (this.activeSession) {
      throw new SignInInProgressError();
    }

    const session = new SignInSession(options.onStatusChange);
    this.activeSession = session;

    const external = options.signal;
    const forwardAbort = () => session.abortController.abort();
    if (external?.aborted) {
      forwardAbort();
    } else {
      external?.addEventListener('abort', forwardAbort, { once: true });
    }

    const listener = new RedirectListener({
      port: config.port,
      redirectHost: config.redirectHost,
      callbackPath: config.callbackPath,
      successHtml: config.successHtmlResponse,
      logger: this.logger,
    });

    try {
      return await this.runSession(session, listener, config);
    } catch (error) {
      // Port is released before the terminal status is published
      await listener.stop();
      const status = terminalStatusFor(error);
      if (!session.isTerminal) {
        session.transition(status);
      }

      const message = `Sign-in ${status.replace('_', ' ')}: ${describeCause(error)}`;
      if (status === 'failed') {
        this.logger.error(message);
      } else {
        this.logger.info(message);
      }
      throw error;
    } finally {
      await listener.stop();
      external?.removeEventListener('abort', forwardAbort);
      this.activeSession = undefined;
    }
  }

  private async runSession(session: SignInSession, listener: RedirectListener, config: NormalizedSignInConfig): Promise<TokenResult> {
    const { signal } = session;

    await listener.start();
    session.recordPort(listener.getPort());
    if (signal.aborted) {
      throw new UserCancelledError('caller');
    }

    const redirectUri = listener.getRedirectUri();
    const authUrl = buildAuthorizationUrl(this.endpoints.authorizationEndpoint, config, redirectUri, session.state, session.pkce);
    // One budget covers the browser launch and the redirect wait
    const deadline = Date.now() + config.timeoutMs;

    this.logger.debug('🌐 Opening browser for authorization...');
    const launch = await this.openBrowser(authUrl.toString(), signal, deadline);
    if (launch.type === 'failed') {
      throw new BrowserLaunchError(launch.error);
    }
    if (launch.type === 'timeout') {
      throw new TimeoutError(config.timeoutMs);
    }
    if (launch.type === 'cancelled' || signal.aborted) {
      throw new UserCancelledError('caller');
    }
    session.transition('awaiting_redirect');

    const outcome = await listener.waitForRedirect({ timeoutMs: Math.max(deadline - Date.now(), 0), signal });
    // Listener never outlives the redirect; the exchange runs with the port already released
    await listener.stop();

    if (outcome.type === 'timeout') {
      throw new TimeoutError(config.timeoutMs);
    }
    if (outcome.type === 'cancelled') {
      throw new UserCancelledError('caller');
    }

    const { params } = outcome;
    if (!session.matchesState(params.state)) {
      throw new StateMismatchError();
    }

    const { code, error, error_description: errorDescription } = params;
    if (error) {
      throw USER_CANCELLED_ERRORS.has(error) ? new UserCancelledError('provider') : new AccessDeniedError(error, errorDescription);
    }
    if (!code) {
      throw new AccessDeniedError('invalid_request', 'Authorization code not found in redirect');
    }

    session.transition('exchanging');
    let payload: RawTokenPayload;
    try {
      payload = await this.tokenClient.exchangeCode({
        code,
        clientId: config.clientId,
        clientSecret: config.clientSecret,
        redirectUri,
        codeVerifier: session.pkce.codeVerifier,
        signal,
      });
    } catch (exchangeError) {
      if (signal.aborted) {
        throw new UserCancelledError('caller');
      }
      throw exchangeError;
    }

    const result = toTokenResult(payload, Date.now());
    session.transition('completed');
    this.logger.debug(`Sign-in completed in ${Date.now() - session.createdAt}ms`);
    return result;
  }

  /**
   * Hand the URL to the browser launcher without letting a launcher that never settles hold the attempt
   */
  private async openBrowser(url: string, signal: AbortSignal, deadline: number): Promise<BrowserLaunchOutcome> {
    const launched = this.browser.open(url).then(
      (): BrowserLaunchOutcome => ({ type: 'opened' }),
      (error: unknown): BrowserLaunchOutcome => ({ type: 'failed', error })
    );

    const interrupted = createDeferred<BrowserLaunchOutcome>();
    const onAbort = () => interrupted.resolve({ type: 'cancelled' });
    signal.addEventListener('abort', onAbort, { once: true });
    const timer = setTimeout(() => interrupted.resolve({ type: 'timeout' }), Math.max(deadline - Date.now(), 0));

    try {
      return await Promise.race([launched, interrupted.promise]);
    } finally {
      clearTimeout(timer);
      signal.removeEventListener('abort', onAbort);
    }
  }

  /**
   * Exchange a refresh token for a new access token
   * The previous refresh token is carried over when the provider does not rotate it.
   *
   * @throws ConfigurationError when an input is missing
   * @throws RefreshTokenInvalidError when the refresh token is no longer valid - run signIn() again
   * @throws RefreshError on any other failure
   */
  async refresh(refreshToken: string, clientId: string, clientSecret: string): Promise<TokenResult> {
    if (!refreshToken) {
      throw new ConfigurationError('Refresh token is required');
    }
    if (!clientId) {
      throw new ConfigurationError('Client ID is required');
    }
    if (!clientSecret) {
      throw new ConfigurationError('Client secret is required for desktop authentication');
    }

    const payload = await this.tokenClient.refreshToken({ refreshToken, clientId, clientSecret });
    return toTokenResult(payload, Date.now(), refreshToken);
  }

  /**
   * Revoke a token at the provider
   *
   * @throws RevokeError when the provider rejects the request for a reason other than an already-invalid token
   */
  revoke(token: string): Promise<RevokeOutcome> {
    return this.tokenClient.revokeToken(token);
  }

  /**
   * Best-effort sign-out: revokes the token if one is given, always succeeds locally
   */
  async signOut(accessToken?: string): Promise<SignOutResult> {
    if (!accessToken) {
      return { success: true, revoked: false };
    }

    try {
      await this.tokenClient.revokeToken(accessToken);
      return { success: true, revoked: true };
    } catch (error) {
      this.logger.warn(`Token revocation failed, signed out locally: ${describeCause(error)}`);
      return { success: true, revoked: false };
    }
  }
}
