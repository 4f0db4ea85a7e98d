/**
 * Desktop authentication entry point
 * Routes sign-in, sign-out and refresh requests to the flow their flowType selects
 */

import { ConfigurationError } from './auth/errors.ts';
import type { SignInOptions, SignInOrchestratorOptions, SignOutResult, TokenResult } from './auth/types.ts';
import { type SignInFlow, WebAuthorizationCodeFlow } from './flows/sign-in-flow.ts';
import type { FlowType, RefreshTokenRequest, SignInRequest, SignOutRequest } from './types.ts';

/**
 * DesktopAuth is the caller-facing API of the library
 *
 * @example
 * const auth = new DesktopAuth();
 * const tokens = await auth.signIn({ clientId, clientSecret, scopes: ['email'] });
 * const refreshed = await auth.refreshToken({ refreshToken: tokens.refreshToken, clientId, clientSecret });
 * await auth.signOut({ accessToken: refreshed.accessToken });
 */
export class DesktopAuth {
  private readonly webFlow: WebAuthorizationCodeFlow;

  constructor(options: SignInOrchestratorOptions = {}) {
    this.webFlow = new WebAuthorizationCodeFlow(options);
  }

  /**
   * Resolve the flow for a request (desktop defaults to `web`)
   */
  flowFor(flowType: FlowType = 'web'): SignInFlow {
    if (flowType === 'native') {
      throw new ConfigurationError('Native sign-in is only available on mobile platforms; use flowType "web" on desktop');
    }
    return this.webFlow;
  }

  async signIn(request: SignInRequest, options?: SignInOptions): Promise<TokenResult> {
    const { flowType, ...config } = request;
    return this.flowFor(flowType).signIn(config, options);
  }

  async signOut(request: SignOutRequest = {}): Promise<SignOutResult> {
    return this.flowFor(request.flowType).signOut(request.accessToken);
  }

  async refreshToken(request: RefreshTokenRequest): Promise<TokenResult> {
    const flow = this.flowFor(request.flowType);
    if (!request.refreshToken) {
      throw new ConfigurationError('No refresh token provided');
    }
    if (!request.clientSecret) {
      throw new ConfigurationError('Client secret is required for desktop authentication');
    }
    return flow.refresh(request.refreshToken, request.clientId, request.clientSecret);
  }

  /** Cancel the sign-in in flight, if any */
  cancel(): boolean {
    return this.webFlow.cancel();
  }
}
