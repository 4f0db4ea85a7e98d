/**
 * Sign-in flow capability
 * Each variant implements the same three operations; configuration picks the variant
 */

import { SignInOrchestrator } from '../auth/sign-in-orchestrator.ts';
import type { SignInConfig, SignInOptions, SignInOrchestratorOptions, SignOutResult, TokenResult } from '../auth/types.ts';
import type { FlowType } from '../types.ts';

export interface SignInFlow {
  readonly kind: FlowType;
  signIn(config: SignInConfig, options?: SignInOptions): Promise<TokenResult>;
  signOut(accessToken?: string): Promise<SignOutResult>;
  refresh(refreshToken: string, clientId: string, clientSecret: string): Promise<TokenResult>;
}

/**
 * Authorization code + PKCE through the system browser and a loopback redirect listener
 */
export class WebAuthorizationCodeFlow implements SignInFlow {
  readonly kind = 'web';
  private readonly orchestrator: SignInOrchestrator;

  constructor(orchestrator: SignInOrchestrator | SignInOrchestratorOptions = {}) {
    this.orchestrator = orchestrator instanceof SignInOrchestrator ? orchestrator : new SignInOrchestrator(orchestrator);
  }

  signIn(config: SignInConfig, options?: SignInOptions): Promise<TokenResult> {
    return this.orchestrator.signIn(config, options);
  }

  signOut(accessToken?: string): Promise<SignOutResult> {
    return this.orchestrator.signOut(accessToken);
  }

  refresh(refreshToken: string, clientId: string, clientSecret: string): Promise<TokenResult> {
    return this.orchestrator.refresh(refreshToken, clientId, clientSecret);
  }

  /** Cancel the sign-in in flight, if any */
  cancel(): boolean {
    return this.orchestrator.cancel();
  }
}
