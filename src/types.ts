/**
 * Caller-facing request types
 */

import type { SignInConfig } from './auth/types.ts';

/**
 * Sign-in flow variant
 * `native` is served by the platform identity SDK on mobile; desktop runs `web`
 */
export type FlowType = 'native' | 'web';

export interface SignInRequest extends SignInConfig {
  flowType?: FlowType;
}

export interface SignOutRequest {
  /** Token to revoke at the provider; without it sign-out is purely local */
  accessToken?: string;
  flowType?: FlowType;
}

export interface RefreshTokenRequest {
  refreshToken?: string;
  clientId: string;
  clientSecret?: string;
  flowType?: FlowType;
}
