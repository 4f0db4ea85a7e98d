/**
 * Token endpoint and revocation endpoint client
 * Stateless: every call is an independent form-encoded POST
 */

import { Ajv, type JSONSchemaType } from 'ajv';
import { logger as defaultLogger, type Logger } from '../utils/logger.ts';
import { describeCause, ExchangeError, RefreshError, RefreshTokenInvalidError, RevokeError } from './errors.ts';
import type { ProviderEndpoints, RawTokenPayload, TokenResult } from './types.ts';

const tokenPayloadSchema: JSONSchemaType<RawTokenPayload> = {
  type: 'object',
  properties: {
    access_token: { type: 'string', minLength: 1 },
    id_token: { type: 'string', nullable: true },
    refresh_token: { type: 'string', nullable: true },
    expires_in: { type: 'number', nullable: true, minimum: 0 },
    scope: { type: 'string', nullable: true },
    token_type: { type: 'string', nullable: true },
  },
  required: ['access_token'],
};

interface OAuthErrorBody {
  error: string;
  error_description?: string;
}

const oauthErrorSchema: JSONSchemaType<OAuthErrorBody> = {
  type: 'object',
  properties: {
    error: { type: 'string' },
    error_description: { type: 'string', nullable: true },
  },
  required: ['error'],
};

const ajv = new Ajv({ strictSchema: false });
const isTokenPayload = ajv.compile(tokenPayloadSchema);
const isOAuthErrorBody = ajv.compile(oauthErrorSchema);

/** OAuth error code the provider uses for a revoked or expired refresh token */
const INVALID_GRANT = 'invalid_grant';

export interface ExchangeCodeParams {
  code: string;
  clientId: string;
  clientSecret: string;
  /** Must match the redirect URI sent in the authorization URL */
  redirectUri: string;
  /** Verifier whose challenge was sent in the authorization URL */
  codeVerifier: string;
  signal?: AbortSignal;
}

export interface RefreshTokenParams {
  refreshToken: string;
  clientId: string;
  clientSecret: string;
  signal?: AbortSignal;
}

export type RevokeOutcome = 'revoked' | 'already_invalid';

export interface TokenClientOptions {
  endpoints: Pick<ProviderEndpoints, 'tokenEndpoint' | 'revocationEndpoint'>;
  /** Optional logger for debug output (defaults to singleton logger) */
  logger?: Logger;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Extract the OAuth `error` code from an error response body, if it is one
 */
export function parseOAuthErrorCode(body: string): string | undefined {
  const parsed = parseJson(body);
  return isOAuthErrorBody(parsed) ? parsed.error : undefined;
}

/**
 * Convert a provider token payload into the caller-facing result
 *
 * @param payload - Validated token endpoint response
 * @param receivedAt - When the response was received (milliseconds since epoch)
 * @param previousRefreshToken - Kept when the provider does not rotate the refresh token
 */
export function toTokenResult(payload: RawTokenPayload, receivedAt: number, previousRefreshToken?: string): TokenResult {
  const result: TokenResult = {
    accessToken: payload.access_token,
    scopes: payload.scope ? payload.scope.split(/\s+/).filter(Boolean) : [],
  };

  if (payload.id_token) {
    result.idToken = payload.id_token;
  }
  const refreshToken = payload.refresh_token || previousRefreshToken;
  if (refreshToken) {
    result.refreshToken = refreshToken;
  }
  if (typeof payload.expires_in === 'number') {
    result.expiresAt = receivedAt + payload.expires_in * 1000;
  }

  return result;
}

/**
 * TokenClient talks to the provider's token and revocation endpoints
 */
export class TokenClient {
  private readonly tokenEndpoint: string;
  private readonly revocationEndpoint: string;
  private readonly logger: Logger;

  constructor(options: TokenClientOptions) {
    this.tokenEndpoint = options.endpoints.tokenEndpoint;
    this.revocationEndpoint = options.endpoints.revocationEndpoint;
    this.logger = options.logger ?? defaultLogger;
  }

  private post(url: string, params: URLSearchParams, signal?: AbortSignal): Promise<Response> {
    const init: RequestInit = {
      method: 'POST',
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        Accept: 'application/json',
        Connection: 'close',
      },
      body: params,
      // Following redirects would send credentials to wherever the provider points
      redirect: 'manual',
    };
    if (signal) {
      init.signal = signal;
    }
    return fetch(url, init);
  }

  /**
   * Exchange an authorization code (plus PKCE verifier) for tokens
   *
   * @throws ExchangeError on network failure, non-2xx status or a malformed payload
   */
  async exchangeCode(params: ExchangeCodeParams): Promise<RawTokenPayload> {
    const body = new URLSearchParams({
      grant_type: 'authorization_code',
      code: params.code,
      redirect_uri: params.redirectUri,
      client_id: params.clientId,
      client_secret: params.clientSecret,
      code_verifier: params.codeVerifier,
    });

    let response: Response;
    let text: string;
    try {
      response = await this.post(this.tokenEndpoint, body, params.signal);
      // The connection can still drop while the body streams in
      text = await response.text();
    } catch (error) {
      throw new ExchangeError(`Token exchange request failed: ${describeCause(error)}`, { cause: error });
    }

    if (!response.ok) {
      throw new ExchangeError(`Token exchange failed (${response.status}): ${text}`, { status: response.status, body: text });
    }

    const data = parseJson(text);
    if (!isTokenPayload(data)) {
      throw new ExchangeError('Token response missing access_token', { status: response.status });
    }

    this.logger.debug(`Token exchange succeeded (${response.status})`);
    return data;
  }

  /**
   * Exchange a refresh token for a new access token
   * The provider may omit a new refresh token; callers keep the previous one.
   *
   * @throws RefreshTokenInvalidError when the provider answers invalid_grant
   * @throws RefreshError on any other failure
   */
  async refreshToken(params: RefreshTokenParams): Promise<RawTokenPayload> {
    const body = new URLSearchParams({
      grant_type: 'refresh_token',
      refresh_token: params.refreshToken,
      client_id: params.clientId,
      client_secret: params.clientSecret,
    });

    let response: Response;
    let text: string;
    try {
      response = await this.post(this.tokenEndpoint, body, params.signal);
      text = await response.text();
    } catch (error) {
      throw new RefreshError(`Token refresh request failed: ${describeCause(error)}`, { cause: error });
    }

    if (!response.ok) {
      const errorCode = parseOAuthErrorCode(text);
      const details = { status: response.status, body: text, ...(errorCode ? { errorCode } : {}) };
      const message = `Token refresh failed (${response.status}): ${text}`;
      throw errorCode === INVALID_GRANT ? new RefreshTokenInvalidError(message, details) : new RefreshError(message, details);
    }

    const data = parseJson(text);
    if (!isTokenPayload(data)) {
      throw new RefreshError('Token refresh response missing access_token', { status: response.status });
    }

    this.logger.debug(`Token refresh succeeded (${response.status})`);
    return data;
  }

  /**
   * Revoke an access or refresh token (RFC 7009)
   * A 400 means the provider already considers the token invalid, which counts as success.
   *
   * @throws RevokeError on network failure or any other non-2xx status
   */
  async revokeToken(token: string): Promise<RevokeOutcome> {
    let response: Response;
    let text: string;
    try {
      response = await this.post(this.revocationEndpoint, new URLSearchParams({ token }));
      text = await response.text();
    } catch (error) {
      throw new RevokeError(`Token revocation request failed: ${describeCause(error)}`, { cause: error });
    }

    if (response.ok) {
      return 'revoked';
    }
    if (response.status === 400) {
      this.logger.debug('Token was already invalid at the provider');
      return 'already_invalid';
    }
    throw new RevokeError(`Token revocation failed (${response.status}): ${text}`, { status: response.status, body: text });
  }
}
