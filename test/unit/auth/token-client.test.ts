/**
 * Unit tests for token-client.ts against an in-process provider
 */

import http from 'node:http';
import assert from 'assert';
import { ExchangeError, RefreshError, RefreshTokenInvalidError, RevokeError } from '../../../src/auth/errors.ts';
import { parseOAuthErrorCode, TokenClient, toTokenResult } from '../../../src/auth/token-client.ts';
import { createSanitizedLogger } from '../../../src/utils/logger.ts';
import { type FakeProvider, startFakeProvider } from '../../lib/servers/fake-provider.ts';

const silent = createSanitizedLogger({ info() {}, warn() {}, error() {}, debug() {} });

/**
 * Server that promises a 500-byte body, sends a fragment, then drops the connection
 */
async function startTruncatingServer(): Promise<{ endpoints: { tokenEndpoint: string; revocationEndpoint: string }; close(): Promise<void> }> {
  const server = http.createServer((req, res) => {
    req.resume();
    req.on('end', () => {
      res.writeHead(200, { 'Content-Type': 'application/json', 'Content-Length': '500' });
      res.write('{"access_token":"AT', () => {
        req.socket.destroy();
      });
    });
  });
  await new Promise<void>((resolve) => {
    server.listen(0, '127.0.0.1', () => resolve());
  });
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('Truncating server failed to bind');
  }
  const base = `http://127.0.0.1:${address.port}`;

  return {
    endpoints: { tokenEndpoint: `${base}/token`, revocationEndpoint: `${base}/revoke` },
    close: () =>
      new Promise<void>((resolve) => {
        server.close(() => resolve());
        server.closeAllConnections();
      }),
  };
}

describe('unit/auth/token-client', () => {
  let provider: FakeProvider;
  let client: TokenClient;

  before(async () => {
    provider = await startFakeProvider();
    client = new TokenClient({ endpoints: provider.endpoints, logger: silent });
  });

  after(async () => {
    await provider.close();
  });

  beforeEach(() => {
    provider.requests.length = 0;
  });

  describe('exchangeCode', () => {
    it('should post the authorization code grant with the PKCE verifier', async () => {
      provider.setTokenResponse(200, { access_token: 'AT1', expires_in: 3600, scope: 'openid email', token_type: 'Bearer' });

      const payload = await client.exchangeCode({
        code: 'ABC',
        clientId: 'test-client',
        clientSecret: 'test-secret',
        redirectUri: 'http://localhost:4321/callback',
        codeVerifier: 'test-verifier',
      });

      assert.deepStrictEqual(payload, { access_token: 'AT1', expires_in: 3600, scope: 'openid email', token_type: 'Bearer' });
      assert.deepStrictEqual(provider.requests, [
        {
          method: 'POST',
          path: '/token',
          form: {
            grant_type: 'authorization_code',
            code: 'ABC',
            redirect_uri: 'http://localhost:4321/callback',
            client_id: 'test-client',
            client_secret: 'test-secret',
            code_verifier: 'test-verifier',
          },
        },
      ]);
    });

    it('should carry status and body of a rejected exchange verbatim', async () => {
      provider.setTokenResponse(400, '{"error":"invalid_grant","error_description":"Bad Request"}');

      await assert.rejects(
        client.exchangeCode({ code: 'ABC', clientId: 'c', clientSecret: 's', redirectUri: 'http://localhost:1/callback', codeVerifier: 'v' }),
        (error: Error) => {
          assert.ok(error instanceof ExchangeError);
          assert.strictEqual(error.status, 400);
          assert.strictEqual(error.body, '{"error":"invalid_grant","error_description":"Bad Request"}');
          assert.strictEqual(error.code, 'exchange_error');
          return true;
        }
      );
      assert.strictEqual(provider.tokenRequests().length, 1);
    });

    it('should reject a payload without access_token', async () => {
      provider.setTokenResponse(200, { token_type: 'Bearer' });

      await assert.rejects(
        client.exchangeCode({ code: 'ABC', clientId: 'c', clientSecret: 's', redirectUri: 'http://localhost:1/callback', codeVerifier: 'v' }),
        (error: Error) => {
          assert.ok(error instanceof ExchangeError);
          assert.strictEqual(error.message, 'Token response missing access_token');
          return true;
        }
      );
    });

    it('should wrap network errors', async () => {
      const unreachable = new TokenClient({
        endpoints: { tokenEndpoint: 'http://127.0.0.1:1/token', revocationEndpoint: 'http://127.0.0.1:1/revoke' },
        logger: silent,
      });

      await assert.rejects(
        unreachable.exchangeCode({ code: 'ABC', clientId: 'c', clientSecret: 's', redirectUri: 'http://localhost:1/callback', codeVerifier: 'v' }),
        (error: Error) => {
          assert.ok(error instanceof ExchangeError);
          assert.strictEqual(error.status, undefined);
          assert.ok(error.cause);
          return true;
        }
      );
    });
  });

  describe('connection dropped mid-body', () => {
    let truncating: Awaited<ReturnType<typeof startTruncatingServer>>;
    let dropping: TokenClient;

    before(async () => {
      truncating = await startTruncatingServer();
      dropping = new TokenClient({ endpoints: truncating.endpoints, logger: silent });
    });

    after(async () => {
      await truncating.close();
    });

    it('should report an exchange as ExchangeError without status', async () => {
      await assert.rejects(
        dropping.exchangeCode({ code: 'ABC', clientId: 'c', clientSecret: 's', redirectUri: 'http://localhost:1/callback', codeVerifier: 'v' }),
        (error: Error) => {
          assert.ok(error instanceof ExchangeError);
          assert.strictEqual(error.status, undefined);
          assert.ok(error.cause);
          return true;
        }
      );
    });

    it('should report a refresh as RefreshError', async () => {
      await assert.rejects(dropping.refreshToken({ refreshToken: 'RT1', clientId: 'client', clientSecret: 'secret' }), (error: Error) => {
        assert.ok(error instanceof RefreshError);
        assert.ok(!(error instanceof RefreshTokenInvalidError));
        assert.strictEqual(error.status, undefined);
        return true;
      });
    });

    it('should report a revocation as RevokeError', async () => {
      await assert.rejects(dropping.revokeToken('AT1'), (error: Error) => {
        assert.ok(error instanceof RevokeError);
        assert.strictEqual(error.status, undefined);
        return true;
      });
    });
  });

  describe('refreshToken', () => {
    it('should post the refresh token grant', async () => {
      provider.setTokenResponse(200, { access_token: 'AT2', expires_in: 1800 });

      const payload = await client.refreshToken({ refreshToken: 'RT1', clientId: 'client', clientSecret: 'secret' });

      assert.deepStrictEqual(payload, { access_token: 'AT2', expires_in: 1800 });
      assert.deepStrictEqual(provider.tokenRequests()[0]?.form, {
        grant_type: 'refresh_token',
        refresh_token: 'RT1',
        client_id: 'client',
        client_secret: 'secret',
      });
    });

    it('should raise RefreshTokenInvalidError for invalid_grant', async () => {
      provider.setTokenResponse(400, { error: 'invalid_grant' });

      await assert.rejects(client.refreshToken({ refreshToken: 'RT1', clientId: 'client', clientSecret: 'secret' }), (error: Error) => {
        assert.ok(error instanceof RefreshTokenInvalidError);
        assert.ok(error instanceof RefreshError);
        assert.strictEqual(error.errorCode, 'invalid_grant');
        assert.strictEqual(error.requiresReauthentication, true);
        assert.strictEqual(error.status, 400);
        assert.strictEqual(error.body, '{"error":"invalid_grant"}');
        return true;
      });
    });

    it('should raise a plain RefreshError for other failures', async () => {
      provider.setTokenResponse(500, 'upstream unavailable');

      await assert.rejects(client.refreshToken({ refreshToken: 'RT1', clientId: 'client', clientSecret: 'secret' }), (error: Error) => {
        assert.ok(error instanceof RefreshError);
        assert.ok(!(error instanceof RefreshTokenInvalidError));
        assert.strictEqual(error.errorCode, undefined);
        assert.strictEqual(error.requiresReauthentication, false);
        assert.strictEqual(error.message, 'Token refresh failed (500): upstream unavailable');
        return true;
      });
    });
  });

  describe('revokeToken', () => {
    it('should post the token to the revocation endpoint', async () => {
      provider.setRevokeResponse(200);

      assert.strictEqual(await client.revokeToken('AT1'), 'revoked');
      assert.deepStrictEqual(provider.requests, [{ method: 'POST', path: '/revoke', form: { token: 'AT1' } }]);
    });

    it('should treat an already-invalid token as revoked, every time', async () => {
      provider.setRevokeResponse(400, { error: 'invalid_token' });

      assert.strictEqual(await client.revokeToken('AT1'), 'already_invalid');
      assert.strictEqual(await client.revokeToken('AT1'), 'already_invalid');
    });

    it('should raise RevokeError for other statuses', async () => {
      provider.setRevokeResponse(503, 'try later');

      await assert.rejects(client.revokeToken('AT1'), (error: Error) => {
        assert.ok(error instanceof RevokeError);
        assert.strictEqual(error.status, 503);
        assert.strictEqual(error.body, 'try later');
        return true;
      });
    });
  });

  describe('toTokenResult', () => {
    it('should stamp expiry in milliseconds from the receipt time', () => {
      const result = toTokenResult({ access_token: 'AT1', id_token: 'IDT1', refresh_token: 'RT1', expires_in: 3600, scope: 'openid email' }, 1_000_000);

      assert.deepStrictEqual(result, { accessToken: 'AT1', idToken: 'IDT1', refreshToken: 'RT1', scopes: ['openid', 'email'], expiresAt: 4_600_000 });
    });

    it('should keep the previous refresh token when none is returned', () => {
      const result = toTokenResult({ access_token: 'AT2' }, 0, 'RT1');

      assert.deepStrictEqual(result, { accessToken: 'AT2', refreshToken: 'RT1', scopes: [] });
    });

    it('should prefer a rotated refresh token', () => {
      const result = toTokenResult({ access_token: 'AT2', refresh_token: 'RT2' }, 0, 'RT1');

      assert.strictEqual(result.refreshToken, 'RT2');
    });
  });

  describe('parseOAuthErrorCode', () => {
    it('should read the error field of a JSON body', () => {
      assert.strictEqual(parseOAuthErrorCode('{"error":"invalid_client"}'), 'invalid_client');
    });

    it('should return undefined for other bodies', () => {
      assert.strictEqual(parseOAuthErrorCode('not json'), undefined);
      assert.strictEqual(parseOAuthErrorCode('{"message":"nope"}'), undefined);
    });
  });
});
