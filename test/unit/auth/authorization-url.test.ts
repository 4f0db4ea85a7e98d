import assert from 'assert';
import { buildAuthorizationUrl, normalizeScopes } from '../../../src/auth/authorization-url.ts';

const pkce = { codeChallenge: 'test-challenge', codeChallengeMethod: 'S256' as const };

describe('unit/auth/authorization-url', () => {
  describe('buildAuthorizationUrl', () => {
    it('should set every authorization code + PKCE parameter in order', () => {
      const url = buildAuthorizationUrl('https://auth.example.com/authorize', { clientId: 'test-client', scopes: ['openid', 'email'] }, 'http://localhost:4321/callback', 'test-state', pkce);

      assert.strictEqual(
        url.toString(),
        'https://auth.example.com/authorize?response_type=code&client_id=test-client&redirect_uri=http%3A%2F%2Flocalhost%3A4321%2Fcallback&scope=openid+email&state=test-state&code_challenge=test-challenge&code_challenge_method=S256&access_type=offline&prompt=consent'
      );
    });

    it('should carry the redirect URI unchanged', () => {
      const url = buildAuthorizationUrl('https://auth.example.com/authorize', { clientId: 'test-client', scopes: ['email'] }, 'http://127.0.0.1:9000/oauth', 'test-state', pkce);

      assert.strictEqual(url.searchParams.get('redirect_uri'), 'http://127.0.0.1:9000/oauth');
    });

    it('should omit hosted domain and login hint when absent', () => {
      const url = buildAuthorizationUrl('https://auth.example.com/authorize', { clientId: 'test-client', scopes: ['email'] }, 'http://localhost:1/callback', 'test-state', pkce);

      assert.strictEqual(url.searchParams.has('hd'), false);
      assert.strictEqual(url.searchParams.has('login_hint'), false);
    });

    it('should append hosted domain and login hint when present', () => {
      const url = buildAuthorizationUrl(
        'https://auth.example.com/authorize',
        { clientId: 'test-client', scopes: ['email'], hostedDomain: 'example.com', loginHint: 'user@example.com' },
        'http://localhost:1/callback',
        'test-state',
        pkce
      );

      assert.strictEqual(url.searchParams.get('hd'), 'example.com');
      assert.strictEqual(url.searchParams.get('login_hint'), 'user@example.com');
      assert.deepStrictEqual([...url.searchParams.keys()].slice(-2), ['hd', 'login_hint']);
    });

    it('should deduplicate scopes', () => {
      const url = buildAuthorizationUrl('https://auth.example.com/authorize', { clientId: 'test-client', scopes: ['email', 'profile', 'email'] }, 'http://localhost:1/callback', 'test-state', pkce);

      assert.strictEqual(url.searchParams.get('scope'), 'email profile');
    });

    it('should keep query parameters already on the endpoint', () => {
      const url = buildAuthorizationUrl('https://auth.example.com/authorize?tenant=acme', { clientId: 'test-client', scopes: ['email'] }, 'http://localhost:1/callback', 'test-state', pkce);

      assert.strictEqual(url.searchParams.get('tenant'), 'acme');
      assert.strictEqual(url.searchParams.get('response_type'), 'code');
    });
  });

  describe('normalizeScopes', () => {
    it('should prepend openid when an ID token is requested', () => {
      assert.deepStrictEqual(normalizeScopes(['email', 'profile', 'email'], true), ['openid', 'email', 'profile']);
    });

    it('should keep the caller position of openid', () => {
      assert.deepStrictEqual(normalizeScopes(['email', 'openid'], true), ['email', 'openid']);
    });

    it('should leave scopes alone when no ID token is requested', () => {
      assert.deepStrictEqual(normalizeScopes(['email'], false), ['email']);
    });
  });
});
