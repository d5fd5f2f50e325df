import { describe, it, expect, afterEach, vi } from 'vitest';
import { decodeJwt, decodeProtectedHeader } from 'jose';
import { JoseAccessTokenIssuer } from '../../../../src/shared/security/jose-access-token-issuer';

const SECRET = 'test-secret-test-secret-test-secret-123';

function makeIssuer(secret = SECRET) {
  return new JoseAccessTokenIssuer({
    secret,
    issuer: 'test-issuer',
    audience: 'test-audience',
    ttlSeconds: 900,
  });
}

const USER = {
  id: '33333333-3333-4333-8333-333333333333',
  email: 'alice@example.com',
  firstName: 'Alice',
  lastName: 'Smith',
  role: 'USER',
} as const;

const TENANT = '44444444-4444-4444-8444-444444444444';

describe('JoseAccessTokenIssuer', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('signs HS256 tokens with identity, tenant and role claims', async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-07-01T09:00:00.000Z'));

    const { token, expiresAt } = await makeIssuer().issueAccessToken(USER, TENANT);

    expect(expiresAt).toEqual(new Date('2026-07-01T09:15:00.000Z'));
    expect(decodeProtectedHeader(token)).toEqual({ alg: 'HS256', typ: 'JWT' });

    const claims = decodeJwt(token);
    expect(claims).toMatchObject({
      sub: USER.id,
      email: 'alice@example.com',
      given_name: 'Alice',
      family_name: 'Smith',
      tenant_id: TENANT,
      role: 'USER',
      iss: 'test-issuer',
      aud: 'test-audience',
      iat: 1782896400,
      exp: 1782897300,
    });
    expect(claims.jti).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('verifies its own tokens', async () => {
    const issuer = makeIssuer();
    const { token } = await issuer.issueAccessToken(USER, TENANT);

    const res = await issuer.verifyAccessToken(token);
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.value).toMatchObject({
      userId: USER.id,
      email: USER.email,
      givenName: 'Alice',
      familyName: 'Smith',
      tenantId: TENANT,
      role: 'USER',
    });
  });

  it('reports expired at exactly exp (no clock skew)', async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-07-01T09:00:00.000Z'));
    const issuer = makeIssuer();
    const { token } = await issuer.issueAccessToken(USER, TENANT);

    vi.setSystemTime(new Date('2026-07-01T09:15:00.000Z'));
    expect(await issuer.verifyAccessToken(token)).toEqual({ ok: false, error: 'expired' });
  });

  it('rejects tokens signed with another key or garbage', async () => {
    const other = makeIssuer('another-secret-another-secret-another-1');
    const { token } = await other.issueAccessToken(USER, TENANT);

    expect(await makeIssuer().verifyAccessToken(token)).toEqual({ ok: false, error: 'invalid' });
    expect(await makeIssuer().verifyAccessToken('not-a-jwt')).toEqual({
      ok: false,
      error: 'invalid',
    });
  });

  it('refuses a short signing secret at construction', () => {
    expect(() => makeIssuer('too-short')).toThrowError(
      'JWT signing secret must be at least 32 characters',
    );
  });
});
