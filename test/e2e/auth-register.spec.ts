import { describe, it, expect, afterEach, vi } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';
import {
  provisionTestTenant,
  readJson,
  registerViaApi,
  tenantHost,
  type AuthResponseBody,
  type ErrorResponseBody,
} from '../helpers/fixtures';

describe('POST /api/auth/register', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('creates a USER, returns both tokens and sets the refresh cookie', async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-03-01T10:00:00.000Z'));

    const { app, deps, close } = await buildTestApp();
    try {
      const tenant = await provisionTestTenant(deps);

      const res = await app.inject({
        method: 'POST',
        url: '/api/auth/register',
        headers: { host: tenantHost(tenant.subdomain) },
        payload: {
          email: '  Alice@Example.COM ',
          password: 'Passw0rd!',
          firstName: 'Alice',
          lastName: 'Smith',
        },
      });

      expect(res.statusCode).toBe(201);
      const body = readJson<AuthResponseBody>(res);

      expect(body.user).toEqual({
        id: body.user.id,
        email: 'alice@example.com',
        firstName: 'Alice',
        lastName: 'Smith',
        role: 'USER',
        tenantId: tenant.id,
        emailVerified: false,
      });
      expect(body.accessToken.split('.')).toHaveLength(3);
      expect(body.accessTokenExpiresAt).toBe('2026-03-01T10:15:00.000Z');
      expect(body.refreshToken).toMatch(/^[A-Za-z0-9_-]{86}$/);
      expect(body.refreshTokenExpiresAt).toBe('2026-03-08T10:00:00.000Z');

      expect(res.headers['set-cookie']).toBe(
        `refreshToken=${body.refreshToken}; Path=/api/auth; HttpOnly; Secure; SameSite=Strict; ` +
          'Expires=Sun, 08 Mar 2026 10:00:00 GMT; Max-Age=604800',
      );

      const stored = await deps.db
        .selectFrom('refresh_tokens')
        .select(['token_hash', 'user_id'])
        .execute();
      expect(stored).toEqual([
        { token_hash: deps.tokenHasher.hash(body.refreshToken), user_id: body.user.id },
      ]);
    } finally {
      await close();
    }
  });

  it('writes auth.register.success with tenant and user', async () => {
    const { app, deps, close } = await buildTestApp();
    try {
      const tenant = await provisionTestTenant(deps);
      const body = await registerViaApi(app, tenant.subdomain, { email: 'audit@example.com' });

      const events = await deps.auditRepo.listByAction('auth.register.success');
      expect(events).toHaveLength(1);
      expect(events[0]?.tenantId).toBe(tenant.id);
      expect(events[0]?.userId).toBe(body.user.id);
      expect(events[0]?.metadata).toEqual({
        userId: body.user.id,
        email: 'audit@example.com',
        role: 'USER',
      });
    } finally {
      await close();
    }
  });

  it('rejects a duplicate email in the same tenant (409)', async () => {
    const { app, deps, close } = await buildTestApp();
    try {
      const tenant = await provisionTestTenant(deps);
      await registerViaApi(app, tenant.subdomain, { email: 'dup@example.com' });

      const res = await app.inject({
        method: 'POST',
        url: '/api/auth/register',
        headers: { host: tenantHost(tenant.subdomain) },
        payload: {
          email: 'DUP@example.com',
          password: 'Other-Passw0rd!',
          firstName: 'Dup',
          lastName: 'User',
        },
      });

      expect(res.statusCode).toBe(409);
      expect(readJson<ErrorResponseBody>(res)).toEqual({
        error: { code: 'CONFLICT', message: 'An account with this email already exists.' },
      });
    } finally {
      await close();
    }
  });

  it('allows the same email in another tenant', async () => {
    const { app, deps, close } = await buildTestApp();
    try {
      const first = await provisionTestTenant(deps);
      const second = await provisionTestTenant(deps);

      const a = await registerViaApi(app, first.subdomain, { email: 'shared@example.com' });
      const b = await registerViaApi(app, second.subdomain, { email: 'shared@example.com' });

      expect(a.user.id).not.toBe(b.user.id);
      expect(a.user.tenantId).toBe(first.id);
      expect(b.user.tenantId).toBe(second.id);
    } finally {
      await close();
    }
  });

  it.each([
    ['weak password', { email: 'x@example.com', password: 'password', firstName: 'Al', lastName: 'Bo' }],
    [
      'password over 72 bytes',
      { email: 'x@example.com', password: 'Aa1!' + 'x'.repeat(70) + '1', firstName: 'Al', lastName: 'Bo' },
    ],
    ['bad email', { email: 'not-an-email', password: 'Passw0rd!', firstName: 'Al', lastName: 'Bo' }],
    ['short first name', { email: 'x@example.com', password: 'Passw0rd!', firstName: 'A', lastName: 'Bo' }],
    ['missing last name', { email: 'x@example.com', password: 'Passw0rd!', firstName: 'Al' }],
  ])('rejects %s with 400 VALIDATION_ERROR', async (_label, payload) => {
    const { app, deps, close } = await buildTestApp();
    try {
      const tenant = await provisionTestTenant(deps);

      const res = await app.inject({
        method: 'POST',
        url: '/api/auth/register',
        headers: { host: tenantHost(tenant.subdomain) },
        payload,
      });

      expect(res.statusCode).toBe(400);
      expect(readJson<ErrorResponseBody>(res)).toEqual({
        error: { code: 'VALIDATION_ERROR', message: 'Invalid request body' },
      });
    } finally {
      await close();
    }
  });
});
