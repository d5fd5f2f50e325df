import { describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';
import {
  loginViaApi,
  provisionTestTenant,
  readJson,
  registerViaApi,
  tenantHost,
  type AuthResponseBody,
  type ErrorResponseBody,
} from '../helpers/fixtures';

describe('register → login → me → refresh → replay', () => {
  it('walks one user through the whole session lifecycle', async () => {
    const { app, deps, close } = await buildTestApp();
    try {
      const tenant = await provisionTestTenant(deps, 'acme');
      const host = tenantHost(tenant.subdomain);

      const registered = await registerViaApi(app, 'acme', {
        email: 'alice@acme.test',
        password: 'Str0ng!Pass',
        firstName: 'Alice',
        lastName: 'Smith',
      });
      expect(registered.user).toMatchObject({
        email: 'alice@acme.test',
        firstName: 'Alice',
        lastName: 'Smith',
        role: 'USER',
        tenantId: tenant.id,
      });

      const loginRes = await loginViaApi(app, 'acme', {
        email: 'alice@acme.test',
        password: 'Str0ng!Pass',
      });
      expect(loginRes.statusCode).toBe(200);
      const login = readJson<AuthResponseBody>(loginRes);
      expect(login.refreshToken).not.toBe(registered.refreshToken);
      expect(login.user.id).toBe(registered.user.id);

      const me = await app.inject({
        method: 'GET',
        url: '/api/auth/me',
        headers: { host, authorization: `Bearer ${login.accessToken}` },
      });
      expect(me.statusCode).toBe(200);
      expect(readJson<{ user: AuthResponseBody['user'] }>(me).user.email).toBe('alice@acme.test');

      const refreshed = await app.inject({
        method: 'POST',
        url: '/api/auth/refresh',
        headers: { host },
        payload: { refreshToken: login.refreshToken },
      });
      expect(refreshed.statusCode).toBe(200);
      expect(readJson<AuthResponseBody>(refreshed).refreshToken).not.toBe(login.refreshToken);

      const replay = await app.inject({
        method: 'POST',
        url: '/api/auth/refresh',
        headers: { host },
        payload: { refreshToken: login.refreshToken },
      });
      expect(replay.statusCode).toBe(401);
      expect(readJson<ErrorResponseBody>(replay)).toEqual({
        error: { code: 'UNAUTHORIZED', message: 'Refresh token has been revoked.' },
      });
    } finally {
      await close();
    }
  });
});
