import { describe, it, expect } from 'vitest';
import { AuditWriter } from '../../src/shared/audit/audit.writer';
import { buildTestApp } from '../helpers/build-test-app';
import {
  provisionTestTenant,
  readJson,
  registerViaApi,
  tenantHost,
  uniqueSubdomain,
  type ErrorResponseBody,
} from '../helpers/fixtures';

/**
 * E2E tests for the tenant resolver hook.
 * POST /api/auth/login with a wrong password is used as a tenant-scoped request:
 * 401 means the tenant resolved, anything else came from the resolver.
 */

const wrongLogin = { email: 'nobody@example.com', password: 'Wrong-Passw0rd!' };

describe('tenant resolution', () => {
  it('rejects a request without a tenant subdomain (400)', async () => {
    const { app, close } = await buildTestApp();
    try {
      const res = await app.inject({
        method: 'POST',
        url: '/api/auth/login',
        headers: { host: 'localhost:3000' },
        payload: wrongLogin,
      });

      expect(res.statusCode).toBe(400);
      expect(readJson<ErrorResponseBody>(res)).toEqual({
        error: { code: 'VALIDATION_ERROR', message: 'Tenant subdomain not provided.' },
      });
    } finally {
      await close();
    }
  });

  it('rejects a malformed subdomain (400)', async () => {
    const { app, close } = await buildTestApp();
    try {
      const res = await app.inject({
        method: 'POST',
        url: '/api/auth/login',
        headers: { host: 'localhost:3000', 'x-tenant-subdomain': 'bad_tenant' },
        payload: wrongLogin,
      });

      expect(res.statusCode).toBe(400);
      expect(readJson<ErrorResponseBody>(res).error.message).toBe(
        'Invalid tenant subdomain format.',
      );
    } finally {
      await close();
    }
  });

  it('rejects an unknown tenant (404)', async () => {
    const { app, close } = await buildTestApp();
    try {
      const res = await app.inject({
        method: 'POST',
        url: '/api/auth/login',
        headers: { host: tenantHost('ghost-tenant') },
        payload: wrongLogin,
      });

      expect(res.statusCode).toBe(404);
      expect(readJson<ErrorResponseBody>(res)).toEqual({
        error: { code: 'NOT_FOUND', message: 'Tenant not found.' },
      });
    } finally {
      await close();
    }
  });

  it('resolves from host, header and query; header wins over host', async () => {
    const { app, deps, close } = await buildTestApp();
    try {
      const hostTenant = await provisionTestTenant(deps);
      const headerTenant = await provisionTestTenant(deps);
      const queryTenant = await provisionTestTenant(deps);

      const viaHeader = await registerViaApi(app, hostTenant.subdomain, {
        email: 'header@example.com',
      });
      expect(viaHeader.user.tenantId).toBe(hostTenant.id);

      const overridden = await app.inject({
        method: 'POST',
        url: '/api/auth/register',
        headers: {
          host: tenantHost(hostTenant.subdomain),
          'x-tenant-subdomain': headerTenant.subdomain.toUpperCase(),
        },
        payload: {
          email: 'override@example.com',
          password: 'Passw0rd!',
          firstName: 'Olga',
          lastName: 'Override',
        },
      });
      expect(overridden.statusCode).toBe(201);
      expect(readJson<{ user: { tenantId: string } }>(overridden).user.tenantId).toBe(
        headerTenant.id,
      );

      const viaQuery = await app.inject({
        method: 'POST',
        url: `/api/auth/register?tenant=${queryTenant.subdomain}`,
        headers: { host: 'localhost:3000' },
        payload: {
          email: 'query@example.com',
          password: 'Passw0rd!',
          firstName: 'Quinn',
          lastName: 'Query',
        },
      });
      expect(viaQuery.statusCode).toBe(201);
      expect(readJson<{ user: { tenantId: string } }>(viaQuery).user.tenantId).toBe(
        queryTenant.id,
      );
    } finally {
      await close();
    }
  });

  it('caches only the tenant projection', async () => {
    const { app, deps, cache, close } = await buildTestApp();
    try {
      const tenant = await provisionTestTenant(deps);

      const res = await app.inject({
        method: 'POST',
        url: '/api/auth/login',
        headers: { host: tenantHost(tenant.subdomain) },
        payload: wrongLogin,
      });
      expect(res.statusCode).toBe(401);

      const cached = await cache.get(`tenant:${tenant.subdomain}`);
      expect(cached).not.toBeNull();
      expect(JSON.parse(cached ?? '{}')).toEqual({
        id: tenant.id,
        subdomain: tenant.subdomain,
        status: 'ACTIVE',
      });
    } finally {
      await close();
    }
  });

  it('treats a corrupt cache entry as a miss', async () => {
    const { app, deps, cache, close } = await buildTestApp();
    try {
      const tenant = await provisionTestTenant(deps);
      await cache.set(`tenant:${tenant.subdomain}`, '{not json');

      const res = await app.inject({
        method: 'POST',
        url: '/api/auth/login',
        headers: { host: tenantHost(tenant.subdomain) },
        payload: wrongLogin,
      });

      expect(res.statusCode).toBe(401);
      const repaired = await cache.get(`tenant:${tenant.subdomain}`);
      expect(JSON.parse(repaired ?? '{}')).toEqual({
        id: tenant.id,
        subdomain: tenant.subdomain,
        status: 'ACTIVE',
      });
    } finally {
      await close();
    }
  });

  it('rejects a suspended tenant (403) right after the status change', async () => {
    const { app, deps, cache, close } = await buildTestApp();
    try {
      const tenant = await provisionTestTenant(deps);
      const host = tenantHost(tenant.subdomain);

      const before = await app.inject({
        method: 'POST',
        url: '/api/auth/login',
        headers: { host },
        payload: wrongLogin,
      });
      expect(before.statusCode).toBe(401);
      expect(await cache.get(`tenant:${tenant.subdomain}`)).not.toBeNull();

      await deps.tenants.suspend(new AuditWriter(deps.auditRepo), tenant.id);
      expect(await cache.get(`tenant:${tenant.subdomain}`)).toBeNull();

      const after = await app.inject({
        method: 'POST',
        url: '/api/auth/login',
        headers: { host },
        payload: wrongLogin,
      });
      expect(after.statusCode).toBe(403);
      expect(readJson<ErrorResponseBody>(after)).toEqual({
        error: { code: 'FORBIDDEN', message: 'Tenant is not active.' },
      });
    } finally {
      await close();
    }
  });

  it('does not resolve a tenant for infrastructure paths', async () => {
    const { app, close } = await buildTestApp();
    try {
      const res = await app.inject({
        method: 'GET',
        url: '/health',
        headers: { host: tenantHost(uniqueSubdomain()) },
      });
      expect(res.statusCode).toBe(200);
    } finally {
      await close();
    }
  });

  it('resolves a tenant for paths that only share a prefix with an infrastructure path', async () => {
    const { app, close } = await buildTestApp();
    try {
      const res = await app.inject({
        method: 'GET',
        url: '/healthxyz',
        headers: { host: 'localhost:3000' },
      });

      expect(res.statusCode).toBe(400);
      expect(readJson<ErrorResponseBody>(res)).toEqual({
        error: { code: 'VALIDATION_ERROR', message: 'Tenant subdomain not provided.' },
      });
    } finally {
      await close();
    }
  });
});
