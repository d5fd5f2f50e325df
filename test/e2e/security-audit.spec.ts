import { describe, it, expect } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';
import { AuditWriter } from '../../src/shared/audit/audit.writer';
import { provisionTestTenant, tenantHost, uniqueSubdomain } from '../helpers/fixtures';

describe('security audit trail', () => {
  it('records a 401 with request details and no token material', async () => {
    const { app, deps, close } = await buildTestApp();
    try {
      const tenant = await provisionTestTenant(deps);

      const res = await app.inject({
        method: 'GET',
        url: '/api/auth/me?verbose=1',
        headers: { host: tenantHost(tenant.subdomain), 'user-agent': 'audit-test' },
      });
      expect(res.statusCode).toBe(401);

      const events = await deps.auditRepo.listByAction('security.unauthorized');
      expect(events).toHaveLength(1);
      expect(events[0]).toMatchObject({
        tenantId: tenant.id,
        userId: null,
        ip: '127.0.0.1',
        userAgent: 'audit-test',
      });
      expect(events[0]?.metadata).toEqual({
        statusCode: 401,
        method: 'GET',
        path: '/api/auth/me',
        ip: '127.0.0.1',
        attemptedSubdomain: tenant.subdomain,
        tokenTenantId: null,
      });
    } finally {
      await close();
    }
  });

  it('records a 403 for an inactive tenant', async () => {
    const { app, deps, close } = await buildTestApp();
    try {
      const tenant = await provisionTestTenant(deps);
      await deps.tenants.suspend(new AuditWriter(deps.auditRepo), tenant.id);

      const res = await app.inject({
        method: 'POST',
        url: '/api/auth/login',
        headers: { host: tenantHost(tenant.subdomain) },
        payload: { email: 'a@example.com', password: 'Passw0rd!' },
      });
      expect(res.statusCode).toBe(403);

      const events = await deps.auditRepo.listByAction('security.forbidden');
      expect(events).toHaveLength(1);
      expect(events[0]?.tenantId).toBeNull();
      expect(events[0]?.metadata).toEqual({
        statusCode: 403,
        method: 'POST',
        path: '/api/auth/login',
        ip: '127.0.0.1',
        attemptedSubdomain: tenant.subdomain,
        tokenTenantId: null,
      });
    } finally {
      await close();
    }
  });

  it('records a 429 from the rate limiter', async () => {
    const { app, deps, close } = await buildTestApp({ nodeEnv: 'development' });
    try {
      const tenant = await provisionTestTenant(deps);
      const attempt = () =>
        app.inject({
          method: 'POST',
          url: '/api/auth/login',
          headers: { host: tenantHost(tenant.subdomain) },
          payload: { email: 'nobody@example.com', password: 'WrongPass1!' },
        });

      for (let i = 0; i < 5; i++) {
        expect((await attempt()).statusCode).toBe(401);
      }
      expect((await attempt()).statusCode).toBe(429);

      expect(await deps.auditRepo.listByAction('security.unauthorized')).toHaveLength(5);
      const limited = await deps.auditRepo.listByAction('security.rate_limited');
      expect(limited).toHaveLength(1);
      expect(limited[0]?.metadata.statusCode).toBe(429);
    } finally {
      await close();
    }
  });

  it('does not record 404 responses for unknown tenants', async () => {
    const { app, deps, close } = await buildTestApp();
    try {
      const res = await app.inject({
        method: 'GET',
        url: '/api/auth/me',
        headers: { host: tenantHost(uniqueSubdomain('ghost')) },
      });
      expect(res.statusCode).toBe(404);

      expect(await deps.auditRepo.listByAction('security.unauthorized')).toHaveLength(0);
      expect(await deps.auditRepo.listByAction('security.forbidden')).toHaveLength(0);
    } finally {
      await close();
    }
  });
});
