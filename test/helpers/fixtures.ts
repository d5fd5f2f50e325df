import { randomUUID } from 'node:crypto';
import type { FastifyInstance } from 'fastify';

import type { AppDeps } from '../../src/app/di';
import { AuditWriter } from '../../src/shared/audit/audit.writer';
import type { DbExecutor } from '../../src/shared/db/db';
import { tenantScope } from '../../src/shared/db/tenant-scope';
import type { PasswordHasher } from '../../src/shared/security/password-hasher';
import type { Tenant } from '../../src/modules/tenants';
import { buildNewUser, type NewUser, type UserRole } from '../../src/modules/users';
import { UserRepo } from '../../src/modules/users/dal/user.repo';
import { TenantRepo } from '../../src/modules/tenants/dal/tenant.repo';
import { buildNewTenant } from '../../src/modules/tenants/helpers/build-new-tenant';

export const TEST_PASSWORD = 'Passw0rd!';

export function uniqueSubdomain(prefix = 't'): string {
  return `${prefix}-${randomUUID().slice(0, 8)}`;
}

/** Tenant through the real provisioning use-case (ACTIVE, audited). */
export async function provisionTestTenant(deps: AppDeps, subdomain = uniqueSubdomain()): Promise<Tenant> {
  return deps.tenants.provisionTenant(new AuditWriter(deps.auditRepo, { requestId: 'test' }), {
    name: `Tenant ${subdomain}`,
    subdomain,
  });
}

/** Raw tenant row for DAL tests that run without an app. */
export async function insertTestTenant(db: DbExecutor, subdomain = uniqueSubdomain()) {
  const tenant = buildNewTenant({ name: `Tenant ${subdomain}`, subdomain });
  await new TenantRepo(db).insertTenant(tenant);
  return tenant;
}

export async function insertTestUser(opts: {
  db: DbExecutor;
  passwordHasher: PasswordHasher;
  tenantId: string;
  email: string;
  password?: string;
  role?: UserRole;
}): Promise<NewUser> {
  const user = buildNewUser({
    tenantId: opts.tenantId,
    email: opts.email,
    passwordHash: await opts.passwordHasher.hash(opts.password ?? TEST_PASSWORD),
    firstName: 'Test',
    lastName: 'User',
    role: opts.role,
  });
  await new UserRepo(opts.db).insertUser(tenantScope(opts.tenantId), user);
  return user;
}

export function tenantHost(subdomain: string): string {
  return `${subdomain}.localhost:3000`;
}

export function readJson<T>(res: { json: () => unknown }): T {
  // Fastify inject returns `unknown`-ish JSON; tests assert the shape they expect.
  return res.json() as T;
}

export type AuthResponseBody = {
  accessToken: string;
  accessTokenExpiresAt: string;
  refreshToken: string;
  refreshTokenExpiresAt: string;
  user: {
    id: string;
    email: string;
    firstName: string;
    lastName: string;
    role: UserRole;
    tenantId: string;
    emailVerified: boolean;
  };
};

export type ErrorResponseBody = {
  error: { code: string; message: string };
};


export async function registerViaApi(
  app: FastifyInstance,
  subdomain: string,
  input: { email: string; password?: string; firstName?: string; lastName?: string },
) {
  const res = await app.inject({
    method: 'POST',
    url: '/api/auth/register',
    headers: { host: tenantHost(subdomain) },
    payload: {
      email: input.email,
      password: input.password ?? TEST_PASSWORD,
      firstName: input.firstName ?? 'Alice',
      lastName: input.lastName ?? 'Smith',
    },
  });
  if (res.statusCode !== 201) {
    throw new Error(`register failed with ${res.statusCode}: ${res.body}`);
  }
  return readJson<AuthResponseBody>(res);
}

export async function loginViaApi(
  app: FastifyInstance,
  subdomain: string,
  input: { email: string; password?: string },
) {
  return app.inject({
    method: 'POST',
    url: '/api/auth/login',
    headers: { host: tenantHost(subdomain) },
    payload: { email: input.email, password: input.password ?? TEST_PASSWORD },
  });
}
