import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createTestDb } from '../helpers/test-db';
import { insertTestTenant, insertTestUser } from '../helpers/fixtures';
import type { Db } from '../../src/shared/db/db';
import { tenantScope, unscoped } from '../../src/shared/db/tenant-scope';
import { BcryptPasswordHasher } from '../../src/shared/security/bcrypt-password-hasher';
import { UserRepo } from '../../src/modules/users/dal/user.repo';
import { buildNewUser, getUserByEmail, getUserById, promoteToAdmin } from '../../src/modules/users';

const passwordHasher = new BcryptPasswordHasher({ cost: 4 });

describe('users DAL', () => {
  let db: Db;

  beforeEach(async () => {
    db = await createTestDb();
  });

  afterEach(async () => {
    await db.destroy();
  });

  it('inserts a user and reads it back by normalized email within its tenant', async () => {
    const tenant = await insertTestTenant(db);
    const created = await insertTestUser({
      db,
      passwordHasher,
      tenantId: tenant.id,
      email: 'Alice@Example.com',
    });

    const found = await getUserByEmail(db, tenantScope(tenant.id), '  ALICE@example.COM ');
    expect(found).toMatchObject({
      id: created.id,
      tenantId: tenant.id,
      email: 'alice@example.com',
      firstName: 'Test',
      lastName: 'User',
      role: 'USER',
      emailVerified: false,
      lastLoginAt: null,
    });
    expect(await passwordHasher.verify('Passw0rd!', found?.passwordHash ?? '')).toBe(true);
  });

  it('never returns a row of another tenant through a tenant scope', async () => {
    const tenantA = await insertTestTenant(db);
    const tenantB = await insertTestTenant(db);
    const user = await insertTestUser({
      db,
      passwordHasher,
      tenantId: tenantA.id,
      email: 'a@example.com',
    });

    expect(await getUserById(db, tenantScope(tenantB.id), user.id)).toBeUndefined();
    expect(await getUserByEmail(db, tenantScope(tenantB.id), 'a@example.com')).toBeUndefined();
    expect((await getUserById(db, unscoped('test'), user.id))?.tenantId).toBe(tenantA.id);
  });

  it('allows the same email once per tenant', async () => {
    const tenantA = await insertTestTenant(db);
    const tenantB = await insertTestTenant(db);

    await insertTestUser({ db, passwordHasher, tenantId: tenantA.id, email: 'dup@example.com' });
    await insertTestUser({ db, passwordHasher, tenantId: tenantB.id, email: 'dup@example.com' });

    await expect(
      insertTestUser({ db, passwordHasher, tenantId: tenantA.id, email: 'dup@example.com' }),
    ).rejects.toThrow();
  });

  it('refuses to insert into a tenant outside the scope', async () => {
    const tenantA = await insertTestTenant(db);
    const tenantB = await insertTestTenant(db);
    const user = buildNewUser({
      tenantId: tenantA.id,
      email: 'x@example.com',
      passwordHash: await passwordHasher.hash('Passw0rd!'),
      firstName: 'Xa',
      lastName: 'Yb',
    });

    await expect(new UserRepo(db).insertUser(tenantScope(tenantB.id), user)).rejects.toThrowError(
      'users: insert outside tenant scope',
    );
  });

  it('scoped updates do not touch other tenants', async () => {
    const tenantA = await insertTestTenant(db);
    const tenantB = await insertTestTenant(db);
    const user = await insertTestUser({
      db,
      passwordHasher,
      tenantId: tenantA.id,
      email: 'r@example.com',
    });
    const repo = new UserRepo(db);
    const now = new Date('2026-06-01T00:00:00.000Z');

    expect(await repo.updateRole(tenantScope(tenantB.id), user.id, 'ADMIN', now)).toBe(false);
    expect(
      await repo.updateRole(tenantScope(tenantA.id), user.id, promoteToAdmin(user.role), now),
    ).toBe(true);

    await repo.updateLastLogin(tenantScope(tenantB.id), user.id, now);
    const afterForeign = await getUserById(db, tenantScope(tenantA.id), user.id);
    expect(afterForeign?.role).toBe('ADMIN');
    expect(afterForeign?.lastLoginAt).toBeNull();

    await repo.updateLastLogin(tenantScope(tenantA.id), user.id, now);
    expect((await getUserById(db, tenantScope(tenantA.id), user.id))?.lastLoginAt).toEqual(now);
  });
});
