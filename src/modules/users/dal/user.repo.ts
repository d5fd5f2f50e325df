/**
 * src/modules/users/dal/user.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for users (mutations).
 *
 * RULES:
 * - No transactions started here (service owns tx). No AppError. No policies.
 * - Inserts must target the scope's tenant; updates are filtered by it.
 * - (tenant_id, email) uniqueness is enforced by the DB constraint.
 * - Supports withDb() for transaction binding.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { isVisibleInScope, scopeFilter, type TenantScope } from '../../../shared/db/tenant-scope';
import type { NewUser, UserRole } from '../user.types';

export class UserRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): UserRepo {
    return new UserRepo(db);
  }

  async insertUser(scope: TenantScope, user: NewUser): Promise<void> {
    if (!isVisibleInScope(scope, user.tenantId)) {
      throw new Error('users: insert outside tenant scope');
    }

    await this.db
      .insertInto('users')
      .values({
        id: user.id,
        tenant_id: user.tenantId,
        email: user.email,
        password_hash: user.passwordHash,
        first_name: user.firstName,
        last_name: user.lastName,
        role: user.role,
        email_verified: user.emailVerified,
        last_login_at: null,
        created_at: user.createdAt,
        updated_at: user.createdAt,
      })
      .execute();
  }

  async updateLastLogin(scope: TenantScope, userId: string, now: Date): Promise<void> {
    let query = this.db
      .updateTable('users')
      .set({ last_login_at: now, updated_at: now })
      .where('id', '=', userId);

    const tenantId = scopeFilter(scope, 'users');
    if (tenantId !== null) query = query.where('tenant_id', '=', tenantId);

    await query.execute();
  }

  async updateRole(scope: TenantScope, userId: string, role: UserRole, now: Date): Promise<boolean> {
    let query = this.db
      .updateTable('users')
      .set({ role, updated_at: now })
      .where('id', '=', userId);

    const tenantId = scopeFilter(scope, 'users');
    if (tenantId !== null) query = query.where('tenant_id', '=', tenantId);

    const rows = await query.returning(['id']).execute();
    return rows.length > 0;
  }
}
