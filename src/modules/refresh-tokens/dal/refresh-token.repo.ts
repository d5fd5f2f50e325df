/**
 * src/modules/refresh-tokens/dal/refresh-token.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for refresh tokens.
 *
 * RULES:
 * - Revocation is conditional (is_revoked = false) so it is one-way and idempotent:
 *   revoked_at is set exactly once, and the caller learns whether IT did the revoke.
 * - Scope is applied through the owning user (users.tenant_id).
 * - No transactions started here. No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { scopeFilter, type TenantScope } from '../../../shared/db/tenant-scope';
import type { NewRefreshToken } from '../refresh-token.types';

export class RefreshTokenRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): RefreshTokenRepo {
    return new RefreshTokenRepo(db);
  }

  async insertToken(token: NewRefreshToken): Promise<void> {
    await this.db
      .insertInto('refresh_tokens')
      .values({
        id: token.id,
        user_id: token.userId,
        token_hash: token.tokenHash,
        expires_at: token.expiresAt,
        is_revoked: false,
        revoked_at: null,
        created_at: token.createdAt,
      })
      .execute();
  }

  /**
   * Revokes the given ids that are still active. Returns the ids this call revoked;
   * an id missing from the result was already revoked (or is outside the scope).
   */
  async revokeIfActive(scope: TenantScope, ids: readonly string[], now: Date): Promise<string[]> {
    if (ids.length === 0) return [];

    let query = this.db
      .updateTable('refresh_tokens')
      .set({ is_revoked: true, revoked_at: now })
      .where('id', 'in', [...ids])
      .where('is_revoked', '=', false);

    const tenantId = scopeFilter(scope, 'refresh_tokens');
    if (tenantId !== null) {
      query = query.where('user_id', 'in', (eb) =>
        eb.selectFrom('users').select('users.id').where('users.tenant_id', '=', tenantId),
      );
    }

    const rows = await query.returning(['id']).execute();
    return rows.map((r) => r.id);
  }
}
