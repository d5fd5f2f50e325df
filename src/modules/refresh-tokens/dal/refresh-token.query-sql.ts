/**
 * src/modules/refresh-tokens/dal/refresh-token.query-sql.ts
 *
 * DAL READS ONLY
 * - refresh_tokens has no tenant column: scope is applied through the owning user.
 * - Every row comes back with owner_tenant_id so callers can check ownership explicitly.
 * - No AppError. No policies.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { scopeFilter, type TenantScope } from '../../../shared/db/tenant-scope';

export type RefreshTokenRow = {
  id: string;
  user_id: string;
  owner_tenant_id: string;
  token_hash: string;
  expires_at: Date;
  is_revoked: boolean;
  revoked_at: Date | null;
  created_at: Date;
};

function baseSelect(db: DbExecutor, scope: TenantScope) {
  const query = db
    .selectFrom('refresh_tokens')
    .innerJoin('users', 'users.id', 'refresh_tokens.user_id')
    .select([
      'refresh_tokens.id as id',
      'refresh_tokens.user_id as user_id',
      'users.tenant_id as owner_tenant_id',
      'refresh_tokens.token_hash as token_hash',
      'refresh_tokens.expires_at as expires_at',
      'refresh_tokens.is_revoked as is_revoked',
      'refresh_tokens.revoked_at as revoked_at',
      'refresh_tokens.created_at as created_at',
    ]);

  const tenantId = scopeFilter(scope, 'refresh_tokens');
  return tenantId === null ? query : query.where('users.tenant_id', '=', tenantId);
}

export async function selectRefreshTokenByHashSql(
  db: DbExecutor,
  scope: TenantScope,
  tokenHash: string,
): Promise<RefreshTokenRow | undefined> {
  return baseSelect(db, scope)
    .where('refresh_tokens.token_hash', '=', tokenHash)
    .executeTakeFirst();
}

/** Non-revoked tokens of one user, newest first (seq breaks created_at ties). Expired ones included. */
export async function selectUnrevokedTokensForUserSql(
  db: DbExecutor,
  scope: TenantScope,
  userId: string,
): Promise<RefreshTokenRow[]> {
  return baseSelect(db, scope)
    .where('refresh_tokens.user_id', '=', userId)
    .where('refresh_tokens.is_revoked', '=', false)
    .orderBy('refresh_tokens.created_at', 'desc')
    .orderBy('refresh_tokens.seq', 'desc')
    .execute();
}
