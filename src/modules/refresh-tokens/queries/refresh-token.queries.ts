/**
 * src/modules/refresh-tokens/queries/refresh-token.queries.ts
 *
 * Read-only. Shapes rows into RefreshTokenRecord.
 */

import type { DbExecutor } from '../../../shared/db/db';
import type { TenantScope } from '../../../shared/db/tenant-scope';
import type { RefreshTokenRecord } from '../refresh-token.types';
import { isRefreshTokenActive } from '../policies/refresh-token-validity.policy';
import {
  selectRefreshTokenByHashSql,
  selectUnrevokedTokensForUserSql,
  type RefreshTokenRow,
} from '../dal/refresh-token.query-sql';

function toRecord(row: RefreshTokenRow): RefreshTokenRecord {
  return {
    id: row.id,
    userId: row.user_id,
    ownerTenantId: row.owner_tenant_id,
    tokenHash: row.token_hash,
    expiresAt: row.expires_at,
    isRevoked: row.is_revoked,
    revokedAt: row.revoked_at,
    createdAt: row.created_at,
  };
}

export async function getRefreshTokenByHash(
  db: DbExecutor,
  scope: TenantScope,
  tokenHash: string,
): Promise<RefreshTokenRecord | undefined> {
  const row = await selectRefreshTokenByHashSql(db, scope, tokenHash);
  return row ? toRecord(row) : undefined;
}

/** Every non-revoked token, expired or not. Newest first. This is what the session cap counts. */
export async function listUnrevokedTokensForUser(
  db: DbExecutor,
  scope: TenantScope,
  userId: string,
): Promise<RefreshTokenRecord[]> {
  const rows = await selectUnrevokedTokensForUserSql(db, scope, userId);
  return rows.map(toRecord);
}

/** Active = not revoked AND not expired at `now`. Newest first. */
export async function listActiveTokensForUser(
  db: DbExecutor,
  scope: TenantScope,
  userId: string,
  now: Date,
): Promise<RefreshTokenRecord[]> {
  const rows = await selectUnrevokedTokensForUserSql(db, scope, userId);
  return rows.map(toRecord).filter((t) => isRefreshTokenActive(t, now));
}
