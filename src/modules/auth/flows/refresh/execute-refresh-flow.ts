/**
 * src/modules/auth/flows/refresh/execute-refresh-flow.ts
 *
 * WHY:
 * - Exchanges a refresh token for a new access + refresh pair (rotation).
 * - A refresh token is single-use: the presented one is revoked before its
 *   replacement is inserted, inside one transaction.
 *
 * ORDER:
 * 1. rate limit (IP)
 * 2. tx: find token (ownership checked against the request tenant) → load owner in
 *        tenant scope → rotate (revoke → cap → issue) → success audit
 * 3. failures: audit OUTSIDE the tx (survives rollback)
 * 4. mint access token after commit
 *
 * RULES:
 * - No HTTP concerns here. Returns Result; the controller maps failures.
 * - A token belonging to another tenant reads exactly like an unknown token.
 */

import { AuditWriter } from '../../../../shared/audit/audit.writer';
import { tenantScope } from '../../../../shared/db/tenant-scope';
import { err, ok, type Result } from '../../../../shared/result';
import type { IssuedRefreshToken } from '../../../../shared/security/refresh-token-generator';
import { getUserById, type User } from '../../../users';
import { AUTH_RATE_LIMITS } from '../../auth.constants';
import { auditTokenRefreshed, auditTokenRefreshFailed } from '../../auth.audit';
import type { AuthFailureReason, AuthRequestMeta, AuthResult, AuthTenant } from '../../auth.types';
import { buildAuthResult } from '../../helpers/build-auth-result';
import type { AuthFlowDeps } from '../auth-flow.deps';

export type RefreshParams = {
  tenant: AuthTenant;
  refreshToken: string;
  meta: AuthRequestMeta;
};

type RefreshFailure = Extract<
  AuthFailureReason,
  'invalid_refresh_token' | 'refresh_token_revoked' | 'refresh_token_expired'
>;

type RefreshTxResult = Result<
  { user: User; refresh: IssuedRefreshToken },
  { reason: RefreshFailure; tokenId: string | null; userId: string | null }
>;

export async function executeRefreshFlow(
  deps: AuthFlowDeps,
  params: RefreshParams,
): Promise<Result<AuthResult, AuthFailureReason>> {
  const { tenant, meta } = params;
  const flow = 'auth.refresh';
  const scope = tenantScope(tenant.tenantId);

  deps.logger.info({
    msg: 'auth.refresh.start',
    flow,
    requestId: meta.requestId,
    tenantId: tenant.tenantId,
  });

  await deps.rateLimiter.hitOrThrow({
    key: `refresh:ip:${meta.ip}`,
    ...AUTH_RATE_LIMITS.refresh.perIp,
  });

  const audit = new AuditWriter(deps.auditRepo, {
    requestId: meta.requestId,
    ip: meta.ip,
    userAgent: meta.userAgent,
    tenantId: tenant.tenantId,
  });

  const now = new Date();

  const txResult = await deps.db.transaction().execute(async (trx): Promise<RefreshTxResult> => {
    const found = await deps.refreshTokens.findValid(
      trx,
      params.refreshToken,
      tenant.tenantId,
      now,
    );
    if (!found.ok) return err({ reason: found.error, tokenId: null, userId: null });

    const record = found.value;
    const user = await getUserById(trx, scope, record.userId);
    if (!user) {
      return err({ reason: 'invalid_refresh_token', tokenId: record.id, userId: null });
    }

    const rotated = await deps.refreshTokens.rotate(trx, scope, record, now);
    if (!rotated.ok) {
      return err({ reason: rotated.error, tokenId: record.id, userId: user.id });
    }

    await auditTokenRefreshed(audit.withDb(trx).withContext({ userId: user.id }), {
      userId: user.id,
      previousTokenId: record.id,
    });

    return ok({ user, refresh: rotated.value });
  });

  if (!txResult.ok) {
    const { reason, tokenId, userId } = txResult.error;

    await auditTokenRefreshFailed(audit.withContext({ userId }), { reason, tokenId });

    deps.logger.warn({
      msg: 'auth.refresh.failed',
      flow,
      requestId: meta.requestId,
      tenantId: tenant.tenantId,
      reason,
    });
    return err(reason);
  }

  const { user, refresh } = txResult.value;

  deps.logger.info({
    msg: 'auth.refresh.success',
    flow,
    requestId: meta.requestId,
    tenantId: tenant.tenantId,
    userId: user.id,
  });

  return ok(
    await buildAuthResult({
      accessTokens: deps.accessTokens,
      user,
      tenantId: tenant.tenantId,
      refresh,
    }),
  );
}
