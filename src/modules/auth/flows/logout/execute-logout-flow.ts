/**
 * src/modules/auth/flows/logout/execute-logout-flow.ts
 *
 * WHY:
 * - Logout revokes the presented refresh token. Access tokens simply expire.
 *
 * RULES:
 * - Idempotent: unknown, foreign-tenant or already revoked tokens still succeed.
 * - Only an actual revocation writes an audit event.
 */

import { AuditWriter } from '../../../../shared/audit/audit.writer';
import { tenantScope } from '../../../../shared/db/tenant-scope';
import type { LogoutRevokeOutcome } from '../../../refresh-tokens';
import { auditLogout } from '../../auth.audit';
import type { AuthRequestMeta, AuthTenant } from '../../auth.types';
import type { AuthFlowDeps } from '../auth-flow.deps';

export type LogoutParams = {
  tenant: AuthTenant;
  /** null when the client sent no token (cookie or body) */
  refreshToken: string | null;
  meta: AuthRequestMeta;
};

export async function executeLogoutFlow(
  deps: AuthFlowDeps,
  params: LogoutParams,
): Promise<LogoutRevokeOutcome> {
  const { tenant, meta } = params;

  if (!params.refreshToken) {
    deps.logger.info({
      msg: 'auth.logout.no_token',
      flow: 'auth.logout',
      requestId: meta.requestId,
      tenantId: tenant.tenantId,
    });
    return 'not_found';
  }

  const { outcome, record } = await deps.refreshTokens.revokeForLogout(
    deps.db,
    tenantScope(tenant.tenantId),
    params.refreshToken,
    new Date(),
  );

  if (outcome === 'revoked' && record) {
    const audit = new AuditWriter(deps.auditRepo, {
      requestId: meta.requestId,
      ip: meta.ip,
      userAgent: meta.userAgent,
      tenantId: tenant.tenantId,
      userId: record.userId,
    });
    await auditLogout(audit, { userId: record.userId, tokenId: record.id });
  }

  deps.logger.info({
    msg: 'auth.logout.done',
    flow: 'auth.logout',
    requestId: meta.requestId,
    tenantId: tenant.tenantId,
    outcome,
  });

  return outcome;
}
