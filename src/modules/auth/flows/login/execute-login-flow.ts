/**
 * src/modules/auth/flows/login/execute-login-flow.ts
 *
 * WHY:
 * - "Flow" = deep module for one end-to-end use-case.
 * - Preserves the two-phase audit pattern:
 *   - success audit inside tx
 *   - failure audit outside tx (survives rollback)
 *
 * ORDER:
 * 1. normalize email → rate limit (email-key + IP)
 * 2. tenant-scoped user lookup → credential check (dummy hash on a miss)
 * 3. tx: session cap → new refresh token → last_login_at → success audit
 * 4. mint access token after commit
 *
 * RULES:
 * - No HTTP concerns here. Returns Result; the controller maps failures.
 * - Unknown email and wrong password are the same failure (no enumeration).
 */

import { AuditWriter } from '../../../../shared/audit/audit.writer';
import { tenantScope } from '../../../../shared/db/tenant-scope';
import { err, ok, type Result } from '../../../../shared/result';
import { emailDomain, getUserByEmail, normalizeEmail } from '../../../users';
import { AUTH_RATE_LIMITS } from '../../auth.constants';
import { auditLoginFailed, auditLoginSuccess, auditSessionsCapped } from '../../auth.audit';
import type { AuthFailureReason, AuthRequestMeta, AuthResult, AuthTenant } from '../../auth.types';
import { buildAuthResult } from '../../helpers/build-auth-result';
import type { AuthFlowDeps } from '../auth-flow.deps';

export type LoginParams = {
  tenant: AuthTenant;
  email: string;
  password: string;
  meta: AuthRequestMeta;
};

export async function executeLoginFlow(
  deps: AuthFlowDeps,
  params: LoginParams,
): Promise<Result<AuthResult, AuthFailureReason>> {
  const { tenant, meta } = params;
  const email = normalizeEmail(params.email);
  const emailKey = deps.tokenHasher.hash(email);
  const flow = 'auth.login';
  const scope = tenantScope(tenant.tenantId);

  deps.logger.info({
    msg: 'auth.login.start',
    flow,
    requestId: meta.requestId,
    tenantId: tenant.tenantId,
    emailDomain: emailDomain(email),
    emailKey,
  });

  await deps.rateLimiter.hitOrThrow({
    key: `login:email:${emailKey}`,
    ...AUTH_RATE_LIMITS.login.perEmail,
  });
  await deps.rateLimiter.hitOrThrow({
    key: `login:ip:${meta.ip}`,
    ...AUTH_RATE_LIMITS.login.perIp,
  });

  const audit = new AuditWriter(deps.auditRepo, {
    requestId: meta.requestId,
    ip: meta.ip,
    userAgent: meta.userAgent,
    tenantId: tenant.tenantId,
  });

  const user = await getUserByEmail(deps.db, scope, email);
  const passwordValid = await deps.credentialVerifier.verify(
    params.password,
    user?.passwordHash ?? null,
  );

  if (!user || !passwordValid) {
    const reason = user ? 'wrong_password' : 'user_not_found';

    await auditLoginFailed(audit.withContext({ userId: user?.id ?? null }), { email, reason });

    deps.logger.warn({
      msg: 'auth.login.failed',
      flow,
      requestId: meta.requestId,
      tenantId: tenant.tenantId,
      emailKey,
      reason,
    });
    return err('invalid_credentials');
  }

  const now = new Date();

  const refresh = await deps.db.transaction().execute(async (trx) => {
    const userAudit = audit.withDb(trx).withContext({ userId: user.id });

    const revokedTokenIds = await deps.refreshTokens.enforceSessionCap(trx, scope, user.id, now);
    if (revokedTokenIds.length > 0) {
      await auditSessionsCapped(userAudit, { userId: user.id, revokedTokenIds });
    }

    const issued = await deps.refreshTokens.issue(trx, user.id, now);
    await deps.userRepo.withDb(trx).updateLastLogin(scope, user.id, now);

    await auditLoginSuccess(userAudit, { userId: user.id, email: user.email, role: user.role });
    return issued;
  });

  deps.logger.info({
    msg: 'auth.login.success',
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
