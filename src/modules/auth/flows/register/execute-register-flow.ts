/**
 * src/modules/auth/flows/register/execute-register-flow.ts
 *
 * WHY:
 * - "Flow" = deep module for one end-to-end use-case.
 * - Registration creates the user AND the first session atomically.
 *
 * ORDER:
 * 1. normalize email → rate limit (email-key + IP)
 * 2. hash password (outside tx: bcrypt is slow, keep the tx short)
 * 3. tx: re-check tenant ACTIVE → reject duplicate (email, tenant) → insert user →
 *        issue refresh token → success audit
 * 4. mint access token after commit
 *
 * RULES:
 * - No HTTP concerns here. Returns Result; the controller maps failures.
 * - A unique-violation from a concurrent registration maps to email_already_registered.
 */

import { AuditWriter } from '../../../../shared/audit/audit.writer';
import { tenantScope } from '../../../../shared/db/tenant-scope';
import { err, ok, type Result } from '../../../../shared/result';
import type { IssuedRefreshToken } from '../../../../shared/security/refresh-token-generator';
import { requireActiveTenant } from '../../../tenants';
import { buildNewUser, emailDomain, getUserByEmail, normalizeEmail, type NewUser } from '../../../users';
import { AUTH_RATE_LIMITS } from '../../auth.constants';
import { auditRegisterSuccess } from '../../auth.audit';
import type { AuthFailureReason, AuthRequestMeta, AuthResult, AuthTenant } from '../../auth.types';
import { buildAuthResult } from '../../helpers/build-auth-result';
import { isUniqueViolation } from '../../helpers/is-unique-violation';
import type { AuthFlowDeps } from '../auth-flow.deps';

export type RegisterParams = {
  tenant: AuthTenant;
  email: string;
  password: string;
  firstName: string;
  lastName: string;
  meta: AuthRequestMeta;
};

type RegisterTxResult = Result<
  { user: NewUser; refresh: IssuedRefreshToken },
  Extract<AuthFailureReason, 'email_already_registered' | 'tenant_not_found' | 'tenant_inactive'>
>;

export async function executeRegisterFlow(
  deps: AuthFlowDeps,
  params: RegisterParams,
): Promise<Result<AuthResult, AuthFailureReason>> {
  const { tenant, meta } = params;
  const email = normalizeEmail(params.email);
  const emailKey = deps.tokenHasher.hash(email);
  const flow = 'auth.register';

  deps.logger.info({
    msg: 'auth.register.start',
    flow,
    requestId: meta.requestId,
    tenantId: tenant.tenantId,
    emailDomain: emailDomain(email),
  });

  await deps.rateLimiter.hitOrThrow({
    key: `register:email:${emailKey}`,
    ...AUTH_RATE_LIMITS.register.perEmail,
  });
  await deps.rateLimiter.hitOrThrow({
    key: `register:ip:${meta.ip}`,
    ...AUTH_RATE_LIMITS.register.perIp,
  });

  const passwordHash = await deps.passwordHasher.hash(params.password);
  const now = new Date();
  const scope = tenantScope(tenant.tenantId);

  let txResult: RegisterTxResult;
  try {
    txResult = await deps.db.transaction().execute(async (trx): Promise<RegisterTxResult> => {
      const active = await requireActiveTenant(trx, tenant.tenantId);
      if (!active.ok) return err(active.error);

      const existing = await getUserByEmail(trx, scope, email);
      if (existing) return err('email_already_registered');

      const user = buildNewUser({
        tenantId: tenant.tenantId,
        email,
        passwordHash,
        firstName: params.firstName,
        lastName: params.lastName,
        now,
      });
      await deps.userRepo.withDb(trx).insertUser(scope, user);

      const refresh = await deps.refreshTokens.issue(trx, user.id, now);

      const audit = new AuditWriter(deps.auditRepo.withDb(trx), {
        requestId: meta.requestId,
        ip: meta.ip,
        userAgent: meta.userAgent,
        tenantId: tenant.tenantId,
        userId: user.id,
      });
      await auditRegisterSuccess(audit, { userId: user.id, email: user.email, role: user.role });

      return ok({ user, refresh });
    });
  } catch (e) {
    if (!isUniqueViolation(e)) throw e;
    txResult = err('email_already_registered');
  }

  if (!txResult.ok) {
    deps.logger.warn({
      msg: 'auth.register.rejected',
      flow,
      requestId: meta.requestId,
      tenantId: tenant.tenantId,
      reason: txResult.error,
    });
    return err(txResult.error);
  }

  const { user, refresh } = txResult.value;

  deps.logger.info({
    msg: 'auth.register.success',
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
