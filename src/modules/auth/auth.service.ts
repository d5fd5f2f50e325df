/**
 * src/modules/auth/auth.service.ts
 *
 * WHY:
 * - Facade over the auth flows: register, login, refresh, logout, current user.
 * - Flows own their transactions; the service only binds deps once.
 *
 * RULES:
 * - No HTTP concerns. Every operation returns a Result (logout always succeeds).
 * - Never store/log raw passwords or tokens.
 *
 * CURRENT USER:
 * - Reads the user WITHOUT tenant scope and then compares tenant ids explicitly,
 *   so a mismatch is reported (403) instead of looking like a missing user (404).
 */

import { unscoped } from '../../shared/db/tenant-scope';
import { err, ok, type Result } from '../../shared/result';
import { getUserById, toUserProfile, type UserProfile } from '../users';
import type { LogoutRevokeOutcome } from '../refresh-tokens';
import type { AuthFailureReason, AuthResult } from './auth.types';
import type { AuthFlowDeps } from './flows/auth-flow.deps';
import { executeRegisterFlow, type RegisterParams } from './flows/register/execute-register-flow';
import { executeLoginFlow, type LoginParams } from './flows/login/execute-login-flow';
import { executeRefreshFlow, type RefreshParams } from './flows/refresh/execute-refresh-flow';
import { executeLogoutFlow, type LogoutParams } from './flows/logout/execute-logout-flow';

export type { RegisterParams, LoginParams, RefreshParams, LogoutParams };

export class AuthService {
  constructor(private readonly deps: AuthFlowDeps) {}

  register(params: RegisterParams): Promise<Result<AuthResult, AuthFailureReason>> {
    return executeRegisterFlow(this.deps, params);
  }

  login(params: LoginParams): Promise<Result<AuthResult, AuthFailureReason>> {
    return executeLoginFlow(this.deps, params);
  }

  refresh(params: RefreshParams): Promise<Result<AuthResult, AuthFailureReason>> {
    return executeRefreshFlow(this.deps, params);
  }

  logout(params: LogoutParams): Promise<LogoutRevokeOutcome> {
    return executeLogoutFlow(this.deps, params);
  }

  async getCurrentUser(
    userId: string,
    tenantId: string,
  ): Promise<Result<UserProfile, Extract<AuthFailureReason, 'user_not_found' | 'tenant_mismatch'>>> {
    const user = await getUserById(this.deps.db, unscoped('current user tenant check'), userId);
    if (!user) return err('user_not_found');

    if (user.tenantId !== tenantId) {
      this.deps.logger.warn({
        msg: 'auth.me.tenant_mismatch',
        flow: 'auth.me',
        userId,
        tenantId,
        userTenantId: user.tenantId,
      });
      return err('tenant_mismatch');
    }

    return ok(toUserProfile(user));
  }
}
