/**
 * src/modules/refresh-tokens/refresh-token.lifecycle.ts
 *
 * WHY:
 * - One owner for every refresh-token state change: issue, cap, rotate, revoke.
 * - Flows call this; nothing else writes refresh_tokens.
 *
 * RULES:
 * - Caller owns the transaction (every write takes `trx`).
 * - Rotation = revoke old THEN insert new, in the caller's transaction. The revoke is
 *   conditional; losing a race to a concurrent refresh reports refresh_token_revoked.
 * - The session cap is best effort (no row locks): two concurrent logins may briefly
 *   leave one extra active token, which the next issue trims.
 * - The raw token is returned once and never logged.
 */

import { randomUUID } from 'node:crypto';

import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import { unscoped, type TenantScope } from '../../shared/db/tenant-scope';
import type {
  IssuedRefreshToken,
  RefreshTokenGenerator,
} from '../../shared/security/refresh-token-generator';
import { err, ok, type Result } from '../../shared/result';
import { RefreshTokenRepo } from './dal/refresh-token.repo';
import { getRefreshTokenByHash, listUnrevokedTokensForUser } from './queries/refresh-token.queries';
import { evaluateRefreshToken } from './policies/refresh-token-validity.policy';
import { selectTokensToRevokeForCap } from './policies/session-cap.policy';
import type {
  LogoutRevokeOutcome,
  RefreshTokenFailure,
  RefreshTokenRecord,
} from './refresh-token.types';

export class RefreshTokenLifecycle {
  constructor(
    private readonly deps: {
      generator: RefreshTokenGenerator;
      logger: Logger;
    },
  ) {}

  /**
   * Looks the token up by digest WITHOUT tenant scope, then checks ownership
   * explicitly (evaluateRefreshToken). A token from another tenant is reported
   * exactly like an unknown one.
   */
  async findValid(
    db: DbExecutor,
    rawToken: string,
    tenantId: string,
    now: Date,
  ): Promise<Result<RefreshTokenRecord, RefreshTokenFailure>> {
    const record = await getRefreshTokenByHash(
      db,
      unscoped('refresh token ownership check'),
      this.deps.generator.hashOf(rawToken),
    );
    return evaluateRefreshToken(record, tenantId, now);
  }

  /**
   * Returns the ids revoked to make room for one more token. Expired tokens still count
   * until revoked, so the cap also sweeps them.
   */
  async enforceSessionCap(
    trx: DbExecutor,
    scope: TenantScope,
    userId: string,
    now: Date,
  ): Promise<string[]> {
    const unrevoked = await listUnrevokedTokensForUser(trx, scope, userId);
    const excess = selectTokensToRevokeForCap(unrevoked);
    if (excess.length === 0) return [];

    const revoked = await new RefreshTokenRepo(trx).revokeIfActive(
      scope,
      excess.map((t) => t.id),
      now,
    );

    this.deps.logger.info({
      msg: 'auth.refresh_tokens.capped',
      flow: 'refresh_tokens.cap',
      userId,
      unrevokedBefore: unrevoked.length,
      revokedCount: revoked.length,
    });

    return revoked;
  }

  async issue(trx: DbExecutor, userId: string, now: Date): Promise<IssuedRefreshToken> {
    const issued = this.deps.generator.issue(now);

    await new RefreshTokenRepo(trx).insertToken({
      id: randomUUID(),
      userId,
      tokenHash: issued.tokenHash,
      expiresAt: issued.expiresAt,
      createdAt: now,
    });

    return issued;
  }

  /**
   * Revokes `record`, applies the session cap, then issues the replacement.
   */
  async rotate(
    trx: DbExecutor,
    scope: TenantScope,
    record: RefreshTokenRecord,
    now: Date,
  ): Promise<Result<IssuedRefreshToken, 'refresh_token_revoked'>> {
    const revoked = await new RefreshTokenRepo(trx).revokeIfActive(scope, [record.id], now);
    if (revoked.length === 0) return err('refresh_token_revoked');

    await this.enforceSessionCap(trx, scope, record.userId, now);
    return ok(await this.issue(trx, record.userId, now));
  }

  /**
   * Tenant-scoped lookup + conditional revoke. Never fails: logout is idempotent.
   */
  async revokeForLogout(
    db: DbExecutor,
    scope: TenantScope,
    rawToken: string,
    now: Date,
  ): Promise<{ outcome: LogoutRevokeOutcome; record?: RefreshTokenRecord }> {
    const record = await getRefreshTokenByHash(db, scope, this.deps.generator.hashOf(rawToken));
    if (!record) return { outcome: 'not_found' };
    if (record.isRevoked) return { outcome: 'already_revoked', record };

    const revoked = await new RefreshTokenRepo(db).revokeIfActive(scope, [record.id], now);
    return { outcome: revoked.length > 0 ? 'revoked' : 'already_revoked', record };
  }
}
