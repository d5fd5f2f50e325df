/**
 * src/modules/refresh-tokens/policies/refresh-token-validity.policy.ts
 *
 * WHY:
 * - Refresh must fail closed and distinguish revoked from expired for the client.
 * - Pure + unit-testable (no DB, no clock: `now` is passed in).
 *
 * RULES (order LOCKED):
 * 1) missing, or owned by another tenant → invalid_refresh_token
 *    (a foreign token is indistinguishable from an unknown one)
 * 2) revoked                            → refresh_token_revoked
 * 3) expiresAt <= now                   → refresh_token_expired
 */

import { err, ok, type Result } from '../../../shared/result';
import type { RefreshTokenFailure, RefreshTokenRecord } from '../refresh-token.types';

export function isRefreshTokenActive(record: RefreshTokenRecord, now: Date): boolean {
  return !record.isRevoked && record.expiresAt.getTime() > now.getTime();
}

export function evaluateRefreshToken(
  record: RefreshTokenRecord | undefined,
  tenantId: string,
  now: Date,
): Result<RefreshTokenRecord, RefreshTokenFailure> {
  if (!record || record.ownerTenantId !== tenantId) return err('invalid_refresh_token');
  if (record.isRevoked) return err('refresh_token_revoked');
  if (record.expiresAt.getTime() <= now.getTime()) return err('refresh_token_expired');
  return ok(record);
}
