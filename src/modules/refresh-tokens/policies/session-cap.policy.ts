/**
 * src/modules/refresh-tokens/policies/session-cap.policy.ts
 *
 * WHY:
 * - Bounds how many devices/sessions one user holds at once.
 *
 * RULES:
 * - Applied right before a new token is issued (login and refresh).
 * - When the user already has >= MAX_ACTIVE_SESSIONS non-revoked tokens (expired ones
 *   included), keep only the newest KEEP_ON_CAP; the new token brings the total back to
 *   MAX_ACTIVE_SESSIONS.
 * - Input MUST be non-revoked tokens ordered newest first.
 */

export const MAX_ACTIVE_SESSIONS = 4;
export const KEEP_ON_CAP = MAX_ACTIVE_SESSIONS - 1;

export function selectTokensToRevokeForCap<T>(unrevokedNewestFirst: readonly T[]): T[] {
  if (unrevokedNewestFirst.length < MAX_ACTIVE_SESSIONS) return [];
  return unrevokedNewestFirst.slice(KEEP_ON_CAP);
}
