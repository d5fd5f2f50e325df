/**
 * src/modules/auth/auth.audit.ts
 *
 * WHY:
 * - Typed audit helpers for the Auth module.
 * - Keeps audit metadata consistent per domain action.
 *
 * RULES:
 * - Each function maps one domain action to one audit write.
 * - No DB access (delegates to AuditWriter). No business rules.
 * - Never include passwords, hashes, or tokens in metadata (token ids are fine).
 */

import type { AuditWriter } from '../../shared/audit/audit.writer';

export function auditRegisterSuccess(
  writer: AuditWriter,
  data: { userId: string; email: string; role: string },
): Promise<void> {
  return writer.append('auth.register.success', {
    userId: data.userId,
    email: data.email,
    role: data.role,
  });
}

export function auditLoginSuccess(
  writer: AuditWriter,
  data: { userId: string; email: string; role: string },
): Promise<void> {
  return writer.append('auth.login.success', {
    userId: data.userId,
    email: data.email,
    role: data.role,
  });
}

export function auditLoginFailed(
  writer: AuditWriter,
  data: { email: string; reason: string },
): Promise<void> {
  return writer.append('auth.login.failed', {
    email: data.email,
    reason: data.reason,
  });
}

export function auditSessionsCapped(
  writer: AuditWriter,
  data: { userId: string; revokedTokenIds: string[] },
): Promise<void> {
  return writer.append('auth.refresh_tokens.capped', {
    userId: data.userId,
    revokedCount: data.revokedTokenIds.length,
    revokedTokenIds: data.revokedTokenIds,
  });
}

export function auditTokenRefreshed(
  writer: AuditWriter,
  data: { userId: string; previousTokenId: string },
): Promise<void> {
  return writer.append('auth.token.refreshed', {
    userId: data.userId,
    previousTokenId: data.previousTokenId,
  });
}

/** Written outside the transaction so it survives rollback. */
export function auditTokenRefreshFailed(
  writer: AuditWriter,
  data: { reason: string; tokenId: string | null },
): Promise<void> {
  return writer.append('auth.token.refresh_failed', {
    reason: data.reason,
    tokenId: data.tokenId,
  });
}

export function auditLogout(
  writer: AuditWriter,
  data: { userId: string; tokenId: string },
): Promise<void> {
  return writer.append('auth.logout', {
    userId: data.userId,
    tokenId: data.tokenId,
  });
}
