/**
 * src/shared/http/require-auth-context.ts
 *
 * WHY:
 * - Controllers must not duplicate "require authenticated user" logic.
 * - A token minted for tenant A must never act on tenant B, even though the
 *   signature is valid everywhere.
 *
 * RULES:
 * - HTTP-only helper (may depend on Fastify request typing).
 * - Must NOT touch DB, services, or transactions.
 * - Throws AppError so error-handler maps it consistently.
 *
 * Guard sequence (LOCKED):
 * 1) no valid access token         -> 401 "Authentication required."
 * 2) tenant claim ≠ resolved tenant -> 403 "Access token was not issued for this tenant."
 */

import type { FastifyRequest } from 'fastify';
import { AppError } from './errors';
import type { AuthContext } from './auth-context';

export type RequiredAuthContext = AuthContext;

export function requireAuthContext(req: FastifyRequest): RequiredAuthContext {
  const ctx = req.authContext;
  if (!ctx) throw AppError.unauthorized('Authentication required.');

  const resolvedTenantId = req.tenantContext?.tenantId ?? null;
  if (!resolvedTenantId || ctx.tenantId !== resolvedTenantId) {
    throw AppError.forbidden('Access token was not issued for this tenant.', {
      tokenTenantId: ctx.tenantId,
      resolvedTenantId,
    });
  }

  return ctx;
}
