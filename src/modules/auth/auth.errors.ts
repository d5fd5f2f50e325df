/**
 * src/modules/auth/auth.errors.ts
 *
 * WHY:
 * - Auth module owns its domain-specific error semantics.
 * - Flows return failure REASONS; this file is the one pure mapping from a reason
 *   to code/status/message at the HTTP boundary.
 * - Security-safe: messages never reveal whether an email exists.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include passwords, tokens, or hashes in meta.
 */

import {
  AppError,
  httpStatusForCode,
  type AppErrorCode,
  type AppErrorMeta,
} from '../../shared/http/errors';
import type { AuthFailureReason } from './auth.types';

type FailureMapping = Readonly<{ code: AppErrorCode; message: string }>;

export const AUTH_FAILURES: Readonly<Record<AuthFailureReason, FailureMapping>> = {
  invalid_credentials: { code: 'UNAUTHORIZED', message: 'Invalid email or password.' },
  invalid_refresh_token: { code: 'UNAUTHORIZED', message: 'Invalid refresh token.' },
  refresh_token_revoked: { code: 'UNAUTHORIZED', message: 'Refresh token has been revoked.' },
  refresh_token_expired: { code: 'UNAUTHORIZED', message: 'Refresh token has expired.' },
  email_already_registered: {
    code: 'CONFLICT',
    message: 'An account with this email already exists.',
  },
  tenant_not_found: { code: 'NOT_FOUND', message: 'Tenant not found.' },
  tenant_inactive: { code: 'FORBIDDEN', message: 'Tenant is not active.' },
  user_not_found: { code: 'NOT_FOUND', message: 'User not found.' },
  tenant_mismatch: { code: 'FORBIDDEN', message: 'User does not belong to this tenant.' },
};

export function httpStatusForAuthFailure(reason: AuthFailureReason): number {
  return httpStatusForCode(AUTH_FAILURES[reason].code);
}

export function authFailureToAppError(reason: AuthFailureReason, meta?: AppErrorMeta): AppError {
  const mapping = AUTH_FAILURES[reason];
  return new AppError({ code: mapping.code, message: mapping.message, meta: { reason, ...meta } });
}
