import { describe, it, expect } from 'vitest';
import {
  authFailureToAppError,
  httpStatusForAuthFailure,
} from '../../../src/modules/auth/auth.errors';
import { AppError, httpStatusForCode } from '../../../src/shared/http/errors';

describe('auth failure mapping', () => {
  it.each([
    ['invalid_credentials', 401, 'Invalid email or password.'],
    ['invalid_refresh_token', 401, 'Invalid refresh token.'],
    ['refresh_token_revoked', 401, 'Refresh token has been revoked.'],
    ['refresh_token_expired', 401, 'Refresh token has expired.'],
    ['email_already_registered', 409, 'An account with this email already exists.'],
    ['tenant_not_found', 404, 'Tenant not found.'],
    ['tenant_inactive', 403, 'Tenant is not active.'],
    ['user_not_found', 404, 'User not found.'],
    ['tenant_mismatch', 403, 'User does not belong to this tenant.'],
  ] as const)('%s => %i %s', (reason, status, message) => {
    expect(httpStatusForAuthFailure(reason)).toBe(status);

    const e = authFailureToAppError(reason);
    expect(e).toBeInstanceOf(AppError);
    expect(e.status).toBe(status);
    expect(e.message).toBe(message);
    expect(e.meta).toEqual({ reason });
  });

  it('merges extra meta after the reason', () => {
    expect(authFailureToAppError('invalid_credentials', { emailDomain: 'x.com' }).meta).toEqual({
      reason: 'invalid_credentials',
      emailDomain: 'x.com',
    });
  });
});

describe('httpStatusForCode', () => {
  it.each([
    ['VALIDATION_ERROR', 400],
    ['UNAUTHORIZED', 401],
    ['FORBIDDEN', 403],
    ['NOT_FOUND', 404],
    ['CONFLICT', 409],
    ['RATE_LIMITED', 429],
    ['INTERNAL', 500],
  ] as const)('%s => %i', (code, status) => {
    expect(httpStatusForCode(code)).toBe(status);
  });
});
