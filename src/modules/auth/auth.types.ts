/**
 * src/modules/auth/auth.types.ts
 *
 * WHY:
 * - Types shared by the auth flows, service and controller.
 * - Response types define what register/login/refresh return.
 *
 * RULES:
 * - Never include password hashes in response types.
 * - The raw refresh token appears only in AuthResult (once, to the client).
 */

import type { UserProfile } from '../users';

/** Request metadata every flow receives; flows never see Fastify objects. */
export type AuthRequestMeta = Readonly<{
  requestId: string;
  ip: string;
  userAgent: string | null;
}>;

/** The tenant resolved by the tenant-context hook. */
export type AuthTenant = Readonly<{
  tenantId: string;
  subdomain: string;
}>;

export type AuthResult = {
  accessToken: string;
  accessTokenExpiresAt: Date;
  refreshToken: string;
  refreshTokenExpiresAt: Date;
  user: UserProfile;
};

export const AUTH_FAILURE_REASONS = [
  'invalid_credentials',
  'invalid_refresh_token',
  'refresh_token_revoked',
  'refresh_token_expired',
  'email_already_registered',
  'tenant_not_found',
  'tenant_inactive',
  'user_not_found',
  'tenant_mismatch',
] as const;

export type AuthFailureReason = (typeof AUTH_FAILURE_REASONS)[number];
