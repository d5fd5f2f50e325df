/**
 * src/shared/security/access-token.ts
 *
 * WHY:
 * - Services depend on an access-token interface (DIP), not on the JWT library.
 * - Claims shape is shared by the issuer, the auth-context hook, and tests.
 *
 * RULES:
 * - Claim names follow registered/OIDC names (sub, email, given_name, family_name, jti)
 *   plus tenant_id and role.
 * - Access tokens are never stored server-side.
 */

import type { Result } from '../result';

export const USER_ROLES = ['USER', 'ADMIN', 'SUPER_ADMIN'] as const;
export type UserRole = (typeof USER_ROLES)[number];

export function isUserRole(value: unknown): value is UserRole {
  return typeof value === 'string' && USER_ROLES.some((r) => r === value);
}

export type AccessTokenSubject = Readonly<{
  id: string;
  email: string;
  firstName: string;
  lastName: string;
  role: UserRole;
}>;

export type AccessTokenClaims = Readonly<{
  userId: string;
  email: string;
  givenName: string;
  familyName: string;
  tokenId: string;
  tenantId: string;
  role: UserRole;
  issuedAt: Date;
  expiresAt: Date;
}>;

export type AccessTokenVerifyFailure = 'invalid' | 'expired';

export interface AccessTokenIssuer {
  issueAccessToken(
    user: AccessTokenSubject,
    tenantId: string,
  ): Promise<{ token: string; expiresAt: Date }>;

  verifyAccessToken(token: string): Promise<Result<AccessTokenClaims, AccessTokenVerifyFailure>>;
}
