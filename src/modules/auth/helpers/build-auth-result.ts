/**
 * src/modules/auth/helpers/build-auth-result.ts
 *
 * WHY:
 * - Register, login and refresh all end the same way: mint an access token for the
 *   user + tenant and pair it with the freshly issued refresh token.
 *
 * RULES:
 * - Called AFTER the flow's transaction committed (no token for rolled-back state).
 */

import type { AccessTokenIssuer } from '../../../shared/security/access-token';
import type { IssuedRefreshToken } from '../../../shared/security/refresh-token-generator';
import { toUserProfile, type NewUser, type User } from '../../users';
import type { AuthResult } from '../auth.types';

export async function buildAuthResult(input: {
  accessTokens: AccessTokenIssuer;
  user: User | NewUser;
  tenantId: string;
  refresh: IssuedRefreshToken;
}): Promise<AuthResult> {
  const { user } = input;

  const access = await input.accessTokens.issueAccessToken(
    {
      id: user.id,
      email: user.email,
      firstName: user.firstName,
      lastName: user.lastName,
      role: user.role,
    },
    input.tenantId,
  );

  return {
    accessToken: access.token,
    accessTokenExpiresAt: access.expiresAt,
    refreshToken: input.refresh.token,
    refreshTokenExpiresAt: input.refresh.expiresAt,
    user: toUserProfile(user),
  };
}
