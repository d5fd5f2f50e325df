/**
 * src/modules/refresh-tokens/refresh-token.types.ts
 *
 * States: Issued → Revoked (terminal), Issued → Expired (time based).
 * The only mutation after insert is revoke.
 */

export type RefreshTokenRecord = Readonly<{
  id: string;
  userId: string;
  /** tenant of the owning user (joined, not stored on the token row) */
  ownerTenantId: string;
  tokenHash: string;
  expiresAt: Date;
  isRevoked: boolean;
  revokedAt: Date | null;
  createdAt: Date;
}>;

export type NewRefreshToken = Readonly<{
  id: string;
  userId: string;
  tokenHash: string;
  expiresAt: Date;
  createdAt: Date;
}>;

export type RefreshTokenFailure =
  | 'invalid_refresh_token'
  | 'refresh_token_revoked'
  | 'refresh_token_expired';

export type LogoutRevokeOutcome = 'revoked' | 'already_revoked' | 'not_found';
