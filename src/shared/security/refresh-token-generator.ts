/**
 * src/shared/security/refresh-token-generator.ts
 *
 * WHY:
 * - Refresh tokens are opaque random strings: 64 CSPRNG bytes, base64url.
 * - The raw value is returned once; only its digest is ever persisted.
 *
 * HOW TO USE:
 * - const { token, tokenHash, expiresAt } = generator.issue(now)
 */

import type { TokenHasher } from './token-hasher';
import { generateSecureToken, REFRESH_TOKEN_BYTES } from './token';

const DAY_MS = 24 * 60 * 60 * 1000;

export type IssuedRefreshToken = Readonly<{
  token: string;
  tokenHash: string;
  expiresAt: Date;
}>;

export class RefreshTokenGenerator {
  constructor(
    private readonly tokenHasher: TokenHasher,
    private readonly ttlDays: number,
  ) {}

  issue(now: Date = new Date()): IssuedRefreshToken {
    const token = generateSecureToken(REFRESH_TOKEN_BYTES);
    return {
      token,
      tokenHash: this.tokenHasher.hash(token),
      expiresAt: new Date(now.getTime() + this.ttlDays * DAY_MS),
    };
  }

  hashOf(rawToken: string): string {
    return this.tokenHasher.hash(rawToken);
  }
}
