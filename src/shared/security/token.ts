/**
 * src/shared/security/token.ts
 *
 * WHY:
 * - Opaque refresh tokens must come from the CSPRNG and carry no claims.
 *
 * HOW TO USE:
 * - const raw = generateSecureToken()          // 64 random bytes
 * - Return raw to the client, persist only tokenHasher.hash(raw).
 */

import { randomBytes } from 'node:crypto';

export const REFRESH_TOKEN_BYTES = 64;

export function generateSecureToken(bytes: number = REFRESH_TOKEN_BYTES): string {
  // URL/cookie-safe base64 (no + / =)
  return randomBytes(bytes).toString('base64url');
}
