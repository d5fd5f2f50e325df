/**
 * src/shared/security/token-hasher.ts
 *
 * WHY:
 * - Refresh tokens are bearer capabilities; a DB leak must not hand out usable sessions.
 * - We persist only a digest and look tokens up by exact digest match.
 * - The same digest keys PII-free rate-limit buckets (emailKey).
 *
 * RULES:
 * - Deterministic: the same raw value always yields the same digest.
 * - Callers depend on this interface (DIP), never on node:crypto directly.
 */

export interface TokenHasher {
  hash(rawToken: string): string;
}
