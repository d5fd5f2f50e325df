/**
 * src/shared/security/password-hasher.ts
 *
 * WHY:
 * - Password hashing must be consistent, safe, and easy to swap.
 * - Services should depend on an interface (DIP), not bcrypt directly.
 *
 * CONTRACT:
 * - hash(plain): fresh salt per call; empty/whitespace plaintext is an input error (throws).
 * - verify(plain, hash): never throws for bad input; empty/whitespace/malformed → false.
 */

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, hash: string): Promise<boolean>;
}
