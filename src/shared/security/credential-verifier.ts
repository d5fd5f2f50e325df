/**
 * src/shared/security/credential-verifier.ts
 *
 * WHY:
 * - Login must take the same time whether or not the email exists in the tenant.
 *   Skipping bcrypt on a user miss leaks account existence through latency.
 *
 * HOW TO USE:
 * - const verifier = await CredentialVerifier.create(passwordHasher)  // at startup
 * - const ok = await verifier.verify(password, user?.passwordHash ?? null)
 *
 * RULES:
 * - A null hash (user miss) is compared against a dummy hash with the same cost, then false.
 * - The dummy hash is computed once, before the first request, so no miss pays for it.
 */

import type { PasswordHasher } from './password-hasher';

const DUMMY_PASSWORD = 'dummy-password-for-timing-equalisation';

export class CredentialVerifier {
  private constructor(
    private readonly hasher: PasswordHasher,
    private readonly dummyHash: string,
  ) {}

  static async create(hasher: PasswordHasher): Promise<CredentialVerifier> {
    return new CredentialVerifier(hasher, await hasher.hash(DUMMY_PASSWORD));
  }

  async verify(plain: string, passwordHash: string | null): Promise<boolean> {
    if (passwordHash === null) {
      await this.hasher.verify(plain, this.dummyHash);
      return false;
    }

    return this.hasher.verify(plain, passwordHash);
  }
}
