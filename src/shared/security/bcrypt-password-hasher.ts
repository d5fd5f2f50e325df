/**
 * src/shared/security/bcrypt-password-hasher.ts
 *
 * WHY:
 * - Bcrypt is an adaptive, salted hash (cost factor 12 by default).
 * - We encapsulate it behind PasswordHasher so the rest of the app stays clean.
 *
 * RULES:
 * - bcrypt reads only the first 72 bytes: hash() rejects longer input and verify() returns false.
 *
 * HOW TO USE:
 * - const hasher = new BcryptPasswordHasher({ cost: 12 })
 * - const hash = await hasher.hash('secret')
 * - const ok = await hasher.verify('secret', hash)
 */

import bcrypt from 'bcrypt';
import type { PasswordHasher } from './password-hasher';

const BCRYPT_MAX_BYTES = 72;
const BCRYPT_HASH_PATTERN = /^\$2[aby]\$\d{2}\$[./A-Za-z0-9]{53}$/;

export class BcryptPasswordHasher implements PasswordHasher {
  private readonly cost: number;

  constructor(opts?: { cost?: number }) {
    this.cost = opts?.cost ?? 12;
  }

  get workFactor(): number {
    return this.cost;
  }

  async hash(plain: string): Promise<string> {
    if (!plain || !plain.trim()) {
      throw new Error('Password cannot be empty');
    }
    if (Buffer.byteLength(plain, 'utf8') > BCRYPT_MAX_BYTES) {
      throw new Error(`Password exceeds ${BCRYPT_MAX_BYTES} bytes`);
    }
    return bcrypt.hash(plain, this.cost);
  }

  async verify(plain: string, hash: string): Promise<boolean> {
    if (!plain || !plain.trim()) return false;
    if (Buffer.byteLength(plain, 'utf8') > BCRYPT_MAX_BYTES) return false;
    if (!hash || !BCRYPT_HASH_PATTERN.test(hash)) return false;

    return bcrypt.compare(plain, hash);
  }
}
