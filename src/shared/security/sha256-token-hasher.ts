/**
 * src/shared/security/sha256-token-hasher.ts
 *
 * SHA-256 hex digest. Refresh tokens carry 512 bits of entropy, so an unsalted
 * fast hash is sufficient (no dictionary to attack).
 */

import { createHash } from 'node:crypto';
import type { TokenHasher } from './token-hasher';

export class Sha256TokenHasher implements TokenHasher {
  hash(rawToken: string): string {
    return createHash('sha256').update(rawToken, 'utf8').digest('hex');
  }
}
