import { describe, it, expect } from 'vitest';
import { RefreshTokenGenerator } from '../../../../src/shared/security/refresh-token-generator';
import { Sha256TokenHasher } from '../../../../src/shared/security/sha256-token-hasher';

describe('RefreshTokenGenerator', () => {
  const hasher = new Sha256TokenHasher();
  const generator = new RefreshTokenGenerator(hasher, 7);

  it('issues 64 random bytes as base64url, expiring after the TTL', () => {
    const now = new Date('2026-03-01T10:00:00.000Z');
    const issued = generator.issue(now);

    expect(issued.token).toMatch(/^[A-Za-z0-9_-]{86}$/);
    expect(issued.tokenHash).toBe(hasher.hash(issued.token));
    expect(issued.expiresAt).toEqual(new Date('2026-03-08T10:00:00.000Z'));
  });

  it('never repeats a token', () => {
    expect(generator.issue().token).not.toBe(generator.issue().token);
  });

  it('hashes with SHA-256 hex', () => {
    expect(generator.hashOf('abc')).toBe(
      'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad',
    );
  });
});
