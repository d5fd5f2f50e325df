/**
 * src/shared/security/jose-access-token-issuer.ts
 *
 * WHY:
 * - Short-lived HS256 access tokens carrying identity + tenant + role.
 * - Signing and verification go through jose.
 *
 * HOW TO USE:
 * - const issuer = new JoseAccessTokenIssuer({ secret, issuer, audience, ttlSeconds: 900 })
 * - const { token, expiresAt } = await issuer.issueAccessToken(user, tenantId)
 * - const res = await issuer.verifyAccessToken(token)  // Result<claims, 'invalid' | 'expired'>
 *
 * RULES:
 * - A secret shorter than 32 chars is a construction error (startup fails).
 * - No clock-skew tolerance on verify.
 * - Payload is re-validated with zod after signature verification.
 */

import { randomUUID } from 'node:crypto';
import { SignJWT, jwtVerify, errors } from 'jose';
import { z } from 'zod';

import { err, ok, type Result } from '../result';
import {
  USER_ROLES,
  type AccessTokenClaims,
  type AccessTokenIssuer,
  type AccessTokenSubject,
  type AccessTokenVerifyFailure,
} from './access-token';

const MIN_SECRET_LENGTH = 32;
const ALGORITHM = 'HS256';

const ClaimsSchema = z.object({
  sub: z.string().min(1),
  email: z.string().min(1),
  given_name: z.string(),
  family_name: z.string(),
  jti: z.string().min(1),
  tenant_id: z.string().min(1),
  role: z.enum(USER_ROLES),
  iat: z.number(),
  exp: z.number(),
});

export type JoseAccessTokenIssuerOptions = {
  secret: string;
  issuer: string;
  audience: string;
  ttlSeconds: number;
};

export class JoseAccessTokenIssuer implements AccessTokenIssuer {
  private readonly key: Uint8Array;
  private readonly issuer: string;
  private readonly audience: string;
  private readonly ttlSeconds: number;

  constructor(opts: JoseAccessTokenIssuerOptions) {
    if (opts.secret.trim().length < MIN_SECRET_LENGTH) {
      throw new Error(`JWT signing secret must be at least ${MIN_SECRET_LENGTH} characters`);
    }
    if (!opts.issuer || !opts.audience) {
      throw new Error('JWT issuer and audience must be configured');
    }

    this.key = new TextEncoder().encode(opts.secret);
    this.issuer = opts.issuer;
    this.audience = opts.audience;
    this.ttlSeconds = opts.ttlSeconds;
  }

  async issueAccessToken(
    user: AccessTokenSubject,
    tenantId: string,
  ): Promise<{ token: string; expiresAt: Date }> {
    const issuedAt = Math.floor(Date.now() / 1000);
    const expiresAt = issuedAt + this.ttlSeconds;

    const token = await new SignJWT({
      email: user.email,
      given_name: user.firstName,
      family_name: user.lastName,
      tenant_id: tenantId,
      role: user.role,
    })
      .setProtectedHeader({ alg: ALGORITHM, typ: 'JWT' })
      .setSubject(user.id)
      .setJti(randomUUID())
      .setIssuer(this.issuer)
      .setAudience(this.audience)
      .setIssuedAt(issuedAt)
      .setExpirationTime(expiresAt)
      .sign(this.key);

    return { token, expiresAt: new Date(expiresAt * 1000) };
  }

  async verifyAccessToken(
    token: string,
  ): Promise<Result<AccessTokenClaims, AccessTokenVerifyFailure>> {
    let payload: unknown;
    try {
      const verified = await jwtVerify(token, this.key, {
        issuer: this.issuer,
        audience: this.audience,
        algorithms: [ALGORITHM],
        clockTolerance: 0,
      });
      payload = verified.payload;
    } catch (e) {
      if (e instanceof errors.JWTExpired) return err('expired');
      if (e instanceof errors.JOSEError) return err('invalid');
      throw e;
    }

    const parsed = ClaimsSchema.safeParse(payload);
    if (!parsed.success) return err('invalid');

    const claims = parsed.data;
    return ok({
      userId: claims.sub,
      email: claims.email,
      givenName: claims.given_name,
      familyName: claims.family_name,
      tokenId: claims.jti,
      tenantId: claims.tenant_id,
      role: claims.role,
      issuedAt: new Date(claims.iat * 1000),
      expiresAt: new Date(claims.exp * 1000),
    });
  }
}
