/**
 * src/shared/http/auth-context.ts
 *
 * WHY:
 * - Authentication (who is calling) is decided once per request, before handlers run.
 * - Access tokens are stateless: the signature + expiry are the whole check.
 *
 * HOW IT WORKS:
 * 1. registerAuthContext() sets req.authContext = null on every request.
 * 2. If an `Authorization: Bearer <jwt>` header is present, the injected verifier checks it.
 * 3. A valid token populates req.authContext; an invalid/expired one leaves it null.
 *
 * RULES:
 * - Never throws for bad tokens: endpoints decide if auth is required (requireAuthContext).
 * - Tenant binding is NOT checked here; requireAuthContext compares the claim with the
 *   resolved tenant so the 403 is raised only on routes that need a user.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { AccessTokenIssuer, UserRole } from '../security/access-token';

export type AuthContext = Readonly<{
  userId: string;
  tenantId: string;
  role: UserRole;
  email: string;
  tokenId: string;
}>;

declare module 'fastify' {
  interface FastifyRequest {
    authContext: AuthContext | null;
  }
}

const BEARER_PREFIX = /^bearer\s+/i;

export function readBearerToken(header: unknown): string | null {
  if (typeof header !== 'string') return null;
  if (!BEARER_PREFIX.test(header)) return null;

  const token = header.replace(BEARER_PREFIX, '').trim();
  return token ? token : null;
}

export function registerAuthContext(
  app: FastifyInstance,
  verifier: Pick<AccessTokenIssuer, 'verifyAccessToken'>,
): void {
  app.decorateRequest('authContext', null);

  app.addHook('onRequest', async (req: FastifyRequest) => {
    req.authContext = null;

    const token = readBearerToken(req.headers.authorization);
    if (!token) return;

    const verified = await verifier.verifyAccessToken(token);
    if (!verified.ok) return;

    const claims = verified.value;
    req.authContext = Object.freeze({
      userId: claims.userId,
      tenantId: claims.tenantId,
      role: claims.role,
      email: claims.email,
      tokenId: claims.tokenId,
    });
  });
}
