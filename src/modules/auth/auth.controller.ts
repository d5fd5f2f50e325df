/**
 * src/modules/auth/auth.controller.ts
 *
 * WHY:
 * - Maps HTTP → service call for all auth endpoints.
 * - Sets the refresh cookie on success (register, login, refresh), clears it on logout.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Failure reasons become AppErrors here and nowhere else (authFailureToAppError).
 * - Cookie logic lives in shared/http/refresh-cookie (DRY).
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { AppError } from '../../shared/http/errors';
import {
  clearRefreshCookie,
  readRefreshCookie,
  setRefreshCookie,
} from '../../shared/http/refresh-cookie';
import { requireAuthContext } from '../../shared/http/require-auth-context';
import { requireTenantContext } from '../../shared/http/tenant-context';
import { loginSchema, refreshTokenBodySchema, registerSchema } from './auth.schemas';
import { authFailureToAppError } from './auth.errors';
import type { AuthService } from './auth.service';
import type { AuthRequestMeta, AuthTenant } from './auth.types';

function requestMeta(req: FastifyRequest): AuthRequestMeta {
  return {
    requestId: req.requestContext.requestId,
    ip: req.ip,
    userAgent: req.headers['user-agent'] ?? null,
  };
}

function requestTenant(req: FastifyRequest): AuthTenant {
  const { tenantId, subdomain } = requireTenantContext(req);
  return { tenantId, subdomain };
}

/** Body wins over the cookie so API clients without cookies can still refresh. */
function readRefreshToken(req: FastifyRequest): string | null {
  const parsed = refreshTokenBodySchema.safeParse(req.body ?? undefined);
  if (!parsed.success) {
    throw AppError.validationError('Invalid request body', {
      issues: parsed.error.issues,
    });
  }
  return parsed.data?.refreshToken ?? readRefreshCookie(req);
}

export class AuthController {
  constructor(private readonly authService: AuthService) {}

  async register(req: FastifyRequest, reply: FastifyReply) {
    const parsed = registerSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const result = await this.authService.register({
      tenant: requestTenant(req),
      email: parsed.data.email,
      password: parsed.data.password,
      firstName: parsed.data.firstName,
      lastName: parsed.data.lastName,
      meta: requestMeta(req),
    });
    if (!result.ok) throw authFailureToAppError(result.error);

    setRefreshCookie(reply, result.value.refreshToken, result.value.refreshTokenExpiresAt);
    return reply.status(201).send(result.value);
  }

  async login(req: FastifyRequest, reply: FastifyReply) {
    const parsed = loginSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const result = await this.authService.login({
      tenant: requestTenant(req),
      email: parsed.data.email,
      password: parsed.data.password,
      meta: requestMeta(req),
    });
    if (!result.ok) throw authFailureToAppError(result.error);

    setRefreshCookie(reply, result.value.refreshToken, result.value.refreshTokenExpiresAt);
    return reply.status(200).send(result.value);
  }

  async refresh(req: FastifyRequest, reply: FastifyReply) {
    const tenant = requestTenant(req);
    const refreshToken = readRefreshToken(req);
    if (!refreshToken) throw authFailureToAppError('invalid_refresh_token');

    const result = await this.authService.refresh({
      tenant,
      refreshToken,
      meta: requestMeta(req),
    });
    if (!result.ok) throw authFailureToAppError(result.error);

    setRefreshCookie(reply, result.value.refreshToken, result.value.refreshTokenExpiresAt);
    return reply.status(200).send(result.value);
  }

  async logout(req: FastifyRequest, reply: FastifyReply) {
    await this.authService.logout({
      tenant: requestTenant(req),
      refreshToken: readRefreshToken(req),
      meta: requestMeta(req),
    });

    clearRefreshCookie(reply);
    return reply.status(204).send();
  }

  async me(req: FastifyRequest, reply: FastifyReply) {
    const auth = requireAuthContext(req);

    const result = await this.authService.getCurrentUser(auth.userId, auth.tenantId);
    if (!result.ok) throw authFailureToAppError(result.error, { userId: auth.userId });

    return reply.status(200).send({ user: result.value });
  }
}
