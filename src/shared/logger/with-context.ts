/**
 * src/shared/logger/with-context.ts
 *
 * WHY:
 * - A log line from inside a request must say which request, which tenant and which
 *   caller it belongs to, without every flow repeating those fields.
 *
 * HOW TO USE:
 * - withRequestContext(req).warn('security.unauthorized', { statusCode: 401 })
 *
 * RULES:
 * - tenantKey is the raw candidate from the request; subdomain/tenantId are set only
 *   once the tenant resolved. Both are logged so a rejected tenant is still traceable.
 * - Caller fields come from a verified access token only (authContext), never the body.
 * - Per-call meta wins over the base fields.
 */

import type { FastifyRequest } from 'fastify';
import { logger } from './logger';

type LogMeta = Record<string, unknown>;
type LogFn = (msg: string, meta?: LogMeta) => void;

export type RequestLogger = Readonly<Record<'debug' | 'info' | 'warn' | 'error', LogFn>>;

function requestLogFields(req: FastifyRequest): LogMeta {
  return {
    requestId: req.requestContext?.requestId,
    host: req.requestContext?.host ?? null,
    tenantKey: req.requestContext?.tenantKey ?? null,
    subdomain: req.tenantContext?.subdomain ?? null,
    tenantId: req.tenantContext?.tenantId ?? null,
    userId: req.authContext?.userId ?? null,
    role: req.authContext?.role ?? null,
    tokenId: req.authContext?.tokenId ?? null,
  };
}

export function withRequestContext(req: FastifyRequest): RequestLogger {
  const base = requestLogFields(req);
  const at =
    (level: keyof RequestLogger): LogFn =>
    (msg, meta = {}) => {
      logger.log(level, msg, { ...base, ...meta });
    };

  return { debug: at('debug'), info: at('info'), warn: at('warn'), error: at('error') };
}
