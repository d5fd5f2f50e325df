/**
 * src/shared/http/security-audit.ts
 *
 * WHY:
 * - 401/403/429 responses are the signal for credential stuffing, token replay and
 *   cross-tenant probing. Each one is logged AND kept in audit_events.
 * - Handlers raise these through many paths (guards, flows, rate limiter, tenant resolver);
 *   observing the final status code catches all of them in one place.
 *
 * RULES:
 * - Runs onSend, after the error handler picked the status code.
 * - Never records raw tokens, passwords or cookies.
 * - A failed audit write is logged and never changes the response.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { AuditWriter } from '../audit/audit.writer';
import type { AuditRepo } from '../audit/audit.repo';
import type { KnownAuditAction } from '../audit/audit.types';
import { withRequestContext } from '../logger/with-context';

const ACTION_BY_STATUS: ReadonlyMap<number, KnownAuditAction> = new Map([
  [401, 'security.unauthorized'],
  [403, 'security.forbidden'],
  [429, 'security.rate_limited'],
]);

export function securityActionForStatus(statusCode: number): KnownAuditAction | null {
  return ACTION_BY_STATUS.get(statusCode) ?? null;
}

function readUserAgent(req: FastifyRequest): string | null {
  const ua = req.headers['user-agent'];
  return typeof ua === 'string' && ua ? ua : null;
}

export function registerSecurityAudit(app: FastifyInstance, auditRepo: AuditRepo): void {
  app.addHook('onSend', async (req, reply, payload) => {
    const action = securityActionForStatus(reply.statusCode);
    if (!action) return payload;

    const log = withRequestContext(req);
    const details = {
      statusCode: reply.statusCode,
      method: req.method,
      path: req.url.split('?')[0] ?? req.url,
      ip: req.ip,
      attemptedSubdomain: req.requestContext?.tenantKey ?? null,
      tokenTenantId: req.authContext?.tenantId ?? null,
    };

    log.warn(action, { flow: 'security.audit', ...details });

    const audit = new AuditWriter(auditRepo, {
      requestId: req.requestContext?.requestId ?? null,
      ip: req.ip,
      userAgent: readUserAgent(req),
      tenantId: req.tenantContext?.tenantId ?? null,
      userId: req.authContext?.userId ?? null,
    });

    try {
      await audit.append(action, details);
    } catch (err) {
      log.error('security.audit_write_failed', {
        flow: 'security.audit',
        action,
        message: err instanceof Error ? err.message : String(err),
      });
    }

    return payload;
  });
}
