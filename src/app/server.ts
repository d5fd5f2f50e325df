/**
 * src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOOK ORDER (onRequest, LOCKED):
 * 1. request context (requestId + raw tenant key)
 * 2. auth context (bearer token → req.authContext, never throws)
 * 3. tenant context (resolve tenant, fail closed with 400/404/403)
 *
 * Then: request log, error handler, security audit (onSend for 401/403/429).
 */

import Fastify from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';
import { registerRequestContext } from '../shared/http/request-context';
import { registerAuthContext } from '../shared/http/auth-context';
import { registerTenantContext } from '../shared/http/tenant-context';
import { registerErrorHandler } from '../shared/http/error-handler';
import { registerSecurityAudit } from '../shared/http/security-audit';
import { withRequestContext } from '../shared/logger/with-context';

export async function buildServer(opts: { config: AppConfig; deps: AppDeps }) {
  const app = Fastify({
    logger: false, // we use our own Winston logger
    trustProxy: opts.config.nodeEnv === 'production',
  });

  registerRequestContext(app);
  registerAuthContext(app, opts.deps.accessTokens);
  registerTenantContext(app, opts.deps.tenants.resolveTenant);

  app.addHook('onResponse', (req, reply, done) => {
    withRequestContext(req).info('request', {
      flow: 'http.request',
      method: req.method,
      url: req.url,
      statusCode: reply.statusCode,
    });
    done();
  });

  registerErrorHandler(app);
  registerSecurityAudit(app, opts.deps.auditRepo);

  return app;
}
