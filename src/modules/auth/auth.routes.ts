/**
 * src/modules/auth/auth.routes.ts
 *
 * WHY:
 * - Declares Auth module endpoints.
 * - Keeps routing separate from controller logic.
 *
 * RULES:
 * - No business logic here.
 * - /refresh-token is kept as an alias of /refresh for older clients.
 */

import type { FastifyInstance } from 'fastify';
import type { AuthController } from './auth.controller';

export const AUTH_ROUTE_PREFIX = '/api/auth';

export function registerAuthRoutes(app: FastifyInstance, controller: AuthController) {
  app.post(`${AUTH_ROUTE_PREFIX}/register`, controller.register.bind(controller));
  app.post(`${AUTH_ROUTE_PREFIX}/login`, controller.login.bind(controller));
  app.post(`${AUTH_ROUTE_PREFIX}/refresh`, controller.refresh.bind(controller));
  app.post(`${AUTH_ROUTE_PREFIX}/refresh-token`, controller.refresh.bind(controller));
  app.post(`${AUTH_ROUTE_PREFIX}/logout`, controller.logout.bind(controller));
  app.get(`${AUTH_ROUTE_PREFIX}/me`, controller.me.bind(controller));
}
