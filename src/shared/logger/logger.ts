/**
 * src/shared/logger/logger.ts
 *
 * WHY:
 * - One structured JSON logger for the auth service (tenant resolution, auth flows,
 *   security audit, startup).
 * - Every entry carries service + env, and passes through redactSecrets() so a stray
 *   `{ refreshToken }` or `{ password }` in meta is masked before it is written.
 *
 * HOW TO USE:
 * - Inside a request: `withRequestContext(req).info('auth.login.success', { flow })`.
 * - Outside a request (startup, Redis client events, seed): import `logger`.
 * - Pass errors as `{ err }` so stack/message are kept.
 * - Emails in operational logs are fine; raw credentials never are.
 */

import winston from 'winston';
import { redactSecrets } from './redact';

const nodeEnv = process.env.NODE_ENV ?? 'development';
const service = process.env.SERVICE_NAME ?? 'saas-tenant-auth';
const level = process.env.LOG_LEVEL ?? 'info';

export const logger = winston.createLogger({
  level,
  format: winston.format.combine(
    redactSecrets(),
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: { service, env: nodeEnv },
  transports: [new winston.transports.Console()],
});

export type Logger = typeof logger;
