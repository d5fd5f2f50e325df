/**
 * src/shared/logger/redact.ts
 *
 * Credentials that must never reach a log line: passwords, raw refresh/access tokens,
 * token digests, password hashes, the signing secret and raw auth headers.
 *
 * - redactMeta(meta): copy with sensitive values replaced (error meta, audit metadata).
 * - redactSecrets(): winston format applying the same rule to every log entry.
 */

import winston from 'winston';

const REDACTED = '[REDACTED]';

const SENSITIVE_META_KEYS: ReadonlySet<string> = new Set([
  'token',
  'accessToken',
  'refreshToken',
  'tokenHash',
  'password',
  'passwordHash',
  'secret',
  'authorization',
  'cookie',
]);

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_META_KEYS.has(key);
}

export function redactMeta(meta: Record<string, unknown> | undefined): Record<string, unknown> {
  if (!meta) return {};

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = isSensitiveKey(k) ? REDACTED : v;
  }
  return out;
}

export const redactSecrets = winston.format((info) => {
  for (const key of Object.keys(info)) {
    if (isSensitiveKey(key)) info[key] = REDACTED;
  }
  return info;
});
