/**
 * src/shared/http/refresh-cookie.ts
 *
 * WHY:
 * - Register, login, refresh and logout all set or clear the same cookie with the same flags.
 * - Centralising here means HttpOnly / Secure / SameSite=Strict / Path can never drift.
 *
 * RULES:
 * - No business logic here.
 * - Path is scoped to /api/auth so the token is only sent to auth endpoints.
 * - The cookie expires together with the refresh token it carries.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

export const REFRESH_COOKIE_NAME = 'refreshToken';
export const REFRESH_COOKIE_PATH = '/api/auth';

const BASE_ATTRIBUTES = [`Path=${REFRESH_COOKIE_PATH}`, 'HttpOnly', 'Secure', 'SameSite=Strict'];

/**
 * Parses a raw Cookie header into key-value pairs.
 * Handles the standard format: "key1=value1; key2=value2"
 */
export function parseCookies(raw: string | undefined): Record<string, string> {
  if (!raw) return {};

  const cookies: Record<string, string> = {};
  for (const pair of raw.split(';')) {
    const eqIdx = pair.indexOf('=');
    if (eqIdx === -1) continue;

    const key = pair.substring(0, eqIdx).trim();
    const value = pair.substring(eqIdx + 1).trim();
    if (key) cookies[key] = value;
  }
  return cookies;
}

export function readRefreshCookie(req: FastifyRequest): string | null {
  const value = parseCookies(req.headers.cookie)[REFRESH_COOKIE_NAME];
  return value ? value : null;
}

export function buildRefreshCookie(token: string, expiresAt: Date, now: Date = new Date()): string {
  const maxAge = Math.max(0, Math.floor((expiresAt.getTime() - now.getTime()) / 1000));

  return [
    `${REFRESH_COOKIE_NAME}=${token}`,
    ...BASE_ATTRIBUTES,
    `Expires=${expiresAt.toUTCString()}`,
    `Max-Age=${maxAge}`,
  ].join('; ');
}

export function buildClearedRefreshCookie(): string {
  // Max-Age=0 instructs the browser to delete the cookie immediately.
  return [`${REFRESH_COOKIE_NAME}=`, ...BASE_ATTRIBUTES, 'Max-Age=0'].join('; ');
}

export function setRefreshCookie(reply: FastifyReply, token: string, expiresAt: Date): void {
  reply.header('Set-Cookie', buildRefreshCookie(token, expiresAt));
}

export function clearRefreshCookie(reply: FastifyReply): void {
  reply.header('Set-Cookie', buildClearedRefreshCookie());
}
