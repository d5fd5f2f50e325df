/**
 * src/shared/http/request-context.ts
 *
 * WHY:
 * - Multi-tenancy requires we know which tenant a request belongs to.
 * - We also want a stable requestId for logs, debugging, auditing, and tracing.
 *
 * HOW TO USE:
 * - Registered once in app/server.ts via registerRequestContext(app).
 * - After registration, every request has `req.requestContext`.
 *
 * RULES:
 * - tenantKey is the RAW candidate subdomain (not validated, not looked up).
 *   The tenant resolver hook validates and resolves it.
 * - tenantKey can be null (bare localhost, apex domain, missing Host header).
 * - Precedence: X-Tenant-Subdomain header → ?tenant= query → host.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { randomUUID } from 'node:crypto';

export const TENANT_HEADER = 'x-tenant-subdomain';
export const TENANT_QUERY_PARAM = 'tenant';

export type RequestContext = {
  requestId: string;
  host: string | null;
  tenantKey: string | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}

const LOOPBACK_HOSTS = new Set(['localhost', '127.0.0.1', '::1', '[::1]']);
const IPV4_LITERAL = /^\d{1,3}(\.\d{1,3}){3}$/;

export function parseHost(rawHost: unknown): string | null {
  if (typeof rawHost !== 'string') return null;

  const trimmed = rawHost.trim().toLowerCase();
  if (!trimmed) return null;

  // bracketed IPv6 with optional port: "[::1]:3000"
  if (trimmed.startsWith('[')) {
    const end = trimmed.indexOf(']');
    return end > 0 ? trimmed.slice(0, end + 1) : null;
  }

  // bare IPv6 (no port possible without brackets)
  if (trimmed.split(':').length > 2) return trimmed;

  // strip port if present (e.g., "acme.localhost:3000")
  return trimmed.split(':')[0] || null;
}

/**
 * Extracts a tenant key from the host.
 *
 * Supported:
 * - <tenant>.localhost
 * - <tenant>.<domain>.<tld> (e.g., acme.example.com)
 *
 * Returns null for:
 * - localhost / loopback / IP literals (header required)
 * - apex domain (example.com) because there's no tenant segment
 */
export function extractTenantKeyFromHost(host: string | null): string | null {
  if (!host) return null;

  if (LOOPBACK_HOSTS.has(host)) return null;
  if (IPV4_LITERAL.test(host)) return null;

  if (host.endsWith('.localhost')) {
    const [tenant] = host.split('.');
    return tenant && tenant !== 'localhost' ? tenant : null;
  }

  const parts = host.split('.');
  if (parts.length >= 3) {
    const candidate = parts[0];
    return candidate ? candidate : null;
  }

  return null;
}

function firstNonEmpty(value: unknown): string | null {
  const raw = Array.isArray(value) ? value[0] : value;
  if (typeof raw !== 'string') return null;
  const trimmed = raw.trim();
  return trimmed ? trimmed : null;
}

export function extractTenantSubdomain(input: {
  host: string | null;
  headerValue: unknown;
  queryValue: unknown;
}): string | null {
  return (
    firstNonEmpty(input.headerValue) ??
    firstNonEmpty(input.queryValue) ??
    extractTenantKeyFromHost(input.host)
  );
}

function readQueryParam(query: unknown, name: string): unknown {
  if (!query || typeof query !== 'object') return undefined;
  return Object.entries(query).find(([k]) => k === name)?.[1];
}

export function registerRequestContext(app: FastifyInstance) {
  app.decorateRequest('requestContext', null);

  // IMPORTANT: Fastify hooks must either be async OR accept `done`.
  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    const host = parseHost(req.headers.host);
    const tenantKey = extractTenantSubdomain({
      host,
      headerValue: req.headers[TENANT_HEADER],
      queryValue: readQueryParam(req.query, TENANT_QUERY_PARAM),
    });

    req.requestContext = {
      requestId: randomUUID(),
      host,
      tenantKey,
    };

    done();
  });
}
