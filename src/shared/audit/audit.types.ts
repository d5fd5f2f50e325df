/**
 * src/shared/audit/audit.types.ts
 *
 * WHY:
 * - Central audit event types (security/compliance trail stored in DB).
 * - AuditContext groups the request-level fields that repeat on every event.
 * - AuditAction uses a union + escape hatch to catch typos early
 *   while still allowing new actions without touching this file.
 *
 * RULES:
 * - Metadata is a plain object (repo serializes to JSON for DB).
 * - Never import module types here (shared must stay module-agnostic).
 */

export type KnownAuditAction =
  // Auth
  | 'auth.register.success'
  | 'auth.login.success'
  | 'auth.login.failed'
  | 'auth.token.refreshed'
  | 'auth.token.refresh_failed'
  | 'auth.logout'
  | 'auth.refresh_tokens.capped'
  // Security (written by the onSend hook for 401/403/429)
  | 'security.unauthorized'
  | 'security.forbidden'
  | 'security.rate_limited'
  // Tenants
  | 'tenant.created'
  | 'tenant.status_changed';

export type AuditAction = KnownAuditAction | (string & {});

export type AuditMetadata = Record<string, unknown>;

/**
 * Request-level context shared by every audit event of one request.
 * Built progressively: requestId/ip/userAgent → + tenantId → + userId.
 */
export type AuditContext = {
  tenantId: string | null;
  userId: string | null;

  requestId: string | null;
  ip: string | null;
  userAgent: string | null;
};

export type AuditEventInsert = AuditContext & {
  action: AuditAction;
  metadata?: AuditMetadata;
};

export type AuditEvent = AuditContext & {
  id: string;
  action: string;
  metadata: AuditMetadata;
  createdAt: Date;
};
