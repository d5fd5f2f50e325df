/**
 * src/shared/audit/audit.repo.ts
 *
 * WHY:
 * - Append-only audit writer (DB persistence).
 *
 * RULES:
 * - DAL-style component: DB concerns only. No AppError.
 * - Must work with both DB and transactions (DbExecutor).
 * - Metadata is accepted as a plain object and serialized here.
 */

import { randomUUID } from 'node:crypto';

import type { DbExecutor } from '../db/db';
import type { AuditEvent, AuditEventInsert, AuditMetadata } from './audit.types';

function toJsonText(input: AuditMetadata | undefined): string {
  // JSON round-trip drops undefined, functions and symbols.
  return JSON.stringify(input ?? {});
}

function toMetadata(value: unknown): AuditMetadata {
  const parsed: unknown = typeof value === 'string' ? JSON.parse(value) : value;
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) return {};
  return Object.fromEntries(Object.entries(parsed));
}

export class AuditRepo {
  constructor(private readonly db: DbExecutor) {}

  /** Returns a repo bound to a different executor (e.g. a transaction). */
  withDb(db: DbExecutor): AuditRepo {
    return new AuditRepo(db);
  }

  async append(event: AuditEventInsert): Promise<void> {
    await this.db
      .insertInto('audit_events')
      .values({
        id: randomUUID(),
        action: event.action,
        tenant_id: event.tenantId,
        user_id: event.userId,
        request_id: event.requestId,
        ip: event.ip,
        user_agent: event.userAgent,
        metadata: toJsonText(event.metadata),
        created_at: new Date(),
      })
      .execute();
  }

  /** Read side used by the security dashboards and tests. */
  async listByAction(action: string): Promise<AuditEvent[]> {
    const rows = await this.db
      .selectFrom('audit_events')
      .selectAll()
      .where('action', '=', action)
      .orderBy('created_at', 'asc')
      .execute();

    return rows.map((r) => ({
      id: r.id,
      action: r.action,
      tenantId: r.tenant_id,
      userId: r.user_id,
      requestId: r.request_id,
      ip: r.ip,
      userAgent: r.user_agent,
      metadata: toMetadata(r.metadata),
      createdAt: r.created_at,
    }));
  }
}
