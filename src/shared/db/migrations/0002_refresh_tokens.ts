/**
 * src/shared/db/migrations/0002_refresh_tokens.ts
 *
 * WHY:
 * - Refresh tokens are server-side state: revocable, rotatable, capped per user.
 * - Only the SHA-256 digest is stored; lookups are by exact digest.
 * - seq orders tokens issued within the same instant (created_at ties).
 */

import { Kysely, sql } from 'kysely';

export async function up(db: Kysely<any>): Promise<void> {
  await db.schema
    .createTable('refresh_tokens')
    .addColumn('id', 'uuid', (col) => col.primaryKey())
    .addColumn('user_id', 'uuid', (col) => col.notNull().references('users.id').onDelete('cascade'))
    .addColumn('token_hash', 'text', (col) => col.notNull().unique())
    .addColumn('expires_at', 'timestamptz', (col) => col.notNull())
    .addColumn('is_revoked', 'boolean', (col) => col.notNull().defaultTo(false))
    .addColumn('revoked_at', 'timestamptz')
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('seq', 'serial', (col) => col.notNull())
    .execute();

  // Session-cap query: unrevoked tokens of one user, newest first
  await db.schema
    .createIndex('refresh_tokens_user_active_idx')
    .on('refresh_tokens')
    .columns(['user_id', 'is_revoked', 'created_at', 'seq'])
    .execute();
}

export async function down(db: Kysely<any>): Promise<void> {
  await db.schema.dropTable('refresh_tokens').execute();
}
