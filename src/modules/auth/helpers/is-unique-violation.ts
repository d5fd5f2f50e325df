/**
 * src/modules/auth/helpers/is-unique-violation.ts
 *
 * Postgres SQLSTATE 23505. The users (tenant_id, email) constraint is the backstop
 * for two concurrent registrations of the same email.
 */

const UNIQUE_VIOLATION = '23505';

export function isUniqueViolation(err: unknown): boolean {
  return (
    typeof err === 'object' && err !== null && 'code' in err && err.code === UNIQUE_VIOLATION
  );
}
