/**
 * src/modules/users/policies/email.policy.ts
 *
 * Emails are compared in one canonical form: trimmed + lowercased.
 * Format check: something@something.tld.
 */

export const EMAIL_MAX_LENGTH = 255;

const EMAIL_PATTERN = /^[^@\s]+@[^@\s]+\.[^@\s]+$/;

export function normalizeEmail(raw: string): string {
  return raw.trim().toLowerCase();
}

export function isValidEmail(raw: string): boolean {
  const email = normalizeEmail(raw);
  return email.length > 0 && email.length <= EMAIL_MAX_LENGTH && EMAIL_PATTERN.test(email);
}

/** PII-safe: operational logs carry the domain only. */
export function emailDomain(email: string): string {
  const at = email.lastIndexOf('@');
  return at >= 0 ? email.slice(at + 1) : '';
}
