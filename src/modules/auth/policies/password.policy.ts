/**
 * src/modules/auth/policies/password.policy.ts
 *
 * WHY:
 * - Password strength is a business/security rule.
 * - Pure + unit-testable; the request schema reports the violations.
 *
 * RULES:
 * - >= 8 chars and <= 72 UTF-8 bytes, one lowercase, one uppercase, one digit, one of @$!%*?&#
 */

import { PASSWORD_MAX_BYTES, PASSWORD_MIN_LENGTH, PASSWORD_SYMBOLS } from '../auth.constants';

export type PasswordViolation =
  | 'too_short'
  | 'too_long'
  | 'no_lowercase'
  | 'no_uppercase'
  | 'no_digit'
  | 'no_symbol';

export const PASSWORD_VIOLATION_MESSAGES: Readonly<Record<PasswordViolation, string>> = {
  too_short: `Password must be at least ${PASSWORD_MIN_LENGTH} characters`,
  too_long: `Password must be at most ${PASSWORD_MAX_BYTES} bytes`,
  no_lowercase: 'Password must contain a lowercase letter',
  no_uppercase: 'Password must contain an uppercase letter',
  no_digit: 'Password must contain a digit',
  no_symbol: `Password must contain one of ${PASSWORD_SYMBOLS}`,
};

export function getPasswordViolations(password: string): PasswordViolation[] {
  const violations: PasswordViolation[] = [];
  if (password.length < PASSWORD_MIN_LENGTH) violations.push('too_short');
  if (Buffer.byteLength(password, 'utf8') > PASSWORD_MAX_BYTES) violations.push('too_long');
  if (!/[a-z]/.test(password)) violations.push('no_lowercase');
  if (!/[A-Z]/.test(password)) violations.push('no_uppercase');
  if (!/\d/.test(password)) violations.push('no_digit');
  if (![...password].some((ch) => PASSWORD_SYMBOLS.includes(ch))) violations.push('no_symbol');
  return violations;
}

export function isStrongPassword(password: string): boolean {
  return getPasswordViolations(password).length === 0;
}
