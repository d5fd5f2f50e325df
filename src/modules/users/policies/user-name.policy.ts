/**
 * src/modules/users/policies/user-name.policy.ts
 */

export const NAME_MIN_LENGTH = 2;
export const NAME_MAX_LENGTH = 100;

export function isValidPersonName(raw: string): boolean {
  const name = raw.trim();
  return name.length >= NAME_MIN_LENGTH && name.length <= NAME_MAX_LENGTH;
}
