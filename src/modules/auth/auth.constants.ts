/**
 * src/modules/auth/auth.constants.ts
 *
 * WHY:
 * - Central place for auth domain constants shared across flows.
 *
 * RULES:
 * - Must not import from DB/HTTP/framework code.
 */

export const AUTH_RATE_LIMITS = {
  login: {
    perEmail: { limit: 5, windowSeconds: 900 },
    perIp: { limit: 20, windowSeconds: 900 },
  },
  register: {
    perEmail: { limit: 5, windowSeconds: 900 },
    perIp: { limit: 20, windowSeconds: 900 },
  },
  refresh: {
    perIp: { limit: 30, windowSeconds: 900 },
  },
} as const;

/** Symbols that satisfy the "special character" password rule. */
export const PASSWORD_SYMBOLS = '@$!%*?&#';
export const PASSWORD_MIN_LENGTH = 8;
/** bcrypt reads only the first 72 bytes; longer inputs would collide. */
export const PASSWORD_MAX_BYTES = 72;
