/**
 * src/modules/auth/auth.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Auth module.
 * - Prevents invalid payloads from reaching flows.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Email is normalized (trim + lowercase) in the flow, not here.
 * - Login only checks presence: strength rules would leak policy changes to attackers
 *   and lock out users registered under older rules.
 */

import { z } from 'zod';

import { isValidEmail, isValidPersonName } from '../users';
import { getPasswordViolations, PASSWORD_VIOLATION_MESSAGES } from './policies/password.policy';

const emailSchema = z.string().refine(isValidEmail, 'Invalid email address');

const strongPasswordSchema = z.string().superRefine((value, ctx) => {
  for (const violation of getPasswordViolations(value)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: PASSWORD_VIOLATION_MESSAGES[violation] });
  }
});

const personNameSchema = (label: string) =>
  z.string().refine(isValidPersonName, `${label} must be between 2 and 100 characters`);

export const registerSchema = z.object({
  email: emailSchema,
  password: strongPasswordSchema,
  firstName: personNameSchema('First name'),
  lastName: personNameSchema('Last name'),
});

export type RegisterInput = z.infer<typeof registerSchema>;

export const loginSchema = z.object({
  email: emailSchema,
  password: z.string().min(1, 'Password is required'),
});

export type LoginInput = z.infer<typeof loginSchema>;

/**
 * Refresh/logout: the token may come from the body OR the refresh cookie,
 * so the body itself is optional. A blank token counts as absent.
 */
export const refreshTokenBodySchema = z
  .object({
    refreshToken: z
      .string()
      .optional()
      .transform((value) => (value?.trim() ? value : undefined)),
  })
  .optional();

export type RefreshTokenBody = z.infer<typeof refreshTokenBodySchema>;
