/**
 * src/modules/auth/index.ts
 *
 * Public surface of the auth module.
 */

export { createAuthModule, type AuthModule } from './auth.module';
export { AuthService } from './auth.service';
export { authFailureToAppError, httpStatusForAuthFailure } from './auth.errors';
export type { AuthFailureReason, AuthRequestMeta, AuthResult, AuthTenant } from './auth.types';
