/**
 * src/modules/auth/flows/auth-flow.deps.ts
 *
 * Dependencies shared by every auth flow. Built once in auth.module.ts.
 */

import type { AuditRepo } from '../../../shared/audit/audit.repo';
import type { DbExecutor } from '../../../shared/db/db';
import type { Logger } from '../../../shared/logger/logger';
import type { AccessTokenIssuer } from '../../../shared/security/access-token';
import type { CredentialVerifier } from '../../../shared/security/credential-verifier';
import type { PasswordHasher } from '../../../shared/security/password-hasher';
import type { RateLimiter } from '../../../shared/security/rate-limit';
import type { TokenHasher } from '../../../shared/security/token-hasher';
import type { RefreshTokenLifecycle } from '../../refresh-tokens';
import type { UserRepo } from '../../users/dal/user.repo';

export type AuthFlowDeps = {
  db: DbExecutor;
  logger: Logger;
  rateLimiter: RateLimiter;
  auditRepo: AuditRepo;
  /** digests emails into PII-free rate-limit keys */
  tokenHasher: TokenHasher;
  passwordHasher: PasswordHasher;
  credentialVerifier: CredentialVerifier;
  accessTokens: AccessTokenIssuer;
  refreshTokens: RefreshTokenLifecycle;
  userRepo: UserRepo;
};
