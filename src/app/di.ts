/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db, redis) and shares them safely.
 * - Keeps modules testable: tests pass their own db/cache (pg-mem, InMemCache).
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (e.g. disable rate limits in test) belong HERE,
 *   not inside the classes themselves (DIP).
 * - Infra passed in via `infra` is owned by the caller and is NOT closed by close().
 */

import type { AppConfig } from './config';
import { createDb, type Db } from '../shared/db/db';

import { RedisCache } from '../shared/cache/redis-cache';
import type { Cache } from '../shared/cache/cache';

import { RateLimiter } from '../shared/security/rate-limit';
import type { TokenHasher } from '../shared/security/token-hasher';
import { Sha256TokenHasher } from '../shared/security/sha256-token-hasher';

import type { PasswordHasher } from '../shared/security/password-hasher';
import { BcryptPasswordHasher } from '../shared/security/bcrypt-password-hasher';
import { CredentialVerifier } from '../shared/security/credential-verifier';

import type { AccessTokenIssuer } from '../shared/security/access-token';
import { JoseAccessTokenIssuer } from '../shared/security/jose-access-token-issuer';
import { RefreshTokenGenerator } from '../shared/security/refresh-token-generator';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { AuditRepo } from '../shared/audit/audit.repo';

import { createSubscriptionModule, type SubscriptionModule } from '../modules/subscriptions';
import { createTenantModule, type TenantModule } from '../modules/tenants';
import { createUserModule, type UserModule } from '../modules/users';
import { createRefreshTokenModule, type RefreshTokenModule } from '../modules/refresh-tokens';
import { createAuthModule, type AuthModule } from '../modules/auth';

export type AppDeps = {
  db: Db;
  cache: Cache;

  logger: Logger;

  rateLimiter: RateLimiter;
  tokenHasher: TokenHasher;
  passwordHasher: PasswordHasher;
  credentialVerifier: CredentialVerifier;
  accessTokens: AccessTokenIssuer;
  refreshTokenGenerator: RefreshTokenGenerator;

  auditRepo: AuditRepo;

  // modules
  subscriptions: SubscriptionModule;
  tenants: TenantModule;
  users: UserModule;
  refreshTokens: RefreshTokenModule;
  auth: AuthModule;

  // lifecycle
  close: () => Promise<void>;
};

/** Pre-built infra (tests). Anything omitted is created from config. */
export type InfraOverrides = {
  db?: Db;
  cache?: Cache;
};

export async function buildDeps(config: AppConfig, infra: InfraOverrides = {}): Promise<AppDeps> {
  const ownsDb = infra.db === undefined;
  const db = infra.db ?? createDb(config.databaseUrl);

  // Redis is mandatory (dev + prod) unless the caller brings a cache.
  let redis: RedisCache | null = null;
  let cache: Cache;
  if (infra.cache) {
    cache = infra.cache;
  } else {
    redis = await RedisCache.connect(config.redisUrl);
    cache = redis;
  }

  const tokenHasher: TokenHasher = new Sha256TokenHasher();
  const passwordHasher = new BcryptPasswordHasher({ cost: config.bcryptCost });
  const credentialVerifier = await CredentialVerifier.create(passwordHasher);

  // Throws on a short/missing secret: startup fails, not the first request.
  const accessTokens: AccessTokenIssuer = new JoseAccessTokenIssuer({
    secret: config.jwt.secret,
    issuer: config.jwt.issuer,
    audience: config.jwt.audience,
    ttlSeconds: config.jwt.accessTokenTtlSeconds,
  });
  const refreshTokenGenerator = new RefreshTokenGenerator(tokenHasher, config.refreshTokenTtlDays);

  // Composition root decides when rate limiting is disabled.
  // The RateLimiter class itself has no knowledge of environments.
  const rateLimiter = new RateLimiter(cache, {
    prefix: 'rl',
    disabled: config.nodeEnv === 'test',
  });

  // shared repos
  const auditRepo = new AuditRepo(db);

  // modules (no HTTP / no business logic here)
  const subscriptions = createSubscriptionModule({ db });
  const tenants = createTenantModule({
    db,
    cache,
    logger,
    subscriptions,
    tenantCacheTtlSeconds: config.tenantCacheTtlSeconds,
  });
  const users = createUserModule({ db });
  const refreshTokens = createRefreshTokenModule({ generator: refreshTokenGenerator, logger });

  const auth = createAuthModule({
    db,
    logger,
    rateLimiter,
    auditRepo,
    tokenHasher,
    passwordHasher,
    credentialVerifier,
    accessTokens,
    refreshTokens: refreshTokens.lifecycle,
    userRepo: users.userRepo,
  });

  return {
    db,
    cache,
    logger,
    rateLimiter,
    tokenHasher,
    passwordHasher,
    credentialVerifier,
    accessTokens,
    refreshTokenGenerator,
    auditRepo,
    subscriptions,
    tenants,
    users,
    refreshTokens,
    auth,
    close: async () => {
      if (redis) await redis.close();
      if (ownsDb) await db.destroy();
    },
  };
}
