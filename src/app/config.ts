/**
 * src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 * - A missing or weak JWT signing secret is a startup failure, never a per-request one.
 *
 * HOW TO USE:
 * - In dev, we load .env via dotenv.
 * - In prod, the platform injects env vars (no file).
 *
 * TYPING:
 * - nodeEnv is a union ('development' | 'test' | 'production'), not a plain string.
 *   Invalid values ('prod', 'staging') are caught at startup by Zod.
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

// z.coerce.boolean() treats "false" as true; parse the string explicitly.
const BooleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,
  PORT: z.coerce.number().default(3000),

  DATABASE_URL: z.string().min(1),
  REDIS_URL: z.string().min(1),

  // Logging / service identity
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SERVICE_NAME: z.string().default('saas-tenant-auth'),

  BCRYPT_COST: z.coerce.number().int().min(4).max(15).default(12),

  // Tokens
  JWT_SECRET: z.string().min(32, 'JWT_SECRET must be at least 32 characters'),
  JWT_ISSUER: z.string().min(1).default('saas-tenant-auth'),
  JWT_AUDIENCE: z.string().min(1).default('saas-tenant-auth-api'),
  ACCESS_TOKEN_TTL_SECONDS: z.coerce.number().int().min(60).max(3600).default(900),
  REFRESH_TOKEN_TTL_DAYS: z.coerce.number().int().min(1).max(90).default(7),

  // Tenant resolution
  TENANT_CACHE_TTL_SECONDS: z.coerce.number().int().min(1).max(86400).default(3600),

  // DEV seed bootstrap (idempotent)
  SEED_ON_START: BooleanFlag,
  SEED_TENANT_SUBDOMAIN: z.string().default('acme'),
  SEED_TENANT_NAME: z.string().default('Acme Corporation'),
  SEED_ADMIN_EMAIL: z.string().email().default('admin@example.com'),
  SEED_ADMIN_PASSWORD: z.string().min(8).default('ChangeMe!2024'),
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;
  databaseUrl: string;
  redisUrl: string;

  logLevel: string;
  serviceName: string;

  bcryptCost: number;

  jwt: {
    secret: string;
    issuer: string;
    audience: string;
    accessTokenTtlSeconds: number;
  };

  refreshTokenTtlDays: number;

  tenantCacheTtlSeconds: number;

  seed: {
    enabled: boolean;
    tenantSubdomain: string;
    tenantName: string;
    adminEmail: string;
    adminPassword: string;
  };
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    redisUrl: parsed.REDIS_URL,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    bcryptCost: parsed.BCRYPT_COST,

    jwt: {
      secret: parsed.JWT_SECRET,
      issuer: parsed.JWT_ISSUER,
      audience: parsed.JWT_AUDIENCE,
      accessTokenTtlSeconds: parsed.ACCESS_TOKEN_TTL_SECONDS,
    },

    refreshTokenTtlDays: parsed.REFRESH_TOKEN_TTL_DAYS,

    tenantCacheTtlSeconds: parsed.TENANT_CACHE_TTL_SECONDS,

    seed: {
      enabled: parsed.SEED_ON_START,
      tenantSubdomain: parsed.SEED_TENANT_SUBDOMAIN,
      tenantName: parsed.SEED_TENANT_NAME,
      adminEmail: parsed.SEED_ADMIN_EMAIL,
      adminPassword: parsed.SEED_ADMIN_PASSWORD,
    },
  };
}
