/**
 * src/modules/refresh-tokens/index.ts
 *
 * Public surface of the refresh-tokens module.
 */

export { createRefreshTokenModule, type RefreshTokenModule } from './refresh-token.module';
export { RefreshTokenLifecycle } from './refresh-token.lifecycle';
export { listActiveTokensForUser, listUnrevokedTokensForUser } from './queries/refresh-token.queries';
export type {
  RefreshTokenFailure,
  RefreshTokenRecord,
  LogoutRevokeOutcome,
} from './refresh-token.types';
