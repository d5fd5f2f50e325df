/**
 * src/modules/refresh-tokens/refresh-token.module.ts
 *
 * Support module (no routes). The auth flows consume the lifecycle.
 */

import type { Logger } from '../../shared/logger/logger';
import type { RefreshTokenGenerator } from '../../shared/security/refresh-token-generator';
import { RefreshTokenLifecycle } from './refresh-token.lifecycle';

export type RefreshTokenModule = ReturnType<typeof createRefreshTokenModule>;

export function createRefreshTokenModule(deps: {
  generator: RefreshTokenGenerator;
  logger: Logger;
}) {
  return {
    lifecycle: new RefreshTokenLifecycle(deps),
  };
}
