import { describe, it, expect, vi } from 'vitest';
import type { FastifyRequest } from 'fastify';
import { logger } from '../../../../src/shared/logger/logger';
import { withRequestContext } from '../../../../src/shared/logger/with-context';

describe('withRequestContext', () => {
  it('adds request, tenant and caller fields; call meta wins', () => {
    const spy = vi.spyOn(logger, 'log').mockImplementation(() => logger);
    const req = {
      requestContext: { requestId: 'req-1', host: 'acme.example.com', tenantKey: 'acme' },
      tenantContext: { tenantId: 't-1', subdomain: 'acme', isResolved: true },
      authContext: null,
    } as unknown as FastifyRequest;

    withRequestContext(req).warn('security.unauthorized', { statusCode: 401, userId: 'u-9' });

    expect(spy).toHaveBeenCalledWith('warn', 'security.unauthorized', {
      requestId: 'req-1',
      host: 'acme.example.com',
      tenantKey: 'acme',
      subdomain: 'acme',
      tenantId: 't-1',
      userId: 'u-9',
      role: null,
      tokenId: null,
      statusCode: 401,
    });
  });
});
