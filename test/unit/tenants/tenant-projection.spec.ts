import { describe, it, expect } from 'vitest';
import { parseCachedProjection } from '../../../src/modules/tenants/use-cases/resolve-tenant';

describe('parseCachedProjection', () => {
  it('parses a valid projection', () => {
    expect(parseCachedProjection('{"id":"t1","subdomain":"acme","status":"ACTIVE"}')).toEqual({
      id: 't1',
      subdomain: 'acme',
      status: 'ACTIVE',
    });
  });

  it.each([
    ['not json'],
    ['null'],
    ['{"id":"t1","subdomain":"acme"}'],
    ['{"id":"t1","subdomain":"acme","status":"UNKNOWN"}'],
    ['{"id":"","subdomain":"acme","status":"ACTIVE"}'],
  ])('treats %j as a miss', (raw) => {
    expect(parseCachedProjection(raw)).toBeNull();
  });
});
