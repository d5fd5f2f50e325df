import { describe, it, expect } from 'vitest';
import {
  getSubdomainCreationFailure,
  getSubdomainLookupFailure,
  normalizeSubdomain,
} from '../../../src/modules/tenants/policies/subdomain.policy';
import { isValidTenantName } from '../../../src/modules/tenants/policies/tenant-name.policy';
import { buildNewTenant } from '../../../src/modules/tenants/helpers/build-new-tenant';
import { DomainRuleError } from '../../../src/shared/http/errors';

describe('subdomain policy', () => {
  it('normalizes by trimming and lowercasing', () => {
    expect(normalizeSubdomain('  Acme-Corp ')).toBe('acme-corp');
  });

  it.each([
    ['acme', null],
    ['a', null],
    ['a1-b2', null],
    ['a'.repeat(63), null],
    [null, 'missing'],
    ['', 'missing'],
    ['-acme', 'invalid_format'],
    ['acme-', 'invalid_format'],
    ['ac_me', 'invalid_format'],
    ['ACME', 'invalid_format'],
    ['a'.repeat(64), 'invalid_format'],
  ])('lookup %j => %j', (value, expected) => {
    expect(getSubdomainLookupFailure(value)).toBe(expected);
  });

  it('rejects reserved words only on creation', () => {
    expect(getSubdomainLookupFailure('admin')).toBeNull();
    expect(getSubdomainCreationFailure('admin')).toBe('reserved');
    expect(getSubdomainCreationFailure('www')).toBe('reserved');
    expect(getSubdomainCreationFailure('acme')).toBeNull();
  });
});

describe('tenant name policy', () => {
  it.each([
    ['Acme', true],
    ['  AB  ', true],
    ['A', false],
    ['   ', false],
    ['x'.repeat(100), true],
    ['x'.repeat(101), false],
  ])('%j => %s', (name, expected) => {
    expect(isValidTenantName(name)).toBe(expected);
  });
});

describe('buildNewTenant', () => {
  it('normalizes input and starts ACTIVE', () => {
    const now = new Date('2026-01-01T00:00:00.000Z');
    const tenant = buildNewTenant({ name: '  Acme Corp ', subdomain: ' ACME ', now });

    expect(tenant).toMatchObject({
      name: 'Acme Corp',
      subdomain: 'acme',
      status: 'ACTIVE',
      createdAt: now,
    });
    expect(tenant.id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('throws DomainRuleError for a reserved subdomain', () => {
    expect(() => buildNewTenant({ name: 'Platform', subdomain: 'api' })).toThrowError(
      new DomainRuleError('Tenant subdomain is reserved'),
    );
  });

  it('throws DomainRuleError for a short name', () => {
    expect(() => buildNewTenant({ name: 'A', subdomain: 'acme' })).toThrowError(DomainRuleError);
  });
});
