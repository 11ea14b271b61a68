import { describe, it, expect, vi } from 'vitest';
import type { ValidatedClaims } from '@keygate/shared';
import { Authenticator, parseBearer } from './authenticator.js';
import { AuthError } from './auth-error.js';

const claims: ValidatedClaims = {
  iss: 'https://idp.test/realms/keygate',
  sub: 'user-1',
  exp: 1_700_000_300,
  realm_access: { roles: ['admin'] },
  resource_access: { 'keygate-web': { roles: ['viewer'] } },
};

describe('parseBearer', () => {
  it('extracts the token regardless of scheme case', () => {
    expect(parseBearer('Bearer abc.def.ghi')).toBe('abc.def.ghi');
    expect(parseBearer('bearer abc.def.ghi')).toBe('abc.def.ghi');
    expect(parseBearer('  BEARER   abc.def.ghi  ')).toBe('abc.def.ghi');
  });

  it('returns null for anything that is not a bearer credential', () => {
    expect(parseBearer(undefined)).toBeNull();
    expect(parseBearer('')).toBeNull();
    expect(parseBearer('Bearer')).toBeNull();
    expect(parseBearer('Bearer ')).toBeNull();
    expect(parseBearer('Basic dXNlcjpwYXNz')).toBeNull();
    expect(parseBearer('Bearer a b')).toBeNull();
  });
});

describe('Authenticator', () => {
  it('builds a principal with roles from both claim sources', async () => {
    const validate = vi.fn().mockResolvedValue(claims);
    const authenticator = new Authenticator({ validator: { validate }, clientId: 'keygate-web' });

    const principal = await authenticator.authenticate('Bearer abc.def.ghi');

    expect(validate).toHaveBeenCalledWith('abc.def.ghi');
    expect(principal.subject).toBe('user-1');
    expect([...principal.roles].sort()).toEqual(['admin', 'viewer']);
  });

  it('rejects a missing header as Unauthenticated without validating', async () => {
    const validate = vi.fn();
    const authenticator = new Authenticator({ validator: { validate }, clientId: 'keygate-web' });

    await expect(authenticator.authenticate(undefined)).rejects.toHaveProperty(
      'kind',
      'Unauthenticated'
    );
    expect(validate).not.toHaveBeenCalled();
  });

  it('passes validator failures through', async () => {
    const validate = vi.fn().mockRejectedValue(new AuthError('ExpiredToken'));
    const authenticator = new Authenticator({ validator: { validate }, clientId: 'keygate-web' });

    await expect(authenticator.authenticate('Bearer abc.def.ghi')).rejects.toHaveProperty(
      'kind',
      'ExpiredToken'
    );
  });
});
