import { describe, it, expect, beforeAll, beforeEach } from 'vitest';
import { TokenValidator, audienceContains } from './token-validator.js';
import { KeyCache } from './key-cache.js';
import { createNoopLogger } from '../logging/logger.js';
import {
  TEST_ISSUER,
  TEST_AUDIENCE,
  createSigningKey,
  createFakeIdentityProvider,
  signToken,
  type FakeIdentityProvider,
  type TestSigningKey,
} from '../test-setup.js';

const NOW = 1_700_000_000_000;

describe('TokenValidator', () => {
  let signer: TestSigningKey;
  let impostor: TestSigningKey;
  let ecSigner: TestSigningKey;
  let idp: FakeIdentityProvider;
  let validator: TokenValidator;

  function createValidator(clockToleranceSeconds = 0) {
    const keys = new KeyCache({
      issuerUrl: TEST_ISSUER,
      ttlSeconds: 300,
      logger: createNoopLogger(),
      fetch: idp.fetch,
    });
    return new TokenValidator({
      keys,
      issuer: TEST_ISSUER,
      audience: TEST_AUDIENCE,
      clockToleranceSeconds,
      now: () => NOW,
    });
  }

  beforeAll(async () => {
    signer = await createSigningKey('k1');
    impostor = await createSigningKey('k1');
    ecSigner = await createSigningKey('k1', 'ES256');
  });

  beforeEach(() => {
    idp = createFakeIdentityProvider([signer.publicJwk]);
    validator = createValidator();
  });

  it('accepts a well-formed token and returns its claims', async () => {
    const token = await signToken(signer, {
      now: NOW,
      subject: 'user-42',
      claims: { preferred_username: 'alice', realm_access: { roles: ['admin'] } },
    });

    const claims = await validator.validate(token);

    expect(claims.sub).toBe('user-42');
    expect(claims.iss).toBe(TEST_ISSUER);
    expect(claims.exp).toBe(NOW / 1000 + 300);
    expect(claims.preferred_username).toBe('alice');
    expect(claims.realm_access?.roles).toEqual(['admin']);
  });

  describe('structure', () => {
    it.each(['', 'not-a-token', 'a.b', 'a..c', 'a.b.c.d.e', 'abc.def.ghi'])(
      'rejects %j as InvalidToken',
      async (raw) => {
        await expect(validator.validate(raw)).rejects.toHaveProperty('kind', 'InvalidToken');
        expect(idp.calls).toHaveLength(0);
      }
    );

    it('rejects a header without kid before any key lookup', async () => {
      const token = await signToken(signer, { now: NOW, kid: null });
      await expect(validator.validate(token)).rejects.toHaveProperty('kind', 'InvalidToken');
      expect(idp.calls).toHaveLength(0);
    });

    it('treats a malformed role container as absent', async () => {
      const token = await signToken(signer, { now: NOW, claims: { realm_access: 'admin' } });
      const claims = await validator.validate(token);
      expect(claims.realm_access).toBeUndefined();
    });

    it('drops profile claims that are neither strings nor numbers', async () => {
      const token = await signToken(signer, {
        now: NOW,
        claims: { email: null, preferred_username: { first: 'alice' }, jti: ['a'] },
      });
      const claims = await validator.validate(token);
      expect(claims.sub).toBe('user-1');
      expect(claims.email).toBeUndefined();
      expect(claims.preferred_username).toBeUndefined();
      expect(claims.jti).toBeUndefined();
    });

    it('stringifies numeric profile claims', async () => {
      const token = await signToken(signer, {
        now: NOW,
        claims: { preferred_username: 42, jti: 7 },
      });
      const claims = await validator.validate(token);
      expect(claims.preferred_username).toBe('42');
      expect(claims.jti).toBe('7');
    });
  });

  describe('keys', () => {
    it('rejects an unknown kid with UnknownKey after one refresh', async () => {
      const other = await createSigningKey('k9');
      const token = await signToken(other, { now: NOW });

      await expect(validator.validate(token)).rejects.toHaveProperty('kind', 'UnknownKey');
      expect(idp.keySetFetches()).toBe(1);
    });

    it('reports KeyFetchFailure when the key set is unavailable', async () => {
      idp.failWith(503);
      const token = await signToken(signer, { now: NOW });
      await expect(validator.validate(token)).rejects.toHaveProperty('kind', 'KeyFetchFailure');
    });
  });

  describe('signature', () => {
    it('rejects a token signed by a different private key', async () => {
      const token = await signToken(impostor, { now: NOW });
      await expect(validator.validate(token)).rejects.toHaveProperty('kind', 'InvalidSignature');
    });

    it('rejects a tampered payload', async () => {
      const token = await signToken(signer, { now: NOW, subject: 'user-1' });
      const [header, , signature] = token.split('.');
      const forged = Buffer.from(
        JSON.stringify({ iss: TEST_ISSUER, aud: TEST_AUDIENCE, sub: 'admin', exp: NOW / 1000 + 300 })
      ).toString('base64url');

      await expect(validator.validate(`${header}.${forged}.${signature}`)).rejects.toHaveProperty(
        'kind',
        'InvalidSignature'
      );
    });

    it('rejects a token whose algorithm differs from the key', async () => {
      const token = await signToken(ecSigner, { now: NOW });
      await expect(validator.validate(token)).rejects.toHaveProperty('kind', 'InvalidSignature');
    });
  });

  describe('expiry', () => {
    it('rejects an expired token even when every other claim is wrong too', async () => {
      const token = await signToken(signer, {
        now: NOW,
        expiresIn: -10,
        issuer: 'https://elsewhere.test',
        audience: 'someone-else',
      });
      await expect(validator.validate(token)).rejects.toHaveProperty('kind', 'ExpiredToken');
    });

    it('treats exp equal to now as expired', async () => {
      const token = await signToken(signer, { now: NOW, expiresIn: 0 });
      await expect(validator.validate(token)).rejects.toHaveProperty('kind', 'ExpiredToken');
    });

    it('honours the clock tolerance', async () => {
      const token = await signToken(signer, { now: NOW, expiresIn: -5 });
      await expect(createValidator(10).validate(token)).resolves.toHaveProperty('sub', 'user-1');
    });

    it('rejects a token without exp as InvalidToken', async () => {
      const token = await signToken(signer, { now: NOW, expiresIn: null });
      await expect(validator.validate(token)).rejects.toHaveProperty('kind', 'InvalidToken');
    });
  });

  describe('not-before', () => {
    it('rejects a token that is not yet valid', async () => {
      const token = await signToken(signer, { now: NOW, notBefore: NOW / 1000 + 60 });
      await expect(validator.validate(token)).rejects.toHaveProperty('kind', 'InvalidToken');
    });

    it('accepts nbf equal to now', async () => {
      const token = await signToken(signer, { now: NOW, notBefore: NOW / 1000 });
      await expect(validator.validate(token)).resolves.toHaveProperty('sub', 'user-1');
    });
  });

  describe('issuer', () => {
    it('rejects a different issuer', async () => {
      const token = await signToken(signer, { now: NOW, issuer: 'https://elsewhere.test' });
      await expect(validator.validate(token)).rejects.toHaveProperty('kind', 'IssuerMismatch');
    });

    it('compares the issuer exactly', async () => {
      const token = await signToken(signer, { now: NOW, issuer: `${TEST_ISSUER}/` });
      await expect(validator.validate(token)).rejects.toHaveProperty('kind', 'IssuerMismatch');
    });
  });

  describe('audience', () => {
    it('accepts a list that contains the expected audience', async () => {
      const token = await signToken(signer, { now: NOW, audience: ['account', TEST_AUDIENCE] });
      await expect(validator.validate(token)).resolves.toHaveProperty('sub', 'user-1');
    });

    it('rejects a list without the expected audience', async () => {
      const token = await signToken(signer, { now: NOW, audience: ['account', 'broker'] });
      await expect(validator.validate(token)).rejects.toHaveProperty('kind', 'AudienceMismatch');
    });

    it('rejects a single different audience', async () => {
      const token = await signToken(signer, { now: NOW, audience: 'account' });
      await expect(validator.validate(token)).rejects.toHaveProperty('kind', 'AudienceMismatch');
    });
  });

  it('rejects a token without a subject', async () => {
    const token = await signToken(signer, { now: NOW, subject: null });
    await expect(validator.validate(token)).rejects.toHaveProperty('kind', 'InvalidToken');
  });
});

describe('audienceContains', () => {
  it('matches strings exactly and lists by membership', () => {
    expect(audienceContains('api', 'api')).toBe(true);
    expect(audienceContains('api-2', 'api')).toBe(false);
    expect(audienceContains(['a', 'api'], 'api')).toBe(true);
    expect(audienceContains([], 'api')).toBe(false);
    expect(audienceContains(undefined, 'api')).toBe(false);
  });
});
