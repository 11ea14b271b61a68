/**
 * Test Setup: an in-process identity provider for test suites.
 *
 * `createSigningKey()` makes a key pair, `signToken()` issues access tokens
 * with it, and `createFakeIdentityProvider()` serves the discovery document
 * and key set through a `fetch` stub, so nothing leaves the process.
 */

import { generateKeyPair, exportJWK, SignJWT, type JWK, type KeyLike } from 'jose';

export const TEST_ISSUER = 'https://idp.test/realms/keygate';
export const TEST_AUDIENCE = 'keygate-api';
export const TEST_CLIENT_ID = 'keygate-web';
export const TEST_JWKS_URI = `${TEST_ISSUER}/protocol/openid-connect/certs`;
export const TEST_DISCOVERY_URI = `${TEST_ISSUER}/.well-known/openid-configuration`;

export interface TestSigningKey {
  kid: string;
  alg: string;
  privateKey: KeyLike;
  publicJwk: JWK;
}

export async function createSigningKey(kid: string, alg = 'RS256'): Promise<TestSigningKey> {
  const { privateKey, publicKey } = await generateKeyPair(alg);
  const publicJwk: JWK = { ...(await exportJWK(publicKey)), kid, alg, use: 'sig' };
  return { kid, alg, privateKey, publicJwk };
}

export interface SignTokenOptions {
  /** null leaves the header without a kid */
  kid?: string | null;
  /** null leaves out the sub claim */
  subject?: string | null;
  issuer?: string;
  audience?: string | string[];
  /** Seconds from `now`; negative for an expired token, null for no exp claim */
  expiresIn?: number | null;
  /** Epoch seconds */
  notBefore?: number;
  /** Epoch milliseconds the token is issued at */
  now?: number;
  claims?: Record<string, unknown>;
}

export async function signToken(key: TestSigningKey, opts: SignTokenOptions = {}): Promise<string> {
  const issuedAt = Math.floor((opts.now ?? Date.now()) / 1000);
  const kid = opts.kid === undefined ? key.kid : opts.kid;

  const jwt = new SignJWT({ ...opts.claims })
    .setProtectedHeader(kid === null ? { alg: key.alg } : { alg: key.alg, kid })
    .setIssuedAt(issuedAt)
    .setIssuer(opts.issuer ?? TEST_ISSUER)
    .setAudience(opts.audience ?? TEST_AUDIENCE);

  if (opts.expiresIn !== null) jwt.setExpirationTime(issuedAt + (opts.expiresIn ?? 300));
  if (opts.subject !== null) jwt.setSubject(opts.subject ?? 'user-1');
  if (opts.notBefore !== undefined) jwt.setNotBefore(opts.notBefore);

  return jwt.sign(key.privateKey);
}

export interface FakeIdentityProvider {
  fetch: typeof fetch;
  /** Every URL requested, in order */
  calls: string[];
  /** Number of key-set requests */
  keySetFetches(): number;
  setKeys(keys: JWK[]): void;
  /** Answer every request with this HTTP status; null restores normal answers */
  failWith(status: number | null): void;
  /** Never answer; the request only ends when its signal aborts */
  hang(): void;
  /** Hold every answer until the returned function is called */
  hold(): () => void;
}

function requestUrl(input: string | URL | Request): string {
  if (typeof input === 'string') return input;
  if (input instanceof URL) return input.href;
  return input.url;
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

export function createFakeIdentityProvider(initialKeys: JWK[] = []): FakeIdentityProvider {
  let keys = initialKeys;
  let failure: number | null = null;
  let hanging = false;
  let held: Promise<void> | null = null;
  const calls: string[] = [];

  const fakeFetch: typeof fetch = async (input, init) => {
    const url = requestUrl(input);
    calls.push(url);

    if (hanging) {
      const signal = init?.signal;
      return new Promise<Response>((_resolve, reject) => {
        signal?.addEventListener('abort', () => reject(signal.reason));
      });
    }
    if (held) await held;
    if (failure !== null) {
      return json({ error: 'unavailable' }, failure);
    }
    if (url === TEST_DISCOVERY_URI) {
      return json({ issuer: TEST_ISSUER, jwks_uri: TEST_JWKS_URI });
    }
    if (url === TEST_JWKS_URI) {
      return json({ keys });
    }
    return json({ error: 'not found' }, 404);
  };

  return {
    fetch: fakeFetch,
    calls,
    keySetFetches: () => calls.filter((url) => url === TEST_JWKS_URI).length,
    setKeys: (next) => {
      keys = next;
    },
    failWith: (status) => {
      failure = status;
    },
    hang: () => {
      hanging = true;
    },
    hold: () => {
      let release = () => {};
      held = new Promise<void>((resolve) => {
        release = () => {
          held = null;
          resolve();
        };
      });
      return release;
    },
  };
}
