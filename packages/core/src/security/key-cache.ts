/**
 * Key Cache: the identity provider's public signing keys, by key id.
 *
 * Lookup rules:
 *   - Fresh set (fetchedAt + ttl not elapsed) and kid present → served, no network
 *   - Expired set, or kid missing → one refresh of the whole set, then re-check
 *   - Refresh failed → last-known set while within fetchedAt + ttl + grace,
 *     otherwise KeyFetchFailure
 *   - Concurrent refreshes collapse onto one in-flight promise
 *
 * The key-set URL is either configured directly or read from the issuer's
 * discovery document on first refresh.
 */

import { importJWK, type JWK, type KeyLike } from 'jose';
import { z } from 'zod';
import { AuthErrorKind } from '@keygate/shared';
import { AuthError } from './auth-error.js';
import type { SecureLogger } from '../logging/logger.js';
import { toErrorMessage } from '../utils/errors.js';

export interface SigningKey {
  readonly kid: string;
  readonly algorithm: string;
  readonly key: KeyLike | Uint8Array;
}

interface CachedKeySet {
  readonly keys: ReadonlyMap<string, SigningKey>;
  readonly fetchedAt: number;
  readonly issuerUrl: string;
  readonly jwksUri: string;
}

export interface KeyCacheStatus {
  keyCount: number;
  fetchedAt: string | null;
  jwksUri: string | null;
  fresh: boolean;
}

export interface KeyCacheOptions {
  issuerUrl: string;
  /** Skips discovery when set. */
  jwksUri?: string;
  ttlSeconds: number;
  graceSeconds?: number;
  httpTimeoutMs?: number;
  logger: SecureLogger;
  fetch?: typeof fetch;
  /** Clock in epoch milliseconds. */
  now?: () => number;
}

const DiscoveryDocumentSchema = z
  .object({
    issuer: z.string().optional(),
    jwks_uri: z.string().url(),
  })
  .passthrough();

const KeySetDocumentSchema = z.object({
  keys: z.array(z.unknown()),
});

const JwkSchema = z.object({
  kty: z.string(),
  kid: z.string().min(1).optional(),
  use: z.string().optional(),
  alg: z.string().optional(),
  crv: z.string().optional(),
  n: z.string().optional(),
  e: z.string().optional(),
  x: z.string().optional(),
  y: z.string().optional(),
});

type RawJwk = z.infer<typeof JwkSchema>;

const EC_ALGORITHMS: Record<string, string> = {
  'P-256': 'ES256',
  'P-384': 'ES384',
  'P-521': 'ES512',
};

export function inferAlgorithm(jwk: RawJwk): string | undefined {
  if (jwk.alg) return jwk.alg;
  switch (jwk.kty) {
    case 'RSA':
      return 'RS256';
    case 'EC':
      return jwk.crv ? EC_ALGORITHMS[jwk.crv] : undefined;
    case 'OKP':
      return 'EdDSA';
    default:
      return undefined;
  }
}

export class KeyCache {
  private readonly issuerUrl: string;
  private readonly configuredJwksUri: string | undefined;
  private readonly ttlMs: number;
  private readonly graceMs: number;
  private readonly httpTimeoutMs: number;
  private readonly logger: SecureLogger;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;

  private keySet: CachedKeySet | null = null;
  private discoveredJwksUri: string | null = null;
  private inflight: Promise<CachedKeySet> | null = null;

  constructor(opts: KeyCacheOptions) {
    this.issuerUrl = opts.issuerUrl.replace(/\/+$/, '');
    this.configuredJwksUri = opts.jwksUri;
    this.ttlMs = opts.ttlSeconds * 1000;
    this.graceMs = (opts.graceSeconds ?? 300) * 1000;
    this.httpTimeoutMs = opts.httpTimeoutMs ?? 5000;
    this.logger = opts.logger.child({ component: 'KeyCache' });
    this.fetchImpl = opts.fetch ?? fetch;
    this.now = opts.now ?? Date.now;
  }

  /**
   * Resolve a signing key. Returns null when the key is absent from a
   * successfully refreshed (or grace-served) set.
   *
   * @throws AuthError(KeyFetchFailure) when no usable key set can be obtained
   */
  async getKey(kid: string): Promise<SigningKey | null> {
    const current = this.keySet;
    if (current && this.isFresh(current)) {
      const hit = current.keys.get(kid);
      if (hit) return hit;
    }

    try {
      const refreshed = await this.refreshShared();
      return refreshed.keys.get(kid) ?? null;
    } catch (err) {
      const lastKnown = this.keySet;
      if (lastKnown && this.now() < lastKnown.fetchedAt + this.ttlMs + this.graceMs) {
        this.logger.warn('Key set refresh failed, serving last-known keys', {
          kid,
          error: toErrorMessage(err),
        });
        return lastKnown.keys.get(kid) ?? null;
      }
      throw err;
    }
  }

  /** Force a refresh, joining one already in flight. */
  async refresh(): Promise<void> {
    await this.refreshShared();
  }

  clear(): void {
    this.keySet = null;
    this.discoveredJwksUri = null;
  }

  getStatus(): KeyCacheStatus {
    const current = this.keySet;
    return {
      keyCount: current?.keys.size ?? 0,
      fetchedAt: current ? new Date(current.fetchedAt).toISOString() : null,
      jwksUri: current?.jwksUri ?? this.configuredJwksUri ?? this.discoveredJwksUri,
      fresh: current ? this.isFresh(current) : false,
    };
  }

  private isFresh(set: CachedKeySet): boolean {
    return this.now() < set.fetchedAt + this.ttlMs;
  }

  // Not tied to any caller: a waiter that goes away leaves the fetch running
  private refreshShared(): Promise<CachedKeySet> {
    if (!this.inflight) {
      this.inflight = this.load().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  private async load(): Promise<CachedKeySet> {
    let jwksUri: string;
    let document: z.infer<typeof KeySetDocumentSchema>;
    try {
      jwksUri = await this.resolveJwksUri();
      document = await this.fetchJson(jwksUri, KeySetDocumentSchema);
    } catch (err) {
      this.logger.warn('Key set fetch failed', { error: toErrorMessage(err) });
      throw new AuthError(AuthErrorKind.KEY_FETCH_FAILURE, undefined, { cause: err });
    }

    const keys = new Map<string, SigningKey>();
    for (const entry of document.keys) {
      const key = await this.importKey(entry);
      if (key) keys.set(key.kid, key);
    }

    // Swapped wholesale: readers never see a half-updated set
    const next: CachedKeySet = {
      keys,
      fetchedAt: this.now(),
      issuerUrl: this.issuerUrl,
      jwksUri,
    };
    this.keySet = next;
    this.logger.info('Key set refreshed', { jwksUri, keyCount: keys.size });
    return next;
  }

  private async resolveJwksUri(): Promise<string> {
    if (this.configuredJwksUri) return this.configuredJwksUri;
    if (this.discoveredJwksUri) return this.discoveredJwksUri;

    const discoveryUrl = `${this.issuerUrl}/.well-known/openid-configuration`;
    const discovery = await this.fetchJson(discoveryUrl, DiscoveryDocumentSchema);
    this.discoveredJwksUri = discovery.jwks_uri;
    this.logger.debug('Discovered key set endpoint', { jwksUri: discovery.jwks_uri });
    return discovery.jwks_uri;
  }

  private async importKey(entry: unknown): Promise<SigningKey | null> {
    const parsed = JwkSchema.safeParse(entry);
    if (!parsed.success) {
      this.logger.warn('Skipping malformed JWK');
      return null;
    }

    const raw = parsed.data;
    if (!raw.kid) {
      this.logger.warn('Skipping JWK without kid', { kty: raw.kty });
      return null;
    }
    if (raw.use !== undefined && raw.use !== 'sig') {
      this.logger.debug('Skipping non-signing JWK', { kid: raw.kid, use: raw.use });
      return null;
    }

    const algorithm = inferAlgorithm(raw);
    if (!algorithm) {
      this.logger.warn('Skipping JWK with unknown algorithm', { kid: raw.kid, kty: raw.kty });
      return null;
    }

    const jwk: JWK = {
      kty: raw.kty,
      kid: raw.kid,
      alg: algorithm,
      crv: raw.crv,
      n: raw.n,
      e: raw.e,
      x: raw.x,
      y: raw.y,
    };

    try {
      const key = await importJWK(jwk, algorithm);
      return Object.freeze({ kid: raw.kid, algorithm, key });
    } catch (err) {
      this.logger.warn('Skipping JWK that failed to import', {
        kid: raw.kid,
        error: toErrorMessage(err),
      });
      return null;
    }
  }

  private async fetchJson<T>(url: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const res = await this.fetchImpl(url, {
      signal: AbortSignal.timeout(this.httpTimeoutMs),
      headers: { Accept: 'application/json' },
    });
    if (!res.ok) {
      throw new Error(`GET ${url} failed: HTTP ${res.status}`);
    }
    const parsed = schema.safeParse(await res.json());
    if (!parsed.success) {
      throw new Error(`GET ${url} returned an unexpected document`);
    }
    return parsed.data;
  }
}
