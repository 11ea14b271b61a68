/**
 * Token Validator: verifies a compact JWS access token against the Key Cache
 * and checks its registered claims. Each check has its own failure kind and
 * runs in a fixed order; the first failure wins.
 */

import { compactVerify, decodeJwt, decodeProtectedHeader } from 'jose';
import { AuthErrorKind, TokenClaimsSchema, type ValidatedClaims } from '@keygate/shared';
import { AuthError } from './auth-error.js';
import type { SigningKey } from './key-cache.js';

export interface KeyResolver {
  getKey(kid: string): Promise<SigningKey | null>;
}

export interface TokenValidatorOptions {
  keys: KeyResolver;
  issuer: string;
  audience: string;
  clockToleranceSeconds?: number;
  /** Clock in epoch milliseconds. */
  now?: () => number;
}

export function audienceContains(aud: string | string[] | undefined, expected: string): boolean {
  if (aud === undefined) return false;
  return Array.isArray(aud) ? aud.includes(expected) : aud === expected;
}

export class TokenValidator {
  private readonly keys: KeyResolver;
  private readonly issuer: string;
  private readonly audience: string;
  private readonly clockTolerance: number;
  private readonly now: () => number;

  constructor(opts: TokenValidatorOptions) {
    this.keys = opts.keys;
    this.issuer = opts.issuer;
    this.audience = opts.audience;
    this.clockTolerance = opts.clockToleranceSeconds ?? 0;
    this.now = opts.now ?? Date.now;
  }

  /**
   * @throws AuthError with the kind of the first failing check
   */
  async validate(rawToken: string): Promise<ValidatedClaims> {
    // 1. structure
    const parts = rawToken.split('.');
    if (parts.length !== 3 || parts.some((part) => part.length === 0)) {
      throw new AuthError(AuthErrorKind.INVALID_TOKEN, 'Malformed token');
    }

    let kid: unknown;
    let payload: unknown;
    try {
      kid = decodeProtectedHeader(rawToken).kid;
      payload = decodeJwt(rawToken);
    } catch (err) {
      throw new AuthError(AuthErrorKind.INVALID_TOKEN, 'Malformed token', { cause: err });
    }

    const parsed = TokenClaimsSchema.safeParse(payload);
    if (!parsed.success) {
      throw new AuthError(AuthErrorKind.INVALID_TOKEN, 'Malformed token claims');
    }
    const claims = parsed.data;

    // 2. key
    if (typeof kid !== 'string' || kid.length === 0) {
      throw new AuthError(AuthErrorKind.INVALID_TOKEN, 'Token header has no key id');
    }
    const key = await this.keys.getKey(kid);
    if (!key) {
      throw new AuthError(AuthErrorKind.UNKNOWN_KEY);
    }

    // 3. signature, only under the key's own algorithm
    try {
      await compactVerify(rawToken, key.key, { algorithms: [key.algorithm] });
    } catch (err) {
      throw new AuthError(AuthErrorKind.INVALID_SIGNATURE, undefined, { cause: err });
    }

    const nowSeconds = this.now() / 1000;

    // 4. expiry
    if (claims.exp === undefined) {
      throw new AuthError(AuthErrorKind.INVALID_TOKEN, 'Token has no expiry');
    }
    if (claims.exp <= nowSeconds - this.clockTolerance) {
      throw new AuthError(AuthErrorKind.EXPIRED_TOKEN);
    }

    // 5. not-before
    if (claims.nbf !== undefined && claims.nbf > nowSeconds + this.clockTolerance) {
      throw new AuthError(AuthErrorKind.INVALID_TOKEN, 'Token is not yet valid');
    }

    // 6. issuer, exact
    if (claims.iss !== this.issuer) {
      throw new AuthError(AuthErrorKind.ISSUER_MISMATCH);
    }

    // 7. audience, contains
    if (!audienceContains(claims.aud, this.audience)) {
      throw new AuthError(AuthErrorKind.AUDIENCE_MISMATCH);
    }

    if (!claims.sub) {
      throw new AuthError(AuthErrorKind.INVALID_TOKEN, 'Token has no subject');
    }

    return { ...claims, iss: claims.iss, sub: claims.sub, exp: claims.exp };
  }
}
