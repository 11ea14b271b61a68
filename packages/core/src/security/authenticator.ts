/**
 * Authenticator: bearer credential → AuthenticatedPrincipal.
 *
 * Runs Token Validator → Role Extractor → Principal Builder. A request that
 * carries no bearer credential fails before any key lookup.
 */

import { AuthErrorKind, type AuthenticatedPrincipal, type ValidatedClaims } from '@keygate/shared';
import { AuthError } from './auth-error.js';
import { extractRoles } from './roles.js';
import { buildPrincipal } from './principal.js';

export interface ClaimsValidator {
  validate(rawToken: string): Promise<ValidatedClaims>;
}

export interface AuthenticatorOptions {
  validator: ClaimsValidator;
  clientId: string;
}

const BEARER_RE = /^Bearer\s+(\S+)\s*$/i;

/** Token from an Authorization header, or null when it is not a bearer credential. */
export function parseBearer(header: string | undefined): string | null {
  if (!header) return null;
  const match = BEARER_RE.exec(header.trim());
  return match?.[1] ?? null;
}

export class Authenticator {
  private readonly validator: ClaimsValidator;
  private readonly clientId: string;

  constructor(opts: AuthenticatorOptions) {
    this.validator = opts.validator;
    this.clientId = opts.clientId;
  }

  /**
   * @throws AuthError: Unauthenticated when no bearer token is present,
   *   otherwise whatever the validator rejects the token with
   */
  async authenticate(authorizationHeader: string | undefined): Promise<AuthenticatedPrincipal> {
    const token = parseBearer(authorizationHeader);
    if (!token) {
      throw new AuthError(AuthErrorKind.UNAUTHENTICATED);
    }
    const claims = await this.validator.validate(token);
    return buildPrincipal(claims, extractRoles(claims, this.clientId));
  }
}
