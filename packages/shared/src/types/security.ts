/**
 * Security Types for KeyGate
 *
 * Security considerations:
 * - Token claims are parsed against an explicit schema, never accessed as a bare map
 * - Malformed role containers are treated as absent rather than trusted
 * - Principals are immutable once built
 */

import { z } from 'zod';

// Authentication / authorization failure kinds
export const AuthErrorKind = {
  INVALID_TOKEN: 'InvalidToken',
  EXPIRED_TOKEN: 'ExpiredToken',
  UNKNOWN_KEY: 'UnknownKey',
  INVALID_SIGNATURE: 'InvalidSignature',
  ISSUER_MISMATCH: 'IssuerMismatch',
  AUDIENCE_MISMATCH: 'AudienceMismatch',
  UNAUTHENTICATED: 'Unauthenticated',
  INSUFFICIENT_ROLE: 'InsufficientRole',
  KEY_FETCH_FAILURE: 'KeyFetchFailure',
} as const;

export type AuthErrorKind = (typeof AuthErrorKind)[keyof typeof AuthErrorKind];

export const AuthErrorKindSchema = z.enum([
  'InvalidToken',
  'ExpiredToken',
  'UnknownKey',
  'InvalidSignature',
  'IssuerMismatch',
  'AudienceMismatch',
  'Unauthenticated',
  'InsufficientRole',
  'KeyFetchFailure',
]);

// Role containers: anything that is not the expected shape counts as "no roles"
const RoleListSchema = z.array(z.unknown()).optional().catch(undefined);

export const RoleContainerSchema = z
  .object({ roles: RoleListSchema })
  .passthrough()
  .optional()
  .catch(undefined);

export type RoleContainer = z.infer<typeof RoleContainerSchema>;

/** Profile claims are informational: numbers are stringified, anything else is dropped. */
const ProfileClaimSchema = z
  .union([z.string(), z.number().transform(String)])
  .optional()
  .catch(undefined);

/**
 * Claims carried by an access token. Registered claims are typed when
 * present; provider-specific claims pass through untouched.
 */
export const TokenClaimsSchema = z
  .object({
    iss: z.string().optional(),
    sub: z.string().optional(),
    aud: z.union([z.string(), z.array(z.string())]).optional(),
    exp: z.number().optional(),
    nbf: z.number().optional(),
    iat: z.number().optional(),
    jti: ProfileClaimSchema,
    preferred_username: ProfileClaimSchema,
    email: ProfileClaimSchema,
    realm_access: RoleContainerSchema,
    resource_access: z.record(z.string(), RoleContainerSchema).optional().catch(undefined),
  })
  .passthrough();

export type TokenClaims = z.infer<typeof TokenClaimsSchema>;

/** Claims after every validation step has passed. */
export type ValidatedClaims = TokenClaims & {
  iss: string;
  sub: string;
  exp: number;
};

export interface AuthenticatedPrincipal {
  readonly subject: string;
  readonly issuer: string;
  readonly roles: ReadonlySet<string>;
  readonly username?: string;
  readonly email?: string;
  readonly audience?: string;
  readonly claims: Readonly<ValidatedClaims>;
}

export interface RequestContext {
  readonly correlationId: string;
  principal?: AuthenticatedPrincipal;
}

// Wire shape of every error response body
export const ErrorResponseSchema = z.object({
  error: z.string(),
  message: z.string(),
  statusCode: z.number().int(),
  kind: AuthErrorKindSchema.optional(),
  correlationId: z.string().optional(),
});

export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;
