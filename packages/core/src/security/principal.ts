import type { AuthenticatedPrincipal, ValidatedClaims } from '@keygate/shared';

export function buildPrincipal(
  claims: ValidatedClaims,
  roles: Iterable<string>
): AuthenticatedPrincipal {
  const audience = Array.isArray(claims.aud) ? claims.aud[0] : claims.aud;
  return Object.freeze({
    subject: claims.sub,
    issuer: claims.iss,
    roles: new Set(roles),
    username: claims.preferred_username,
    email: claims.email,
    audience,
    claims: Object.freeze({ ...claims }),
  });
}
