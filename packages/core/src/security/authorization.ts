import { AuthErrorKind, type AuthenticatedPrincipal } from '@keygate/shared';

export type AuthorizationDecision =
  | { allowed: true }
  | { allowed: false; kind: typeof AuthErrorKind.UNAUTHENTICATED | typeof AuthErrorKind.INSUFFICIENT_ROLE };

/**
 * Any-of role check. An empty requirement admits every authenticated principal.
 */
export function authorize(
  principal: AuthenticatedPrincipal | undefined,
  requiredRoles: readonly string[]
): AuthorizationDecision {
  if (!principal) {
    return { allowed: false, kind: AuthErrorKind.UNAUTHENTICATED };
  }
  if (requiredRoles.length === 0 || requiredRoles.some((role) => principal.roles.has(role))) {
    return { allowed: true };
  }
  return { allowed: false, kind: AuthErrorKind.INSUFFICIENT_ROLE };
}
