import type { RoleContainer, TokenClaims } from '@keygate/shared';

function collect(container: RoleContainer, into: Set<string>): void {
  for (const role of container?.roles ?? []) {
    if (typeof role === 'string') {
      into.add(role);
    } else if (typeof role === 'number') {
      into.add(String(role));
    }
  }
}

/**
 * Effective roles: realm roles ∪ roles of `clientId` under resource_access.
 * Either source may be absent; names are kept as issued.
 */
export function extractRoles(claims: TokenClaims, clientId: string): Set<string> {
  const roles = new Set<string>();
  collect(claims.realm_access, roles);
  if (clientId) {
    collect(claims.resource_access?.[clientId], roles);
  }
  return roles;
}
