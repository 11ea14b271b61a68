/**
 * API Routes: public service endpoints and the bearer-protected examples.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { AuthErrorKind, type AuthenticatedPrincipal, type CoreConfig } from '@keygate/shared';
import { AuthError } from '../security/auth-error.js';
import type { KeyCacheStatus } from '../security/key-cache.js';

export const ADMIN_ROLES = ['admin', 'realm-admin'] as const;

export interface ApiRoutesOptions {
  core: CoreConfig;
  keyStatus: () => KeyCacheStatus;
}

// The auth hooks run first on protected routes; a handler without a
// principal means the route was registered without config.requiredRoles.
function principalOf(request: FastifyRequest): AuthenticatedPrincipal {
  const principal = request.requestContext?.principal;
  if (!principal) throw new AuthError(AuthErrorKind.UNAUTHENTICATED);
  return principal;
}

function sortedRoles(principal: AuthenticatedPrincipal): string[] {
  return [...principal.roles].sort();
}

export function registerApiRoutes(app: FastifyInstance, opts: ApiRoutesOptions): void {
  const { core, keyStatus } = opts;
  const prefix = core.apiPrefix;

  // ── Public ────────────────────────────────────────────────────────

  app.get('/', async () => ({ name: core.name, version: core.version }));

  const health = async () => ({ status: 'ok', keys: keyStatus() });
  app.get('/health', health);
  app.get(`${prefix}/health`, health);

  app.get(`${prefix}/info`, async () => ({
    name: core.name,
    version: core.version,
    apiPrefix: prefix,
    timestamp: new Date().toISOString(),
  }));

  // ── Protected ─────────────────────────────────────────────────────

  app.get(`${prefix}/protected`, { config: { requiredRoles: [] } }, async (request) => {
    const principal = principalOf(request);
    return {
      subject: principal.subject,
      username: principal.username ?? null,
      email: principal.email ?? null,
      roles: sortedRoles(principal),
      issuer: principal.issuer,
    };
  });

  app.get(
    `${prefix}/protected/admin`,
    { config: { requiredRoles: ADMIN_ROLES } },
    async (request) => {
      const principal = principalOf(request);
      return { ok: true, subject: principal.subject, roles: sortedRoles(principal) };
    }
  );
}
