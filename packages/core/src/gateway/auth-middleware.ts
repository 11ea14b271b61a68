/**
 * Auth Middleware: Fastify onRequest hooks for bearer authentication and
 * role guards.
 *
 * A route opts in by declaring `config.requiredRoles` (an empty list admits
 * any authenticated caller); routes without it are public.
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import { AuthError, statusForKind } from '../security/auth-error.js';
import { authorize } from '../security/authorization.js';
import type { Authenticator } from '../security/authenticator.js';
import type { SecureLogger } from '../logging/logger.js';
import { sendError } from '../utils/errors.js';

// ── Fastify augmentation ─────────────────────────────────────────────

declare module 'fastify' {
  interface FastifyContextConfig {
    requiredRoles?: readonly string[];
  }
}

// ── Helpers ──────────────────────────────────────────────────────────

function requiredRolesOf(request: FastifyRequest): readonly string[] | undefined {
  return request.routeOptions.config?.requiredRoles;
}

function requestLogger(logger: SecureLogger, request: FastifyRequest): SecureLogger {
  return logger.child({ correlationId: request.requestContext?.correlationId });
}

// ── Authentication hook ──────────────────────────────────────────────

export interface AuthHookOptions {
  authenticator: Authenticator;
  logger: SecureLogger;
}

export function createAuthHook(opts: AuthHookOptions) {
  return async function authHook(request: FastifyRequest, reply: FastifyReply) {
    if (!requiredRolesOf(request)) return;

    try {
      const principal = await opts.authenticator.authenticate(request.headers.authorization);
      if (request.requestContext) request.requestContext.principal = principal;
    } catch (err) {
      if (err instanceof AuthError) {
        requestLogger(opts.logger, request).warn('Authentication failed', {
          kind: err.kind,
          method: request.method,
          url: request.url,
        });
        return sendError(reply, err.statusCode, err.message, { kind: err.kind });
      }
      throw err;
    }
  };
}

// ── Role guard hook ──────────────────────────────────────────────────

export interface RoleGuardHookOptions {
  logger: SecureLogger;
}

export function createRoleGuardHook(opts: RoleGuardHookOptions) {
  return async function roleGuardHook(request: FastifyRequest, reply: FastifyReply) {
    const requiredRoles = requiredRolesOf(request);
    if (!requiredRoles) return;

    const principal = request.requestContext?.principal;
    const decision = authorize(principal, requiredRoles);
    if (decision.allowed) return;

    requestLogger(opts.logger, request).warn('Access denied', {
      kind: decision.kind,
      method: request.method,
      url: request.url,
      subject: principal?.subject,
      requiredRoles: [...requiredRoles],
    });
    const message =
      decision.kind === 'InsufficientRole'
        ? `Requires one of: ${requiredRoles.join(', ')}`
        : 'Missing authentication credentials';
    return sendError(reply, statusForKind(decision.kind), message, { kind: decision.kind });
  };
}
