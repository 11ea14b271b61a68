/**
 * Correlation Middleware: every request gets a correlation id, taken from
 * X-Request-Id when the caller sent one, generated otherwise, and the same
 * value goes back on the response whatever its status.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { RequestContext } from '@keygate/shared';
import { uuidv7 } from '../utils/crypto.js';

// ── Fastify augmentation ─────────────────────────────────────────────

declare module 'fastify' {
  interface FastifyRequest {
    requestContext?: RequestContext;
  }
}

export const CORRELATION_HEADER = 'X-Request-Id';

export function resolveCorrelationId(
  incoming: string | string[] | undefined,
  generate: () => string = uuidv7
): string {
  const value = Array.isArray(incoming) ? incoming[0] : incoming;
  if (value !== undefined && value.trim().length > 0) return value;
  return generate();
}

export function createCorrelationHook(generate: () => string = uuidv7) {
  return async function correlationHook(request: FastifyRequest, _reply: FastifyReply) {
    const correlationId = resolveCorrelationId(
      request.headers[CORRELATION_HEADER.toLowerCase()],
      generate
    );
    request.requestContext = { correlationId };
  };
}

/** onSend: write the id on whatever reply goes out, errors included. */
export function createCorrelationEchoHook() {
  return async function correlationEchoHook(
    request: FastifyRequest,
    reply: FastifyReply,
    payload: unknown
  ) {
    const correlationId = request.requestContext?.correlationId;
    if (correlationId) reply.header(CORRELATION_HEADER, correlationId);
    return payload;
  };
}
