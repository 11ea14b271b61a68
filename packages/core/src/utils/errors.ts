/**
 * Extracts a readable message from an unknown error value.
 * Use in catch blocks: `logger.warn('...', { error: toErrorMessage(err) })`
 */
export function toErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : 'Unknown error';
}

import type { FastifyReply } from 'fastify';
import type { ErrorResponse } from '@keygate/shared';

const HTTP_STATUS_NAMES: Record<number, string> = {
  400: 'Bad Request',
  401: 'Unauthorized',
  403: 'Forbidden',
  404: 'Not Found',
  405: 'Method Not Allowed',
  413: 'Payload Too Large',
  415: 'Unsupported Media Type',
  429: 'Too Many Requests',
  500: 'Internal Server Error',
  503: 'Service Unavailable',
};

export function httpStatusName(code: number): string {
  return HTTP_STATUS_NAMES[code] ?? 'Error';
}

export function sendError(
  reply: FastifyReply,
  statusCode: number,
  message: string,
  extra: Pick<ErrorResponse, 'kind'> = {}
) {
  const body: ErrorResponse = {
    error: httpStatusName(statusCode),
    message,
    statusCode,
    ...extra,
  };
  const correlationId = reply.request.requestContext?.correlationId;
  if (correlationId) body.correlationId = correlationId;
  return reply.code(statusCode).send(body);
}
