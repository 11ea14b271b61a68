import { describe, it, expect, afterEach } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import {
  CORRELATION_HEADER,
  createCorrelationEchoHook,
  createCorrelationHook,
  resolveCorrelationId,
} from './correlation.js';

describe('resolveCorrelationId', () => {
  const generate = () => 'fresh-id';

  it('keeps a caller-supplied id', () => {
    expect(resolveCorrelationId('abc-123', generate)).toBe('abc-123');
  });

  it('takes the first value of a repeated header', () => {
    expect(resolveCorrelationId(['first', 'second'], generate)).toBe('first');
  });

  it('generates an id when the header is missing or blank', () => {
    expect(resolveCorrelationId(undefined, generate)).toBe('fresh-id');
    expect(resolveCorrelationId('', generate)).toBe('fresh-id');
    expect(resolveCorrelationId('   ', generate)).toBe('fresh-id');
    expect(resolveCorrelationId([], generate)).toBe('fresh-id');
  });

  it('defaults to UUIDv7 ids', () => {
    expect(resolveCorrelationId(undefined)).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-7/);
  });
});

describe('correlation hooks', () => {
  let app: FastifyInstance;
  let counter: number;

  async function build(): Promise<FastifyInstance> {
    counter = 0;
    const instance = Fastify({ logger: false });
    instance.addHook('onRequest', createCorrelationHook(() => `id-${++counter}`));
    instance.addHook('onSend', createCorrelationEchoHook());
    instance.get('/ok', async (request) => ({ id: request.requestContext?.correlationId }));
    instance.get('/fail', async () => {
      throw new Error('boom');
    });
    await instance.ready();
    return instance;
  }

  afterEach(async () => {
    await app.close();
  });

  it('exposes the id to handlers and echoes it', async () => {
    app = await build();
    const res = await app.inject({ method: 'GET', url: '/ok', headers: { 'x-request-id': 'abc' } });

    expect(res.json()).toEqual({ id: 'abc' });
    expect(res.headers[CORRELATION_HEADER.toLowerCase()]).toBe('abc');
  });

  it('generates a new id per request', async () => {
    app = await build();
    const first = await app.inject({ method: 'GET', url: '/ok' });
    const second = await app.inject({ method: 'GET', url: '/ok' });

    expect(first.headers['x-request-id']).toBe('id-1');
    expect(second.headers['x-request-id']).toBe('id-2');
  });

  it('echoes the id on error and not-found responses', async () => {
    app = await build();
    const failed = await app.inject({ method: 'GET', url: '/fail', headers: { 'x-request-id': 'e1' } });
    const missing = await app.inject({ method: 'GET', url: '/none', headers: { 'x-request-id': 'e2' } });

    expect(failed.statusCode).toBe(500);
    expect(failed.headers['x-request-id']).toBe('e1');
    expect(missing.statusCode).toBe(404);
    expect(missing.headers['x-request-id']).toBe('e2');
  });
});
