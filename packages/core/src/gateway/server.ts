/**
 * Gateway Server for KeyGate
 *
 * Fronts the API routes with correlation ids, CORS, security headers and
 * bearer authentication.
 *
 * Security considerations:
 * - Loopback bind by default
 * - Protected routes fail closed: no principal, no handler
 * - Auth failures answer 401/403 with a machine-readable kind
 * - No proxy headers trusted
 */

import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import type { Config } from '@keygate/shared';
import type { SecureLogger } from '../logging/logger.js';
import type { KeyCache } from '../security/key-cache.js';
import type { Authenticator } from '../security/authenticator.js';
import { AuthError } from '../security/auth-error.js';
import { createAuthHook, createRoleGuardHook } from './auth-middleware.js';
import {
  CORRELATION_HEADER,
  createCorrelationEchoHook,
  createCorrelationHook,
} from './correlation.js';
import { registerApiRoutes } from './api-routes.js';
import { sendError, toErrorMessage } from '../utils/errors.js';

export interface GatewayServerOptions {
  config: Config;
  keyCache: KeyCache;
  authenticator: Authenticator;
  logger: SecureLogger;
  /** Correlation id generator for requests that arrive without one */
  generateId?: () => string;
}

export class GatewayServer {
  private readonly config: Config;
  private readonly keyCache: KeyCache;
  private readonly authenticator: Authenticator;
  private readonly logger: SecureLogger;
  private readonly generateId: (() => string) | undefined;
  private readonly app: FastifyInstance;
  private initialized = false;

  constructor(options: GatewayServerOptions) {
    this.config = options.config;
    this.keyCache = options.keyCache;
    this.authenticator = options.authenticator;
    this.logger = options.logger.child({ component: 'Gateway' });
    this.generateId = options.generateId;

    this.app = Fastify({
      logger: false, // We use our own logger
      trustProxy: false,
      bodyLimit: 1_048_576,
    });

    // Middleware and routes are set up on first ready()/start()
  }

  private init(): void {
    if (this.initialized) return;
    this.initialized = true;
    this.setupMiddleware();
    this.setupErrorHandlers();
    registerApiRoutes(this.app, {
      core: this.config.core,
      keyStatus: () => this.keyCache.getStatus(),
    });
  }

  private setupMiddleware(): void {
    const gateway = this.config.gateway;

    // Correlation id first: everything after it, including early replies, carries it
    this.app.addHook('onRequest', createCorrelationHook(this.generateId));
    this.app.addHook('onSend', createCorrelationEchoHook());

    // Security headers
    this.app.addHook('onRequest', async (_request, reply) => {
      reply.header('X-Content-Type-Options', 'nosniff');
      reply.header('X-Frame-Options', 'DENY');
      reply.header('Referrer-Policy', 'strict-origin-when-cross-origin');
      reply.header('Cache-Control', 'no-store');
    });

    // CORS
    this.app.addHook('onRequest', async (request, reply) => {
      const origin = request.headers.origin;

      if (origin && gateway.cors.enabled) {
        const allowedOrigins = gateway.cors.origins;

        if (allowedOrigins.includes('*')) {
          reply.header('Access-Control-Allow-Origin', '*');
          // Do NOT set Allow-Credentials with wildcard origin
        } else if (allowedOrigins.includes(origin)) {
          reply.header('Access-Control-Allow-Origin', origin);
          reply.header('Access-Control-Allow-Credentials', 'true');
          reply.header('Vary', 'Origin');
        }

        if (allowedOrigins.includes('*') || allowedOrigins.includes(origin)) {
          reply.header('Access-Control-Allow-Methods', 'GET, POST, PUT, PATCH, DELETE, OPTIONS');
          reply.header(
            'Access-Control-Allow-Headers',
            `Content-Type, Authorization, ${CORRELATION_HEADER}`
          );
          reply.header('Access-Control-Expose-Headers', CORRELATION_HEADER);
        }
      }

      if (request.method === 'OPTIONS') {
        return reply.code(204).send();
      }
    });

    // Authentication, then role guard (after CORS, before routes)
    this.app.addHook(
      'onRequest',
      createAuthHook({ authenticator: this.authenticator, logger: this.logger })
    );
    this.app.addHook('onRequest', createRoleGuardHook({ logger: this.logger }));

    // Request logging
    this.app.addHook('onResponse', async (request, reply) => {
      this.logger.debug('Request completed', {
        correlationId: request.requestContext?.correlationId,
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        responseTime: reply.elapsedTime,
      });
    });
  }

  private setupErrorHandlers(): void {
    this.app.setErrorHandler((error: FastifyError, request, reply) => {
      if (error instanceof AuthError) {
        return sendError(reply, error.statusCode, error.message, { kind: error.kind });
      }
      if (error.validation) {
        return sendError(reply, 400, error.message);
      }

      const status =
        error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500
          ? error.statusCode
          : 500;
      if (status === 500) {
        this.logger.error('Request failed', {
          correlationId: request.requestContext?.correlationId,
          method: request.method,
          url: request.url,
          error: toErrorMessage(error),
        });
        return sendError(reply, 500, 'Internal server error');
      }
      return sendError(reply, status, error.message);
    });

    this.app.setNotFoundHandler((request, reply) =>
      sendError(reply, 404, `Route ${request.method} ${request.url} not found`)
    );
  }

  /**
   * Register hooks and routes and wait for Fastify to be ready, without
   * listening. Tests drive the returned instance through inject().
   */
  async ready(): Promise<FastifyInstance> {
    this.init();
    await this.app.ready();
    return this.app;
  }

  /**
   * Start the server
   * @returns the address it listens on
   */
  async start(): Promise<string> {
    this.init();

    const { host, port } = this.config.gateway;

    try {
      const address = await this.app.listen({ host, port });
      this.logger.info('Gateway server started', {
        host,
        port,
        url: address,
        apiPrefix: this.config.core.apiPrefix,
      });
      return address;
    } catch (error) {
      this.logger.error('Failed to start gateway server', { error: toErrorMessage(error) });
      throw error;
    }
  }

  /**
   * Stop the server
   */
  async stop(): Promise<void> {
    await this.app.close();
    this.logger.info('Gateway server stopped');
  }
}

/**
 * Create a gateway server
 */
export function createGatewayServer(options: GatewayServerOptions): GatewayServer {
  return new GatewayServer(options);
}
