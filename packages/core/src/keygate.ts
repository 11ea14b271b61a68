/**
 * KeyGate - Main Entry Point
 *
 * Wires configuration, logging, the Key Cache, token validation and the
 * gateway server together.
 *
 * Security considerations:
 * - Startup fails without an issuer and audience to validate against
 * - One Key Cache instance per process, owned here and passed down
 * - Shutdown is idempotent
 */

import type { Config } from '@keygate/shared';
import { loadConfig, assertAuthConfigured, type LoadConfigOptions } from './config/loader.js';
import { createLogger, type SecureLogger } from './logging/logger.js';
import { KeyCache } from './security/key-cache.js';
import { TokenValidator } from './security/token-validator.js';
import { Authenticator } from './security/authenticator.js';
import { GatewayServer, createGatewayServer } from './gateway/server.js';
import { toErrorMessage } from './utils/errors.js';

export interface KeyGateOptions {
  /** Configuration options, or an already resolved configuration */
  config?: LoadConfigOptions | Config;
  /** Logger to use instead of one built from config.logging */
  logger?: SecureLogger;
  /** fetch used for the identity provider */
  fetch?: typeof fetch;
  /** Fetch signing keys before accepting traffic (failure only logs) */
  warmKeys?: boolean;
}

export interface KeyGateState {
  initialized: boolean;
  startedAt?: number;
  address?: string;
}

function isResolvedConfig(value: LoadConfigOptions | Config): value is Config {
  return 'core' in value && 'oidc' in value;
}

export class KeyGate {
  private config: Config | null = null;
  private logger: SecureLogger | null = null;
  private keyCache: KeyCache | null = null;
  private gateway: GatewayServer | null = null;
  private startedAt: number | null = null;
  private address: string | null = null;
  private shutdownPromise: Promise<void> | null = null;

  constructor(private readonly options: KeyGateOptions = {}) {}

  /**
   * Load configuration and build every component. Must run before start().
   */
  initialize(): void {
    if (this.gateway) {
      throw new Error('KeyGate is already initialized');
    }

    const source = this.options.config ?? {};
    const config = isResolvedConfig(source) ? source : loadConfig(source);
    assertAuthConfigured(config);

    const logger = this.options.logger ?? createLogger(config.logging);
    logger.info('KeyGate initializing', {
      environment: config.core.environment,
      version: config.core.version,
      issuer: config.oidc.issuerUrl,
    });

    const keyCache = new KeyCache({
      issuerUrl: config.oidc.issuerUrl,
      jwksUri: config.oidc.jwksUri,
      ttlSeconds: config.oidc.cacheTtlSeconds,
      graceSeconds: config.oidc.jwksGraceSeconds,
      httpTimeoutMs: config.oidc.httpTimeoutMs,
      logger,
      fetch: this.options.fetch,
    });

    const validator = new TokenValidator({
      keys: keyCache,
      issuer: config.oidc.issuerUrl,
      audience: config.oidc.audience,
      clockToleranceSeconds: config.oidc.clockToleranceSeconds,
    });

    const authenticator = new Authenticator({ validator, clientId: config.oidc.clientId });

    this.gateway = createGatewayServer({ config, keyCache, authenticator, logger });
    this.config = config;
    this.logger = logger;
    this.keyCache = keyCache;
  }

  async start(): Promise<string> {
    const { gateway, keyCache, logger } = this.ensureInitialized();

    if (this.options.warmKeys) {
      try {
        await keyCache.refresh();
      } catch (error) {
        logger.warn('Signing keys not available yet; will retry on first request', {
          error: toErrorMessage(error),
        });
      }
    }

    this.address = await gateway.start();
    this.startedAt = Date.now();
    return this.address;
  }

  shutdown(): Promise<void> {
    this.shutdownPromise ??= this.performShutdown();
    return this.shutdownPromise;
  }

  private async performShutdown(): Promise<void> {
    if (!this.gateway) return;

    this.logger?.info('KeyGate shutting down', {
      uptime: this.startedAt ? Date.now() - this.startedAt : 0,
    });
    await this.gateway.stop();
  }

  getState(): KeyGateState {
    return {
      initialized: this.gateway !== null,
      startedAt: this.startedAt ?? undefined,
      address: this.address ?? undefined,
    };
  }

  getConfig(): Config {
    return this.ensureInitialized().config;
  }

  getGateway(): GatewayServer {
    return this.ensureInitialized().gateway;
  }

  getKeyCache(): KeyCache {
    return this.ensureInitialized().keyCache;
  }

  private ensureInitialized() {
    if (!this.gateway || !this.config || !this.logger || !this.keyCache) {
      throw new Error('KeyGate is not initialized');
    }
    return {
      gateway: this.gateway,
      config: this.config,
      logger: this.logger,
      keyCache: this.keyCache,
    };
  }
}

/**
 * Create and initialize a KeyGate instance
 */
export function createKeyGate(options?: KeyGateOptions): KeyGate {
  const keyGate = new KeyGate(options);
  keyGate.initialize();
  return keyGate;
}
