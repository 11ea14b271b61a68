/**
 * Configuration Loader for KeyGate
 *
 * Security considerations:
 * - Config files are validated against strict schemas
 * - Path traversal is prevented in file paths
 * - The process refuses to start without an issuer and audience to check tokens against
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { homedir } from 'node:os';
import { parse as parseYaml } from 'yaml';
import { ConfigSchema, type Config, type PartialConfig } from '@keygate/shared';
import { VERSION } from '../version.js';
import { toErrorMessage } from '../utils/errors.js';

// Default config file locations (checked in order)
const DEFAULT_CONFIG_PATHS = [
  './keygate.yaml',
  './keygate.yml',
  './config/keygate.yaml',
  '~/.keygate/config.yaml',
  '/etc/keygate/config.yaml',
];

type ConfigLayer = Record<string, unknown>;

function isPlainObject(value: unknown): value is ConfigLayer {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Expand ~ to home directory
 */
function expandPath(path: string): string {
  if (path.startsWith('~/')) {
    return resolve(homedir(), path.slice(2));
  }
  return resolve(path);
}

/**
 * Load a YAML config file. Values are checked once, after all layers merge.
 */
function loadConfigFile(path: string): ConfigLayer | null {
  const expandedPath = expandPath(path);

  if (!existsSync(expandedPath)) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(expandedPath, 'utf-8'));
  } catch (error) {
    throw new Error(`Failed to load config from ${expandedPath}: ${toErrorMessage(error)}`);
  }

  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new Error(`Invalid configuration in ${expandedPath}: expected a mapping at the top level`);
  }
  return parsed;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value : undefined;
}

/** Numbers pass through parsed; anything else is left for the schema to reject. */
function parseNumber(value: string | undefined): number | string | undefined {
  const raw = nonEmpty(value);
  if (raw === undefined) return undefined;
  const num = Number(raw);
  return Number.isFinite(num) ? num : raw;
}

/**
 * Allowed CORS origins: a JSON array, or a comma-separated list.
 */
export function parseCorsOrigins(value: string | undefined): string[] {
  const raw = nonEmpty(value)?.trim();
  if (raw === undefined) return [];

  let items: unknown[];
  if (raw.startsWith('[')) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new Error(`BACKEND_CORS_ORIGINS is not valid JSON: ${toErrorMessage(error)}`);
    }
    if (!Array.isArray(parsed)) {
      throw new Error('BACKEND_CORS_ORIGINS must be a JSON array');
    }
    items = parsed;
  } else {
    items = raw.split(',');
  }

  return items
    .filter((item): item is string => typeof item === 'string')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function compact(layer: ConfigLayer): ConfigLayer | undefined {
  const entries = Object.entries(layer).filter(([, value]) => value !== undefined);
  return entries.length > 0 ? Object.fromEntries(entries) : undefined;
}

/**
 * Load configuration from environment variables.
 * KEYCLOAK_* names are accepted where the OIDC_* name is unset.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): ConfigLayer {
  const logFormat = nonEmpty(env.LOG_FORMAT);
  const corsOrigins =
    env.BACKEND_CORS_ORIGINS !== undefined ? parseCorsOrigins(env.BACKEND_CORS_ORIGINS) : undefined;

  const layer: ConfigLayer = {
    core: compact({
      name: nonEmpty(env.APP_NAME),
      version: nonEmpty(env.APP_VERSION),
      environment: nonEmpty(env.KEYGATE_ENV),
      apiPrefix: nonEmpty(env.API_PREFIX),
    }),
    logging: compact({
      level: nonEmpty(env.LOG_LEVEL)?.toLowerCase(),
      output: logFormat ? [{ type: 'stdout', format: logFormat }] : undefined,
    }),
    gateway: compact({
      host: nonEmpty(env.HOST),
      port: parseNumber(env.PORT),
      cors: corsOrigins ? { enabled: corsOrigins.length > 0, origins: corsOrigins } : undefined,
    }),
    oidc: compact({
      issuerUrl: nonEmpty(env.OIDC_ISSUER_URL) ?? nonEmpty(env.KEYCLOAK_ISSUER_URL),
      audience: nonEmpty(env.OIDC_AUDIENCE) ?? nonEmpty(env.KEYCLOAK_AUDIENCE),
      clientId: nonEmpty(env.OIDC_CLIENT_ID),
      cacheTtlSeconds: parseNumber(env.OIDC_CACHE_TTL_SECONDS),
      jwksUri: nonEmpty(env.OIDC_JWKS_URI),
      jwksGraceSeconds: parseNumber(env.OIDC_JWKS_GRACE_SECONDS),
      httpTimeoutMs: parseNumber(env.OIDC_HTTP_TIMEOUT_MS),
      clockToleranceSeconds: parseNumber(env.OIDC_CLOCK_TOLERANCE_SECONDS),
    }),
  };

  return compact(layer) ?? {};
}

/**
 * Deep merge two config layers
 * Later values override earlier ones; arrays are replaced, not merged
 */
export function mergeConfigs(base: ConfigLayer, override: ConfigLayer): ConfigLayer {
  const result: ConfigLayer = { ...base };

  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const baseValue = result[key];
    result[key] =
      isPlainObject(value) && isPlainObject(baseValue) ? mergeConfigs(baseValue, value) : value;
  }

  return result;
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Override config values */
  overrides?: PartialConfig;
  /** Environment to read; defaults to process.env */
  env?: NodeJS.ProcessEnv;
  /** Skip environment variable loading */
  skipEnv?: boolean;
  /** Skip auto-discovery of config files (an explicit configPath still loads) */
  skipDiscovery?: boolean;
}

/**
 * Load and validate configuration
 *
 * Loading order (later overrides earlier):
 * 1. Default values from schema
 * 2. Config file (explicit path or auto-discovered)
 * 3. Environment variables
 * 4. Programmatic overrides
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  let fileConfig: ConfigLayer = {};

  if (options.configPath) {
    const loaded = loadConfigFile(options.configPath);
    if (!loaded) {
      throw new Error(`Config file not found: ${options.configPath}`);
    }
    fileConfig = loaded;
  } else if (!options.skipDiscovery) {
    for (const path of DEFAULT_CONFIG_PATHS) {
      const loaded = loadConfigFile(path);
      if (loaded) {
        fileConfig = loaded;
        break;
      }
    }
  }

  const envConfig = options.skipEnv ? {} : loadEnvConfig(options.env);

  let mergedConfig = mergeConfigs({ core: { version: VERSION } }, fileConfig);
  mergedConfig = mergeConfigs(mergedConfig, envConfig);

  if (options.overrides) {
    mergedConfig = mergeConfigs(mergedConfig, options.overrides);
  }

  // Validate and apply defaults
  const result = ConfigSchema.safeParse(mergedConfig);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `  ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Invalid configuration:\n${errors}`);
  }

  return result.data;
}

/**
 * Startup check: tokens cannot be validated without an issuer and an audience.
 */
export function assertAuthConfigured(config: Config): void {
  const missing: string[] = [];
  if (!config.oidc.issuerUrl) missing.push('OIDC_ISSUER_URL (oidc.issuerUrl)');
  if (!config.oidc.audience) missing.push('OIDC_AUDIENCE (oidc.audience)');

  if (missing.length > 0) {
    throw new Error(`Missing required OIDC settings:\n  ${missing.join('\n  ')}`);
  }
}
