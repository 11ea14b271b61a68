import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { stringify as stringifyYaml } from 'yaml';
import {
  loadConfig,
  loadEnvConfig,
  mergeConfigs,
  parseCorsOrigins,
  assertAuthConfigured,
} from './loader.js';
import { VERSION } from '../version.js';

describe('loadConfig', () => {
  it('should load default configuration when no file or env vars are set', () => {
    const config = loadConfig({ skipEnv: true, skipDiscovery: true });

    expect(config.core).toEqual({
      name: 'keygate',
      version: VERSION,
      environment: 'development',
      apiPrefix: '/api',
    });
    expect(config.gateway).toEqual({
      host: '127.0.0.1',
      port: 3000,
      cors: { enabled: false, origins: [] },
    });
    expect(config.logging).toEqual({
      level: 'info',
      output: [{ type: 'stdout', format: 'json' }],
    });
    expect(config.oidc).toEqual({
      issuerUrl: '',
      audience: '',
      clientId: '',
      cacheTtlSeconds: 300,
      jwksGraceSeconds: 300,
      httpTimeoutMs: 5000,
      clockToleranceSeconds: 0,
    });
  });

  it('should apply programmatic overrides', () => {
    const config = loadConfig({
      skipEnv: true,
      skipDiscovery: true,
      overrides: {
        core: { environment: 'production' },
        gateway: { port: 9000 },
      },
    });

    expect(config.core.environment).toBe('production');
    expect(config.gateway.port).toBe(9000);
    expect(config.gateway.host).toBe('127.0.0.1');
  });

  it('should load environment variables', () => {
    const config = loadConfig({
      skipDiscovery: true,
      env: {
        APP_NAME: 'edge-api',
        APP_VERSION: '2.0.0',
        API_PREFIX: '/v2',
        HOST: '0.0.0.0',
        PORT: '4000',
        LOG_LEVEL: 'DEBUG',
        LOG_FORMAT: 'pretty',
        OIDC_ISSUER_URL: 'https://idp.test/realms/main/',
        OIDC_AUDIENCE: 'edge-api',
        OIDC_CLIENT_ID: 'edge-web',
        OIDC_CACHE_TTL_SECONDS: '600',
        OIDC_JWKS_URI: 'https://idp.test/realms/main/certs',
        OIDC_JWKS_GRACE_SECONDS: '0',
        OIDC_HTTP_TIMEOUT_MS: '2500',
        OIDC_CLOCK_TOLERANCE_SECONDS: '30',
      },
    });

    expect(config.core.name).toBe('edge-api');
    expect(config.core.version).toBe('2.0.0');
    expect(config.core.apiPrefix).toBe('/v2');
    expect(config.gateway.host).toBe('0.0.0.0');
    expect(config.gateway.port).toBe(4000);
    expect(config.logging.level).toBe('debug');
    expect(config.logging.output).toEqual([{ type: 'stdout', format: 'pretty' }]);
    expect(config.oidc).toEqual({
      issuerUrl: 'https://idp.test/realms/main',
      audience: 'edge-api',
      clientId: 'edge-web',
      cacheTtlSeconds: 600,
      jwksUri: 'https://idp.test/realms/main/certs',
      jwksGraceSeconds: 0,
      httpTimeoutMs: 2500,
      clockToleranceSeconds: 30,
    });
  });

  it('should fall back to KEYCLOAK_* variables', () => {
    const config = loadConfig({
      skipDiscovery: true,
      env: {
        OIDC_ISSUER_URL: '',
        KEYCLOAK_ISSUER_URL: 'https://kc.test/realms/legacy',
        KEYCLOAK_AUDIENCE: 'account',
      },
    });

    expect(config.oidc.issuerUrl).toBe('https://kc.test/realms/legacy');
    expect(config.oidc.audience).toBe('account');
  });

  it('should prefer OIDC_* over KEYCLOAK_* variables', () => {
    const config = loadConfig({
      skipDiscovery: true,
      env: {
        OIDC_AUDIENCE: 'keygate-api',
        KEYCLOAK_AUDIENCE: 'account',
      },
    });

    expect(config.oidc.audience).toBe('keygate-api');
  });

  it('should reject a cache TTL outside 30..86400', () => {
    expect(() =>
      loadConfig({ skipDiscovery: true, env: { OIDC_CACHE_TTL_SECONDS: '10' } })
    ).toThrow(/oidc\.cacheTtlSeconds/);
    expect(() =>
      loadConfig({ skipDiscovery: true, env: { OIDC_CACHE_TTL_SECONDS: '100000' } })
    ).toThrow(/oidc\.cacheTtlSeconds/);
  });

  it('should reject a non-numeric port', () => {
    expect(() => loadConfig({ skipDiscovery: true, env: { PORT: 'http' } })).toThrow(
      /gateway\.port/
    );
  });

  it('should reject an API prefix without a leading slash', () => {
    expect(() => loadConfig({ skipDiscovery: true, env: { API_PREFIX: 'api' } })).toThrow(
      /core\.apiPrefix/
    );
  });

  describe('config file', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'keygate-config-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    function writeConfig(content: unknown): string {
      const path = join(dir, 'keygate.yaml');
      writeFileSync(path, stringifyYaml(content));
      return path;
    }

    it('should load values from a YAML file', () => {
      const configPath = writeConfig({
        core: { name: 'from-file', apiPrefix: '/internal' },
        oidc: { issuerUrl: 'https://idp.test/realms/file', audience: 'file-api' },
      });

      const config = loadConfig({ configPath, skipEnv: true });

      expect(config.core.name).toBe('from-file');
      expect(config.core.apiPrefix).toBe('/internal');
      expect(config.oidc.issuerUrl).toBe('https://idp.test/realms/file');
    });

    it('should let environment variables override the file field by field', () => {
      const configPath = writeConfig({
        core: { name: 'from-file', apiPrefix: '/internal' },
        gateway: { port: 8080 },
      });

      const config = loadConfig({ configPath, env: { APP_NAME: 'from-env' } });

      expect(config.core.name).toBe('from-env');
      expect(config.core.apiPrefix).toBe('/internal');
      expect(config.gateway.port).toBe(8080);
    });

    it('should treat an empty file as no settings', () => {
      const path = join(dir, 'empty.yaml');
      writeFileSync(path, '');
      expect(loadConfig({ configPath: path, skipEnv: true }).core.name).toBe('keygate');
    });

    it('should reject a file that is not a mapping', () => {
      const path = join(dir, 'list.yaml');
      writeFileSync(path, '- a\n- b\n');
      expect(() => loadConfig({ configPath: path, skipEnv: true })).toThrow(/expected a mapping/);
    });

    it('should throw when an explicit file does not exist', () => {
      expect(() => loadConfig({ configPath: join(dir, 'missing.yaml') })).toThrow(
        /Config file not found/
      );
    });
  });
});

describe('loadEnvConfig', () => {
  it('returns an empty layer for an empty environment', () => {
    expect(loadEnvConfig({})).toEqual({});
  });

  it('enables CORS only when origins are given', () => {
    expect(loadEnvConfig({ BACKEND_CORS_ORIGINS: 'http://localhost:5173' })).toEqual({
      gateway: { cors: { enabled: true, origins: ['http://localhost:5173'] } },
    });
    expect(loadEnvConfig({ BACKEND_CORS_ORIGINS: '[]' })).toEqual({
      gateway: { cors: { enabled: false, origins: [] } },
    });
  });
});

describe('parseCorsOrigins', () => {
  it('parses a JSON array', () => {
    expect(parseCorsOrigins('["http://a.test", " http://b.test ", ""]')).toEqual([
      'http://a.test',
      'http://b.test',
    ]);
  });

  it('parses a comma-separated list', () => {
    expect(parseCorsOrigins('http://a.test, http://b.test,,')).toEqual([
      'http://a.test',
      'http://b.test',
    ]);
  });

  it('returns nothing for an unset or blank value', () => {
    expect(parseCorsOrigins(undefined)).toEqual([]);
    expect(parseCorsOrigins('  ')).toEqual([]);
  });

  it('rejects malformed JSON', () => {
    expect(() => parseCorsOrigins('["http://a.test"')).toThrow(/not valid JSON/);
    expect(() => parseCorsOrigins('[')).toThrow(/not valid JSON/);
  });
});

describe('mergeConfigs', () => {
  it('merges nested objects and replaces arrays', () => {
    expect(
      mergeConfigs(
        { gateway: { host: 'a', cors: { origins: ['x'] } }, core: { name: 'n' } },
        { gateway: { cors: { origins: ['y'] } }, core: undefined }
      )
    ).toEqual({ gateway: { host: 'a', cors: { origins: ['y'] } }, core: { name: 'n' } });
  });
});

describe('assertAuthConfigured', () => {
  it('lists every missing setting', () => {
    const config = loadConfig({ skipEnv: true, skipDiscovery: true });
    expect(() => assertAuthConfigured(config)).toThrow(
      'Missing required OIDC settings:\n  OIDC_ISSUER_URL (oidc.issuerUrl)\n  OIDC_AUDIENCE (oidc.audience)'
    );
  });

  it('passes when issuer and audience are set', () => {
    const config = loadConfig({
      skipEnv: true,
      skipDiscovery: true,
      overrides: { oidc: { issuerUrl: 'https://idp.test/realms/main', audience: 'api' } },
    });
    expect(() => assertAuthConfigured(config)).not.toThrow();
  });
});
