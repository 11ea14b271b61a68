/**
 * Configuration Types for KeyGate
 *
 * Security considerations:
 * - No signing material lives in config; keys come from the identity provider
 * - Timeouts and cache lifetimes have upper bounds
 * - All paths are validated to prevent path traversal
 */

import { z } from 'zod';

// Safe path validation (no path traversal)
const SafePathSchema = z
  .string()
  .min(1)
  .max(4096)
  .refine((path) => !path.includes('..') && !path.includes('\0'), {
    message: 'Path contains forbidden characters',
  });

// Core configuration
export const CoreConfigSchema = z.object({
  name: z.string().min(1).default('keygate'),
  version: z.string().min(1).default('0.1.0'),
  environment: z.enum(['development', 'staging', 'production']).default('development'),
  apiPrefix: z
    .string()
    .regex(/^\/[A-Za-z0-9/_-]*[A-Za-z0-9_-]$/, 'Must start with "/" and not end with "/"')
    .default('/api'),
});

export type CoreConfig = z.infer<typeof CoreConfigSchema>;

// Logging configuration
export const LoggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),

  output: z
    .array(
      z.discriminatedUnion('type', [
        z.object({
          type: z.literal('file'),
          path: SafePathSchema,
        }),
        z.object({
          type: z.literal('stdout'),
          format: z.enum(['json', 'pretty']).default('json'),
        }),
      ])
    )
    .default([{ type: 'stdout', format: 'json' }]),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

const CorsConfigSchema = z
  .object({
    enabled: z.boolean().default(false),
    origins: z.array(z.string().min(1)).default([]),
  })
  .default({});

// Gateway configuration
export const GatewayConfigSchema = z.object({
  host: z.string().default('127.0.0.1'),
  port: z.number().int().min(1).max(65535).default(3000),
  cors: CorsConfigSchema,
});

export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;

// OIDC / bearer-token validation
export const OidcConfigSchema = z.object({
  /** Issuer base URL, e.g. https://idp.example.com/realms/main (trailing slash trimmed) */
  issuerUrl: z
    .string()
    .default('')
    .transform((url) => url.trim().replace(/\/+$/, '')),
  /** Expected `aud` value */
  audience: z
    .string()
    .default('')
    .transform((aud) => aud.trim()),
  /** Client id whose `resource_access` roles are merged into the principal */
  clientId: z
    .string()
    .default('')
    .transform((id) => id.trim()),
  cacheTtlSeconds: z.number().int().min(30).max(86400).default(300),
  /** Explicit key-set URL; when unset it is read from the discovery document */
  jwksUri: z.string().url().optional(),
  /** How long a stale key set may still be served after a failed refresh */
  jwksGraceSeconds: z.number().int().min(0).max(86400).default(300),
  httpTimeoutMs: z.number().int().positive().max(60000).default(5000),
  clockToleranceSeconds: z.number().int().min(0).max(300).default(0),
});

export type OidcConfig = z.infer<typeof OidcConfigSchema>;

// Complete configuration schema
export const ConfigSchema = z.object({
  core: CoreConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
  gateway: GatewayConfigSchema.default({}),
  oidc: OidcConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

// Partial config for overrides: every field has a default, so the input shape is all-optional
export type PartialConfig = z.input<typeof ConfigSchema>;
